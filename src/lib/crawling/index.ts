/**
 * Crawling System
 * Main export file for frontier, robots and statistics utilities
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './crawling-queue';
export * from './crawling-statistics';
export * from './frontier';
export * from './robots-gate';
export * from './sitemap';
