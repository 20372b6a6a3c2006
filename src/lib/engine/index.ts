/**
 * Crawl Engine
 * Main export file for the crawl loop
 */

export * from './engine.types';
export * from './crawl-stages';
export * from './crawl-engine';
