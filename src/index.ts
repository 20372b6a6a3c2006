/**
 * Documentation corpus crawler
 * Library entry point
 */

export * from './lib/crawling';
export * from './lib/processing';
export * from './lib/dedup';
export * from './lib/fetching';
export * from './lib/corpus';
export * from './lib/engine';
export * from './lib/logging/logger';
export { buildCrawlerConfig, ConfigError, CrawlerConfig, ConfigOverrides } from './config/crawler.config';
export { loadEnv, CrawlEnv } from './config/env';
