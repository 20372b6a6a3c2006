import dotenv from 'dotenv';

dotenv.config();

/**
 * Read crawler settings from an environment. Values are parsed but not
 * validated; see buildCrawlerConfig.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  return {
    // Target
    CRAWL_BASE_URL: source.CRAWL_BASE_URL || '',
    CRAWL_OUT_DIR: source.CRAWL_OUT_DIR || './corpus_out',

    // Frontier
    CRAWL_MAX_PAGES: parseInt(source.CRAWL_MAX_PAGES || '5000', 10),
    CRAWL_MAX_DEPTH: parseInt(source.CRAWL_MAX_DEPTH || '0', 10), // 0 = unlimited
    CRAWL_MAX_PENDING: parseInt(source.CRAWL_MAX_PENDING || '100000', 10),
    CRAWL_ALLOWED_HOSTS: source.CRAWL_ALLOWED_HOSTS || '', // Comma-separated hosts
    CRAWL_INCLUDE_REGEX: source.CRAWL_INCLUDE_REGEX || '',
    CRAWL_EXCLUDE_REGEX: source.CRAWL_EXCLUDE_REGEX || '',

    // Fetching
    CRAWL_USER_AGENT: source.CRAWL_USER_AGENT || 'DocCorpusCrawler/1.0',
    CRAWL_DELAY_SECONDS: parseFloat(source.CRAWL_DELAY_SECONDS || '0.5'),
    CRAWL_TIMEOUT_SECONDS: parseFloat(source.CRAWL_TIMEOUT_SECONDS || '15'),
    CRAWL_MAX_RETRIES: parseInt(source.CRAWL_MAX_RETRIES || '0', 10),
    CRAWL_RETRY_BACKOFF_MS: parseInt(source.CRAWL_RETRY_BACKOFF_MS || '1000', 10),
    CRAWL_RESPECT_ROBOTS: source.CRAWL_RESPECT_ROBOTS !== 'false', // Default true
    CRAWL_USE_SITEMAP: source.CRAWL_USE_SITEMAP === 'true', // Default false
    CRAWL_SITEMAP_URLS: source.CRAWL_SITEMAP_URLS || '', // Comma-separated sitemap URLs

    // Content
    CRAWL_CHUNK_SIZE: parseInt(source.CRAWL_CHUNK_SIZE || '0', 10), // 0 = one chunk per page
    CRAWL_CHUNK_OVERLAP: parseInt(source.CRAWL_CHUNK_OVERLAP || '120', 10),
    CRAWL_MIN_CHARS: parseInt(source.CRAWL_MIN_CHARS || '0', 10),
    CRAWL_DEDUP_KEY_MODE: source.CRAWL_DEDUP_KEY_MODE || 'content',

    // Output
    CRAWL_OUTPUT_FORMATS: source.CRAWL_OUTPUT_FORMATS || 'min,full',
    CRAWL_RESUME: source.CRAWL_RESUME === 'true', // Default false
    CRAWL_SAVE_HTML: source.CRAWL_SAVE_HTML === 'true', // Default false
    CRAWL_SAVE_TEXT: source.CRAWL_SAVE_TEXT === 'true', // Default false

    // Loop
    CRAWL_HEARTBEAT_EVERY: parseInt(source.CRAWL_HEARTBEAT_EVERY || '10', 10),
    CRAWL_CONCURRENCY: parseInt(source.CRAWL_CONCURRENCY || '1', 10),

    // Logging
    LOG_LEVEL: source.LOG_LEVEL || 'info',
    LOG_FILE: source.LOG_FILE || '', // Empty = <outDir>/crawl.log, "none" = disabled
  };
}

export type CrawlEnv = ReturnType<typeof loadEnv>;

export const env: CrawlEnv = loadEnv();

export default env;
