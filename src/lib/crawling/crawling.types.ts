/**
 * Crawling Types
 * Type definitions for the frontier, robots gate and crawl statistics
 */

/**
 * Frontier configuration interface
 */
export interface FrontierConfig {
  /**
   * Seed URL; defines the crawl scope (host and base directory)
   */
  baseUrl: string;

  /**
   * Extra hosts admitted besides the base URL's host (any path)
   */
  allowedHosts: string[];

  /**
   * URL must match at least one of these when non-empty
   */
  includePatterns: RegExp[];

  /**
   * URL must match none of these
   */
  excludePatterns: RegExp[];

  /**
   * Maximum number of URLs popped over the whole crawl (0 = unlimited)
   */
  maxPages: number;

  /**
   * Maximum link depth from a seed (0 = unlimited)
   */
  maxDepth: number;

  /**
   * Maximum number of queued URLs; further offers are dropped (0 = unlimited)
   */
  maxPending: number;
}

/**
 * URL waiting in the frontier
 */
export interface PendingUrl {
  /**
   * Normalized absolute URL
   */
  url: string;

  /**
   * Link depth (0 = seed)
   */
  depth: number;
}

/**
 * Serializable frontier state used for resume
 */
export interface FrontierSnapshot {
  pending: PendingUrl[];
}

/**
 * Why an offered URL was not admitted
 */
export type AdmissionRejection =
  | 'invalid_url'
  | 'scheme'
  | 'scope'
  | 'extension'
  | 'include_pattern'
  | 'exclude_pattern'
  | 'depth'
  | 'visited'
  | 'pending'
  | 'frontier_full';

export type AdmissionDecision = { admitted: true; url: string } | { admitted: false; reason: AdmissionRejection };

/**
 * Crawling statistics interface
 */
export interface CrawlStatistics {
  /**
   * Pages fetched, cleaned and chunked
   */
  pagesFetched: number;

  /**
   * Pages skipped (robots, non-text, empty or below min chars)
   */
  pagesSkipped: number;

  /**
   * Pages whose fetch failed
   */
  pagesFailed: number;

  /**
   * Chunks appended to the corpus
   */
  chunksWritten: number;

  /**
   * Chunks dropped as duplicates
   */
  chunksDeduped: number;

  /**
   * High-water mark of the pending queue size
   */
  queuePeek: number;
}

/**
 * On-disk statistics format (stats.json)
 */
export interface StatsSnapshot {
  pages_fetched: number;
  pages_skipped: number;
  pages_failed: number;
  chunks_written: number;
  chunks_deduped: number;
  queue_peek: number;
}

/**
 * Robots policy gate options
 */
export interface RobotsGateConfig {
  respectRobots: boolean;
  userAgent: string;
}

/**
 * Fetches a text document, resolving to null when unavailable
 */
export type TextLoader = (url: string) => Promise<string | null>;
