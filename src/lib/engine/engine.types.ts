/**
 * Crawl Engine Types
 * Type definitions for the crawl loop, its configuration and its result
 */

import { CrawlStatistics } from '../crawling/crawling.types';
import { OutputFormat } from '../corpus/corpus.types';
import { DedupKeyMode } from '../dedup/content-hasher';
import { FetchFunction } from '../fetching/fetch.types';
import { Clock, SleepFunction } from '../fetching/politeness';
import { CrawlLogger } from '../logging/logger';

/**
 * Engine lifecycle
 */
export enum EngineState {
  IDLE = 'idle',
  RUNNING = 'running',
  DRAINING = 'draining', // max pages reached or stop requested
  EXHAUSTED = 'exhausted', // frontier empty
  FINALIZED = 'finalized',
}

export type StopReason = 'exhausted' | 'max_pages' | 'stopped';

export interface CrawlEngineConfig {
  baseUrl: string;
  outDir: string;

  // Frontier
  maxPages: number;
  maxDepth: number;
  maxPending: number;
  allowedHosts: string[];
  includePatterns: RegExp[];
  excludePatterns: RegExp[];

  // Fetching
  userAgent: string;
  delayMs: number;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  respectRobots: boolean;
  useSitemap: boolean;
  sitemapUrls: string[];

  // Content
  chunkSize: number;
  chunkOverlap: number;
  minChars: number;
  dedupKeyMode: DedupKeyMode;

  // Output
  outputFormats: OutputFormat[];
  resume: boolean;
  saveHtml: boolean;
  saveText: boolean;

  // Loop
  heartbeatEvery: number;
  concurrency: number;
}

/**
 * Injected collaborators; tests replace the network and the clock
 */
export interface CrawlEngineDeps {
  logger?: CrawlLogger;
  fetchImpl?: FetchFunction;
  sleep?: SleepFunction;
  clock?: Clock;
}

export interface CrawlSummary {
  state: EngineState;
  stopReason: StopReason;
  stats: CrawlStatistics;

  /**
   * URLs popped by this run (restored visits excluded)
   */
  pagesPopped: number;

  /**
   * URLs still queued at the end of the run
   */
  pending: number;

  elapsedMs: number;
}
