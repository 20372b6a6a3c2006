/**
 * Crawler Configuration
 * Validates environment settings into the engine configuration
 */

import * as path from 'path';
import { OUTPUT_FORMATS, OutputFormat } from '../lib/corpus/corpus.types';
import { DEDUP_KEY_MODES, isDedupKeyMode } from '../lib/dedup/content-hasher';
import { CrawlEngineConfig } from '../lib/engine/engine.types';
import { isLogLevel, LogLevel } from '../lib/logging/logger';
import { CrawlEnv } from './env';

export const DEFAULT_LOG_FILE = 'crawl.log';
const LOG_FILE_DISABLED = 'none';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface CrawlerConfig extends CrawlEngineConfig {
  logLevel: LogLevel;

  /**
   * Log file path, or null when file logging is disabled
   */
  logFile: string | null;
}

export interface ConfigOverrides {
  baseUrl?: string;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function requireInteger(variable: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${variable} must be an integer >= ${min}`, variable);
  }
  return value;
}

function requireSeconds(variable: string, value: number, allowZero: boolean): number {
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new ConfigError(`${variable} must be a ${allowZero ? 'non-negative' : 'positive'} number`, variable);
  }
  return value;
}

function compilePattern(variable: string, source: string): RegExp[] {
  if (!source) {
    return [];
  }
  try {
    return [new RegExp(source)];
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${variable} is not a valid regular expression: ${message}`, variable);
  }
}

function parseBaseUrl(value: string): string {
  if (!value) {
    throw new ConfigError('A base URL is required (CRAWL_BASE_URL or first argument)', 'CRAWL_BASE_URL');
  }
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`CRAWL_BASE_URL is not a valid URL: ${value}`, 'CRAWL_BASE_URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`CRAWL_BASE_URL must use http or https: ${value}`, 'CRAWL_BASE_URL');
  }
  return url.toString();
}

function parseFormats(value: string): OutputFormat[] {
  const formats: OutputFormat[] = [];
  for (const item of splitList(value.toLowerCase())) {
    const format = OUTPUT_FORMATS.find((known) => known === item);
    if (!format) {
      throw new ConfigError(
        `Unknown output format "${item}" (expected ${OUTPUT_FORMATS.join(', ')})`,
        'CRAWL_OUTPUT_FORMATS'
      );
    }
    if (!formats.includes(format)) {
      formats.push(format);
    }
  }
  if (formats.length === 0) {
    throw new ConfigError('CRAWL_OUTPUT_FORMATS must name at least one format', 'CRAWL_OUTPUT_FORMATS');
  }
  return formats;
}

/**
 * Build and validate the crawler configuration. Throws ConfigError on the
 * first invalid setting.
 */
export function buildCrawlerConfig(raw: CrawlEnv, overrides: ConfigOverrides = {}): CrawlerConfig {
  const baseUrl = parseBaseUrl(overrides.baseUrl || raw.CRAWL_BASE_URL);
  const outDir = path.resolve(raw.CRAWL_OUT_DIR);

  const dedupKeyMode = raw.CRAWL_DEDUP_KEY_MODE;
  if (!isDedupKeyMode(dedupKeyMode)) {
    throw new ConfigError(
      `CRAWL_DEDUP_KEY_MODE must be one of ${DEDUP_KEY_MODES.map((mode) => `"${mode}"`).join(', ')}, got "${dedupKeyMode}"`,
      'CRAWL_DEDUP_KEY_MODE'
    );
  }

  const logLevel = raw.LOG_LEVEL.toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be debug, info, warn or error, got "${raw.LOG_LEVEL}"`, 'LOG_LEVEL');
  }

  let logFile: string | null = path.join(outDir, DEFAULT_LOG_FILE);
  if (raw.LOG_FILE.toLowerCase() === LOG_FILE_DISABLED) {
    logFile = null;
  } else if (raw.LOG_FILE) {
    logFile = path.resolve(raw.LOG_FILE);
  }

  return {
    baseUrl,
    outDir,

    maxPages: requireInteger('CRAWL_MAX_PAGES', raw.CRAWL_MAX_PAGES, 0),
    maxDepth: requireInteger('CRAWL_MAX_DEPTH', raw.CRAWL_MAX_DEPTH, 0),
    maxPending: requireInteger('CRAWL_MAX_PENDING', raw.CRAWL_MAX_PENDING, 0),
    allowedHosts: splitList(raw.CRAWL_ALLOWED_HOSTS.toLowerCase()),
    includePatterns: compilePattern('CRAWL_INCLUDE_REGEX', raw.CRAWL_INCLUDE_REGEX),
    excludePatterns: compilePattern('CRAWL_EXCLUDE_REGEX', raw.CRAWL_EXCLUDE_REGEX),

    userAgent: raw.CRAWL_USER_AGENT,
    delayMs: Math.round(requireSeconds('CRAWL_DELAY_SECONDS', raw.CRAWL_DELAY_SECONDS, true) * 1000),
    timeoutMs: Math.round(requireSeconds('CRAWL_TIMEOUT_SECONDS', raw.CRAWL_TIMEOUT_SECONDS, false) * 1000),
    maxRetries: requireInteger('CRAWL_MAX_RETRIES', raw.CRAWL_MAX_RETRIES, 0),
    retryBackoffMs: requireInteger('CRAWL_RETRY_BACKOFF_MS', raw.CRAWL_RETRY_BACKOFF_MS, 0),
    respectRobots: raw.CRAWL_RESPECT_ROBOTS,
    useSitemap: raw.CRAWL_USE_SITEMAP,
    sitemapUrls: splitList(raw.CRAWL_SITEMAP_URLS),

    chunkSize: requireInteger('CRAWL_CHUNK_SIZE', raw.CRAWL_CHUNK_SIZE, 0),
    chunkOverlap: requireInteger('CRAWL_CHUNK_OVERLAP', raw.CRAWL_CHUNK_OVERLAP, 0),
    minChars: requireInteger('CRAWL_MIN_CHARS', raw.CRAWL_MIN_CHARS, 0),
    dedupKeyMode,

    outputFormats: parseFormats(raw.CRAWL_OUTPUT_FORMATS),
    resume: raw.CRAWL_RESUME,
    saveHtml: raw.CRAWL_SAVE_HTML,
    saveText: raw.CRAWL_SAVE_TEXT,

    heartbeatEvery: requireInteger('CRAWL_HEARTBEAT_EVERY', raw.CRAWL_HEARTBEAT_EVERY, 0),
    concurrency: requireInteger('CRAWL_CONCURRENCY', raw.CRAWL_CONCURRENCY, 1),

    logLevel,
    logFile,
  };
}
