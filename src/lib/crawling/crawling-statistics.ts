/**
 * Crawling Statistics Tracker
 * Monotonic crawl counters and the frontier size high-water mark
 */

import { CrawlStatistics, StatsSnapshot } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesFetched: number = 0;
  private pagesSkipped: number = 0;
  private pagesFailed: number = 0;
  private chunksWritten: number = 0;
  private chunksDeduped: number = 0;
  private queuePeek: number = 0;

  constructor(initial?: Partial<CrawlStatistics>) {
    this.startTime = Date.now();
    if (initial) {
      this.pagesFetched = initial.pagesFetched ?? 0;
      this.pagesSkipped = initial.pagesSkipped ?? 0;
      this.pagesFailed = initial.pagesFailed ?? 0;
      this.chunksWritten = initial.chunksWritten ?? 0;
      this.chunksDeduped = initial.chunksDeduped ?? 0;
      this.queuePeek = initial.queuePeek ?? 0;
    }
  }

  recordFetched(): void {
    this.pagesFetched++;
  }

  recordSkipped(): void {
    this.pagesSkipped++;
  }

  recordFailed(): void {
    this.pagesFailed++;
  }

  recordChunkWritten(): void {
    this.chunksWritten++;
  }

  recordChunkDeduped(): void {
    this.chunksDeduped++;
  }

  /**
   * Record the current pending queue size; keeps the maximum ever seen
   */
  observeQueueSize(size: number): void {
    if (size > this.queuePeek) {
      this.queuePeek = size;
    }
  }

  getStatistics(): CrawlStatistics {
    return {
      pagesFetched: this.pagesFetched,
      pagesSkipped: this.pagesSkipped,
      pagesFailed: this.pagesFailed,
      chunksWritten: this.chunksWritten,
      chunksDeduped: this.chunksDeduped,
      queuePeek: this.queuePeek,
    };
  }

  /**
   * Milliseconds since the tracker was created
   */
  elapsedMs(): number {
    return Date.now() - this.startTime;
  }
}

export function toStatsSnapshot(stats: CrawlStatistics): StatsSnapshot {
  return {
    pages_fetched: stats.pagesFetched,
    pages_skipped: stats.pagesSkipped,
    pages_failed: stats.pagesFailed,
    chunks_written: stats.chunksWritten,
    chunks_deduped: stats.chunksDeduped,
    queue_peek: stats.queuePeek,
  };
}

function readCounter(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? Math.floor(value) : 0;
}

/**
 * Parse a stats.json payload; unknown or malformed fields read as 0
 */
export function fromStatsSnapshot(value: unknown): CrawlStatistics {
  const record: Record<string, unknown> =
    typeof value === 'object' && value !== null ? { ...value } : {};
  return {
    pagesFetched: readCounter(record.pages_fetched),
    pagesSkipped: readCounter(record.pages_skipped),
    pagesFailed: readCounter(record.pages_failed),
    chunksWritten: readCounter(record.chunks_written),
    chunksDeduped: readCounter(record.chunks_deduped),
    queuePeek: readCounter(record.queue_peek),
  };
}
