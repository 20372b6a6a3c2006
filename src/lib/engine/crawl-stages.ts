/**
 * Crawl Stages
 * Pure per-page decisions and their effect on the crawl counters
 */

import { CrawlingStatisticsTracker } from '../crawling/crawling-statistics';
import { ChunkRecord, chunkId, PageRecord } from '../corpus/corpus.types';
import { ContentHasher } from '../dedup/content-hasher';
import { FetchFailureReason } from '../fetching/fetch-errors';
import { FetchFailure, FetchRejected } from '../fetching/fetch.types';
import { countChars } from '../processing/text.processor';

export type SkipReason = 'robots_denied' | 'non_text_content' | 'empty_text' | 'below_min_chars';

export type PageOutcome =
  | { kind: 'skipped'; reason: SkipReason }
  | { kind: 'failed'; reason: FetchFailureReason | 'processing_error'; status?: number }
  | { kind: 'fetched' };

export type ChunkDecision = 'written' | 'deduped';

export function robotsOutcome(allowed: boolean): PageOutcome | null {
  return allowed ? null : { kind: 'skipped', reason: 'robots_denied' };
}

/**
 * Outcome of a fetch that produced no body to process
 */
export function fetchOutcome(result: FetchFailure | FetchRejected): PageOutcome {
  switch (result.kind) {
    case 'rejected':
      return { kind: 'skipped', reason: 'non_text_content' };
    case 'failure':
      return { kind: 'failed', reason: result.reason, status: result.status };
  }
}

/**
 * Outcome of cleaning: pages with no text, or fewer than `minChars` code
 * points when `minChars` > 0, are skipped.
 */
export function contentOutcome(text: string, minChars: number): PageOutcome {
  if (!text) {
    return { kind: 'skipped', reason: 'empty_text' };
  }
  if (minChars > 0 && countChars(text) < minChars) {
    return { kind: 'skipped', reason: 'below_min_chars' };
  }
  return { kind: 'fetched' };
}

export function buildPageRecord(sequenceId: number, url: string, title: string, text: string): PageRecord {
  return { sequenceId, url, title, text, charCount: countChars(text) };
}

/**
 * Chunk records for a page, in increasing chunk index
 */
export function buildChunkRecords(page: PageRecord, chunks: string[], hasher: ContentHasher): ChunkRecord[] {
  return chunks.map((contents, chunkIndex) => ({
    id: chunkId(page.sequenceId, chunkIndex, chunks.length),
    url: page.url,
    title: page.title,
    chunkIndex,
    chunkCount: chunks.length,
    contents,
    contentHash: hasher.hash(page.url, contents),
  }));
}

export function applyPageOutcome(outcome: PageOutcome, stats: CrawlingStatisticsTracker): void {
  switch (outcome.kind) {
    case 'skipped':
      stats.recordSkipped();
      break;
    case 'failed':
      stats.recordFailed();
      break;
    case 'fetched':
      stats.recordFetched();
      break;
  }
}

export function applyChunkDecision(decision: ChunkDecision, stats: CrawlingStatisticsTracker): void {
  if (decision === 'written') {
    stats.recordChunkWritten();
  } else {
    stats.recordChunkDeduped();
  }
}

export function describeOutcome(outcome: PageOutcome): string {
  switch (outcome.kind) {
    case 'skipped':
      return `skipped (${outcome.reason})`;
    case 'failed':
      return outcome.status !== undefined ? `failed (${outcome.reason} ${outcome.status})` : `failed (${outcome.reason})`;
    case 'fetched':
      return 'fetched';
  }
}
