/**
 * Crawl Stage Tests
 */

import { CrawlingStatisticsTracker } from '../../crawling/crawling-statistics';
import { ContentHasher } from '../../dedup/content-hasher';
import { FetchFailureReason } from '../../fetching/fetch-errors';
import {
  applyChunkDecision,
  applyPageOutcome,
  buildChunkRecords,
  buildPageRecord,
  contentOutcome,
  describeOutcome,
  fetchOutcome,
  robotsOutcome,
} from '../crawl-stages';

const URL_A = 'https://docs.example.test/guide/install';

describe('page outcomes', () => {
  it('should skip pages denied by robots', () => {
    expect(robotsOutcome(true)).toBeNull();
    expect(robotsOutcome(false)).toEqual({ kind: 'skipped', reason: 'robots_denied' });
  });

  it('should map fetch results to skips and failures', () => {
    expect(
      fetchOutcome({ kind: 'rejected', url: URL_A, reason: 'non_text_content', status: 200, contentType: 'image/png' })
    ).toEqual({ kind: 'skipped', reason: 'non_text_content' });

    expect(
      fetchOutcome({
        kind: 'failure',
        url: URL_A,
        reason: FetchFailureReason.CLIENT_ERROR,
        status: 404,
        message: 'Page not found',
        retryable: false,
        attempts: 1,
      })
    ).toEqual({ kind: 'failed', reason: FetchFailureReason.CLIENT_ERROR, status: 404 });
  });

  it('should skip empty or short text', () => {
    expect(contentOutcome('', 0)).toEqual({ kind: 'skipped', reason: 'empty_text' });
    expect(contentOutcome('abcd', 5)).toEqual({ kind: 'skipped', reason: 'below_min_chars' });
    expect(contentOutcome('abcde', 5)).toEqual({ kind: 'fetched' });
    expect(contentOutcome('a', 0)).toEqual({ kind: 'fetched' });
  });

  it('should count characters as code points for minChars', () => {
    expect(contentOutcome('\u{1F600}\u{1F600}', 3)).toEqual({ kind: 'skipped', reason: 'below_min_chars' });
    expect(contentOutcome('\u{1F600}\u{1F600}', 2)).toEqual({ kind: 'fetched' });
  });

  it('should describe outcomes for the page log line', () => {
    expect(describeOutcome({ kind: 'skipped', reason: 'below_min_chars' })).toBe('skipped (below_min_chars)');
    expect(describeOutcome({ kind: 'failed', reason: FetchFailureReason.SERVER_ERROR, status: 503 })).toBe(
      'failed (server_error 503)'
    );
    expect(describeOutcome({ kind: 'failed', reason: 'processing_error' })).toBe('failed (processing_error)');
    expect(describeOutcome({ kind: 'fetched' })).toBe('fetched');
  });
});

describe('records', () => {
  const hasher = new ContentHasher('content');

  it('should build a page record with its character count', () => {
    expect(buildPageRecord(4, URL_A, 'Install', 'Run it.')).toEqual({
      sequenceId: 4,
      url: URL_A,
      title: 'Install',
      text: 'Run it.',
      charCount: 7,
    });
  });

  it('should give a single chunk the page id', () => {
    const page = buildPageRecord(3, URL_A, 'Install', 'Run it.');
    const [record] = buildChunkRecords(page, ['Run it.'], hasher);

    expect(record).toEqual({
      id: 'page-3',
      url: URL_A,
      title: 'Install',
      chunkIndex: 0,
      chunkCount: 1,
      contents: 'Run it.',
      contentHash: hasher.hash(URL_A, 'Run it.'),
    });
  });

  it('should suffix chunk ids when a page splits', () => {
    const page = buildPageRecord(3, URL_A, 'Install', 'abcdef');
    const records = buildChunkRecords(page, ['abcd', 'cdef'], hasher);

    expect(records.map((record) => record.id)).toEqual(['page-3-c0', 'page-3-c1']);
    expect(records.map((record) => record.chunkCount)).toEqual([2, 2]);
  });

  it('should key hashes by URL only in url+content mode', () => {
    const page = buildPageRecord(0, URL_A, 'Install', 'Same');
    const other = buildPageRecord(1, 'https://docs.example.test/guide/usage', 'Usage', 'Same');
    const keyed = new ContentHasher('url+content');

    expect(buildChunkRecords(page, ['Same'], hasher)[0].contentHash).toBe(
      buildChunkRecords(other, ['Same'], hasher)[0].contentHash
    );
    expect(buildChunkRecords(page, ['Same'], keyed)[0].contentHash).not.toBe(
      buildChunkRecords(other, ['Same'], keyed)[0].contentHash
    );
  });
});

describe('counters', () => {
  it('should count each page outcome once and each chunk decision once', () => {
    const stats = new CrawlingStatisticsTracker();

    applyPageOutcome({ kind: 'fetched' }, stats);
    applyPageOutcome({ kind: 'skipped', reason: 'empty_text' }, stats);
    applyPageOutcome({ kind: 'failed', reason: 'processing_error' }, stats);
    applyChunkDecision('written', stats);
    applyChunkDecision('written', stats);
    applyChunkDecision('deduped', stats);

    expect(stats.getStatistics()).toEqual({
      pagesFetched: 1,
      pagesSkipped: 1,
      pagesFailed: 1,
      chunksWritten: 2,
      chunksDeduped: 1,
      queuePeek: 0,
    });
  });
});
