/**
 * Crawling Statistics Tests
 */

import { CrawlingStatisticsTracker, fromStatsSnapshot, toStatsSnapshot } from '../crawling-statistics';

describe('CrawlingStatisticsTracker', () => {
  it('should start at zero', () => {
    expect(new CrawlingStatisticsTracker().getStatistics()).toEqual({
      pagesFetched: 0,
      pagesSkipped: 0,
      pagesFailed: 0,
      chunksWritten: 0,
      chunksDeduped: 0,
      queuePeek: 0,
    });
  });

  it('should continue from restored counters', () => {
    const tracker = new CrawlingStatisticsTracker({ pagesFetched: 4, chunksWritten: 7, queuePeek: 12 });
    tracker.recordFetched();
    tracker.recordChunkWritten();
    tracker.observeQueueSize(3);

    expect(tracker.getStatistics()).toEqual({
      pagesFetched: 5,
      pagesSkipped: 0,
      pagesFailed: 0,
      chunksWritten: 8,
      chunksDeduped: 0,
      queuePeek: 12,
    });
  });

  it('should keep the highest queue size seen', () => {
    const tracker = new CrawlingStatisticsTracker();
    [2, 5, 1, 4].forEach((size) => tracker.observeQueueSize(size));

    expect(tracker.getStatistics().queuePeek).toBe(5);
  });
});

describe('stats snapshot conversion', () => {
  it('should use snake_case keys on disk', () => {
    const tracker = new CrawlingStatisticsTracker();
    tracker.recordFetched();
    tracker.recordSkipped();
    tracker.recordFailed();
    tracker.recordChunkDeduped();

    expect(toStatsSnapshot(tracker.getStatistics())).toEqual({
      pages_fetched: 1,
      pages_skipped: 1,
      pages_failed: 1,
      chunks_written: 0,
      chunks_deduped: 1,
      queue_peek: 0,
    });
  });

  it('should read malformed or missing counters as zero', () => {
    expect(fromStatsSnapshot({ pages_fetched: 3, chunks_written: 'x', queue_peek: -1 })).toEqual({
      pagesFetched: 3,
      pagesSkipped: 0,
      pagesFailed: 0,
      chunksWritten: 0,
      chunksDeduped: 0,
      queuePeek: 0,
    });
    expect(fromStatsSnapshot(null).pagesFetched).toBe(0);
  });
});
