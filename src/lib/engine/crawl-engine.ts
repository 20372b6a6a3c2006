/**
 * Crawl Engine
 * Pops URLs from the frontier and drives each page through robots, fetch,
 * cleaning, chunking, dedup and output
 */

import { CrawlingStatisticsTracker } from '../crawling/crawling-statistics';
import { CrawlStatistics, PendingUrl } from '../crawling/crawling.types';
import { Frontier } from '../crawling/frontier';
import { RobotsGate } from '../crawling/robots-gate';
import { defaultSitemapUrls, discoverSitemapUrls } from '../crawling/sitemap';
import { normalizeUrl } from '../crawling/url-normalizer';
import { CorpusWriteError, describeError } from '../corpus/corpus-errors';
import { emptyResumeState, loadResumeState } from '../corpus/corpus-state';
import { CorpusWriter } from '../corpus/corpus-writer';
import { PageArtifacts, PageRecord } from '../corpus/corpus.types';
import { ContentDeduplicator } from '../dedup/content-deduplicator';
import { ContentHasher } from '../dedup/content-hasher';
import { Fetcher } from '../fetching/fetcher';
import { PolitenessGate } from '../fetching/politeness';
import { CrawlLogger, silentLogger } from '../logging/logger';
import { Chunker } from '../processing/chunker';
import { HtmlCleaner } from '../processing/html-cleaner';
import {
  applyChunkDecision,
  applyPageOutcome,
  buildChunkRecords,
  buildPageRecord,
  contentOutcome,
  describeOutcome,
  fetchOutcome,
  PageOutcome,
  robotsOutcome,
} from './crawl-stages';
import { CrawlEngineConfig, CrawlEngineDeps, CrawlSummary, EngineState, StopReason } from './engine.types';

export class CrawlEngine {
  private state: EngineState = EngineState.IDLE;
  private readonly logger: CrawlLogger;
  private readonly frontier: Frontier;
  private readonly fetcher: Fetcher;
  private readonly robots: RobotsGate;
  private readonly cleaner = new HtmlCleaner();
  private readonly chunker: Chunker;
  private readonly hasher: ContentHasher;
  private readonly dedup = new ContentDeduplicator();
  private readonly writer: CorpusWriter;
  private stats = new CrawlingStatisticsTracker();

  private nextSequenceId = 0;
  private pagesPopped = 0;
  private pagesCompleted = 0;
  private inFlight = 0;
  private stopRequested = false;
  private waiters: Array<() => void> = [];
  private discoveries: PendingUrl[] = [];

  constructor(
    private readonly config: CrawlEngineConfig,
    deps: CrawlEngineDeps = {}
  ) {
    this.logger = deps.logger ?? silentLogger;

    this.frontier = new Frontier(
      {
        baseUrl: config.baseUrl,
        allowedHosts: config.allowedHosts,
        includePatterns: config.includePatterns,
        excludePatterns: config.excludePatterns,
        maxPages: config.maxPages,
        maxDepth: config.maxDepth,
        maxPending: config.maxPending,
      },
      {
        onQueueSize: (size) => this.stats.observeQueueSize(size),
        onAdmit: (entry) => this.discoveries.push(entry),
      }
    );

    const gate = new PolitenessGate(config.delayMs, deps.clock, deps.sleep);
    this.fetcher = new Fetcher(
      {
        userAgent: config.userAgent,
        timeoutMs: config.timeoutMs,
        delayMs: config.delayMs,
        maxRetries: config.maxRetries,
        retryBackoffMs: config.retryBackoffMs,
      },
      { fetchImpl: deps.fetchImpl, gate, sleep: deps.sleep, logger: this.logger }
    );

    this.robots = new RobotsGate(
      { respectRobots: config.respectRobots, userAgent: config.userAgent },
      (url) => this.fetcher.fetchText(url),
      this.logger
    );

    this.chunker = new Chunker({ size: config.chunkSize, overlap: config.chunkOverlap });
    this.hasher = new ContentHasher(config.dedupKeyMode);
    this.writer = new CorpusWriter(
      {
        outDir: config.outDir,
        formats: config.outputFormats,
        resume: config.resume,
        saveHtml: config.saveHtml,
        saveText: config.saveText,
        dedupKeyMode: config.dedupKeyMode,
      },
      this.logger
    );
  }

  getState(): EngineState {
    return this.state;
  }

  getStatistics(): CrawlStatistics {
    return this.stats.getStatistics();
  }

  /**
   * Request a graceful stop: no new pages are popped, in-flight pages finish
   */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.logger.info('[STOP] stop requested, finishing in-flight pages');
    this.notifyProgress();
  }

  /**
   * Crawl until the frontier is empty, the page cap is reached or stop() is
   * called. Rejects with CorpusWriteError when output cannot be written.
   */
  async run(): Promise<CrawlSummary> {
    if (this.state !== EngineState.IDLE) {
      throw new Error(`CrawlEngine.run() called in state ${this.state}`);
    }
    this.state = EngineState.RUNNING;

    try {
      await this.prepare();

      const workers = Math.max(1, Math.floor(this.config.concurrency));
      const results = await Promise.allSettled(Array.from({ length: workers }, () => this.worker()));
      const rejected = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (rejected) {
        throw rejected.reason;
      }
    } catch (error) {
      await this.abort(error);
      throw error;
    }

    const stopReason = this.stopReason();
    this.state = stopReason === 'exhausted' ? EngineState.EXHAUSTED : EngineState.DRAINING;

    const stats = this.stats.getStatistics();
    await this.writer.finalize(stats, this.frontier.snapshot());
    this.state = EngineState.FINALIZED;

    const summary: CrawlSummary = {
      state: this.state,
      stopReason,
      stats,
      pagesPopped: this.pagesPopped,
      pending: this.frontier.size(),
      elapsedMs: this.stats.elapsedMs(),
    };

    this.logger.info(
      `[DONE] ${stopReason} pages=${stats.pagesFetched} skipped=${stats.pagesSkipped} ` +
        `failed=${stats.pagesFailed} chunks=${stats.chunksWritten} deduped=${stats.chunksDeduped} ` +
        `queue_peek=${stats.queuePeek} elapsed=${(summary.elapsedMs / 1000).toFixed(1)}s out=${this.config.outDir}`
    );
    return summary;
  }

  private async prepare(): Promise<void> {
    await this.writer.open();

    const resumed = this.config.resume ? await loadResumeState(this.config.outDir, this.logger) : emptyResumeState();
    this.stats = new CrawlingStatisticsTracker(resumed.stats ?? undefined);
    this.dedup.restore(resumed.hashes);
    this.frontier.restore(resumed.visited, resumed.frontier ?? undefined);
    this.nextSequenceId = resumed.nextSequenceId;

    if (this.config.resume) {
      this.logger.info(
        `[RESUME] visited=${this.frontier.visitedCount()} hashes=${this.dedup.size()} ` +
          `pending=${this.frontier.size()} next_id=${this.nextSequenceId}`
      );
    }

    const baseUrl = this.frontier.getBaseUrl();
    this.frontier.seed([baseUrl]);

    if (this.config.useSitemap) {
      const sitemaps = this.config.sitemapUrls.length > 0 ? this.config.sitemapUrls : defaultSitemapUrls(baseUrl);
      const urls = await discoverSitemapUrls(sitemaps, (url) => this.fetcher.fetchText(url), this.logger);
      const added = this.frontier.seed(urls);
      this.logger.info(`[SITEMAP] seeded ${added} of ${urls.length} URLs`);
    }
    await this.flushDiscoveries();

    this.logger.info(
      `[START] ${baseUrl} -> ${this.config.outDir} (pending=${this.frontier.size()}, max_pages=${this.config.maxPages})`
    );
  }

  private async worker(): Promise<void> {
    while (!this.stopRequested) {
      const entry = this.frontier.pop();
      if (!entry) {
        // Pages still in flight may enqueue more links
        if (this.inFlight === 0 || this.frontier.isCapped()) {
          return;
        }
        await this.waitForProgress();
        continue;
      }

      const sequenceId = this.nextSequenceId++;
      this.pagesPopped++;
      this.inFlight++;
      try {
        await this.writer.recordVisit(entry.url);
        await this.processPage(entry, sequenceId);
        this.pagesCompleted++;
        await this.writer.persistStats(this.stats.getStatistics());
        if (this.config.heartbeatEvery > 0 && this.pagesCompleted % this.config.heartbeatEvery === 0) {
          await this.heartbeat();
        }
      } catch (error) {
        this.stopRequested = true;
        throw error;
      } finally {
        this.inFlight--;
        this.notifyProgress();
      }
    }
  }

  private async processPage(entry: PendingUrl, sequenceId: number): Promise<void> {
    let outcome: PageOutcome;
    try {
      outcome = await this.crawlPage(entry, sequenceId);
    } catch (error) {
      if (error instanceof CorpusWriteError) {
        throw error;
      }
      this.logger.error(`[PAGE ERROR] ${entry.url}: ${describeError(error)}`);
      outcome = { kind: 'failed', reason: 'processing_error' };
    }

    if (outcome.kind !== 'fetched') {
      applyPageOutcome(outcome, this.stats);
      this.logger.info(`[${sequenceId}] ${entry.url} ${describeOutcome(outcome)}`);
    }
  }

  /**
   * Run one page through every stage. Page-level counters for skips and
   * failures are applied by the caller; fetched pages and their chunks are
   * counted here as they are decided.
   */
  private async crawlPage(entry: PendingUrl, sequenceId: number): Promise<PageOutcome> {
    const denied = robotsOutcome(await this.robots.isAllowed(entry.url));
    if (denied) {
      return denied;
    }

    const crawlDelay = await this.robots.crawlDelayMs(entry.url);
    if (crawlDelay !== null) {
      this.fetcher.getGate().raiseDelay(crawlDelay);
    }

    const result = await this.fetcher.fetch(entry.url);
    if (result.kind !== 'success') {
      return fetchOutcome(result);
    }

    const finalUrl = normalizeUrl(result.finalUrl);
    if (finalUrl && finalUrl !== entry.url) {
      this.frontier.markVisited(finalUrl);
    }

    const cleaned = this.cleaner.clean(result.body, result.contentType);
    const outcome = contentOutcome(cleaned.text, this.config.minChars);

    if (outcome.kind === 'fetched') {
      applyPageOutcome(outcome, this.stats);
      const page = buildPageRecord(sequenceId, entry.url, cleaned.title, cleaned.text);
      const artifacts = await this.writer.saveArtifacts(page, result.body);
      const written = await this.writeChunks(page, artifacts);
      this.logger.info(
        `[${sequenceId}] ${entry.url} chars=${page.charCount} chunks=${written.total} ` +
          `written=${written.written} deduped=${written.total - written.written}`
      );
    }

    this.offerLinks(cleaned.links, entry.depth, result.finalUrl || entry.url);
    await this.flushDiscoveries();
    return outcome;
  }

  private async writeChunks(page: PageRecord, artifacts: PageArtifacts): Promise<{ total: number; written: number }> {
    const records = buildChunkRecords(page, this.chunker.chunk(page.text), this.hasher);
    let written = 0;

    for (const record of records) {
      if (this.dedup.shouldWrite(record.contentHash)) {
        await this.writer.writeChunk(record, page, artifacts);
        applyChunkDecision('written', this.stats);
        written++;
      } else {
        applyChunkDecision('deduped', this.stats);
      }
    }

    return { total: records.length, written };
  }

  private offerLinks(links: string[], depth: number, referrer: string): void {
    let admitted = 0;
    for (const href of links) {
      if (this.frontier.offer(href, depth, referrer)) {
        admitted++;
      }
    }
    if (links.length > 0) {
      this.logger.debug(`[LINKS] ${referrer}: ${admitted}/${links.length} admitted`);
    }
  }

  private async flushDiscoveries(): Promise<void> {
    const entries = this.discoveries;
    this.discoveries = [];
    await this.writer.recordDiscovered(entries);
  }

  private async heartbeat(): Promise<void> {
    const stats = this.stats.getStatistics();
    const elapsed = (this.stats.elapsedMs() / 1000).toFixed(1);
    this.logger.info(
      `[HEARTBEAT] pages=${stats.pagesFetched} failed=${stats.pagesFailed} chunks=${stats.chunksWritten} ` +
        `deduped=${stats.chunksDeduped} queue~${this.frontier.size()} elapsed=${elapsed}s`
    );
    await this.writer.persistStats(stats);
    await this.writer.persistFrontier(this.frontier.snapshot());
  }

  private stopReason(): StopReason {
    if (this.frontier.isCapped()) {
      return 'max_pages';
    }
    if (this.stopRequested && this.frontier.size() > 0) {
      return 'stopped';
    }
    return 'exhausted';
  }

  /**
   * Close output after a fatal error; the original error is rethrown by run()
   */
  private async abort(error: unknown): Promise<void> {
    this.stopRequested = true;
    this.state = EngineState.FINALIZED;
    this.logger.error(`[FATAL] ${describeError(error)}`);
    try {
      await this.writer.close();
    } catch (closeError) {
      this.logger.error(`[FATAL] closing output failed: ${describeError(closeError)}`);
    }
  }

  private waitForProgress(): Promise<void> {
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private notifyProgress(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve());
  }
}

export function createCrawlEngine(config: CrawlEngineConfig, deps: CrawlEngineDeps = {}): CrawlEngine {
  return new CrawlEngine(config, deps);
}
