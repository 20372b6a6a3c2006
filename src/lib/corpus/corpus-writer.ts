/**
 * Corpus Writer
 * Append-only JSONL output, visit and hash logs, and atomic stats/frontier snapshots
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { toStatsSnapshot } from '../crawling/crawling-statistics';
import { CrawlStatistics, FrontierSnapshot, PendingUrl } from '../crawling/crawling.types';
import { isDedupKeyMode } from '../dedup/content-hasher';
import { CrawlLogger, silentLogger } from '../logging/logger';
import { CorpusStateError, CorpusWriteError, describeError, isNotFoundError } from './corpus-errors';
import { readJsonFile, repairTrailingLine, urlToRelativePath, writeFileAtomic } from './corpus-files';
import {
  ChunkRecord,
  CORPUS_FILES,
  CorpusMeta,
  CorpusWriterConfig,
  FullCorpusLine,
  ManifestLine,
  MinCorpusLine,
  PageArtifacts,
  PageRecord,
  pageId,
} from './corpus.types';

type AppendTarget = 'min' | 'full' | 'manifest' | 'hashes' | 'visited' | 'discovered';

const APPEND_TARGETS: AppendTarget[] = ['min', 'full', 'manifest', 'hashes', 'visited', 'discovered'];

export class CorpusWriter {
  private handles = new Map<AppendTarget, fs.FileHandle>();
  private tail: Promise<void> = Promise.resolve();
  private manifestPages = new Set<string>();
  private opened = false;
  private chunksWritten = 0;

  constructor(
    private readonly config: CorpusWriterConfig,
    private readonly logger: CrawlLogger = silentLogger
  ) {}

  isOpen(): boolean {
    return this.opened;
  }

  /**
   * Chunks appended by this writer instance
   */
  getChunksWritten(): number {
    return this.chunksWritten;
  }

  async open(): Promise<void> {
    if (this.opened) return;
    const { outDir, resume } = this.config;

    await this.guard(outDir, 'create output directory', () => fs.mkdir(outDir, { recursive: true }));
    if (resume) {
      await this.checkDedupMode();
    }

    for (const target of APPEND_TARGETS) {
      if (!this.isEnabled(target)) continue;
      const filePath = this.filePath(target);

      if (resume) {
        const removed = await this.guard(filePath, 'repair', () => repairTrailingLine(filePath));
        if (removed > 0) {
          this.logger.warn(`[RESUME] dropped ${removed} byte(s) of torn trailing line in ${CORPUS_FILES[target]}`);
        }
      }

      const handle = await this.guard(filePath, 'open', () => fs.open(filePath, resume ? 'a' : 'w'));
      this.handles.set(target, handle);
    }

    if (!resume) {
      for (const snapshot of [CORPUS_FILES.stats, CORPUS_FILES.frontier]) {
        const filePath = path.join(outDir, snapshot);
        await this.guard(filePath, 'remove stale snapshot', async () => {
          try {
            await fs.unlink(filePath);
          } catch (error) {
            if (!isNotFoundError(error)) throw error;
          }
        });
      }

      const artifactDirs = [
        { dir: CORPUS_FILES.htmlDir, enabled: this.config.saveHtml },
        { dir: CORPUS_FILES.textDir, enabled: this.config.saveText },
      ];
      for (const { dir, enabled } of artifactDirs) {
        if (!enabled) continue;
        const dirPath = path.join(outDir, dir);
        await this.guard(dirPath, 'clear', () => fs.rm(dirPath, { recursive: true, force: true }));
      }
    }

    const metaPath = path.join(outDir, CORPUS_FILES.meta);
    const meta: CorpusMeta = { dedup_key_mode: this.config.dedupKeyMode };
    await this.guard(metaPath, 'write', () => writeFileAtomic(metaPath, `${JSON.stringify(meta)}\n`));

    this.opened = true;
  }

  /**
   * Append a popped URL to the visit log
   */
  recordVisit(url: string): Promise<void> {
    return this.enqueue(() => this.append('visited', `${url}\n`));
  }

  /**
   * Append URLs admitted to the frontier; resume rebuilds the pending queue from them
   */
  recordDiscovered(entries: PendingUrl[]): Promise<void> {
    if (entries.length === 0) {
      return Promise.resolve();
    }
    const lines = entries.map((entry) => `${JSON.stringify({ url: entry.url, depth: entry.depth })}\n`).join('');
    return this.enqueue(() => this.append('discovered', lines));
  }

  /**
   * Append one chunk in every enabled format, then its hash, and the page's
   * manifest row the first time that page contributes a chunk.
   */
  writeChunk(record: ChunkRecord, page: PageRecord, artifacts?: PageArtifacts): Promise<void> {
    return this.enqueue(async () => {
      if (this.isEnabled('min')) {
        const line: MinCorpusLine = { id: record.id, contents: record.contents };
        await this.append('min', `${JSON.stringify(line)}\n`);
      }

      if (this.isEnabled('full')) {
        const line: FullCorpusLine = {
          id: record.id,
          url: record.url,
          title: record.title,
          chunk_index: record.chunkIndex,
          chunk_count: record.chunkCount,
          contents: record.contents,
          hash: record.contentHash,
        };
        await this.append('full', `${JSON.stringify(line)}\n`);
      }

      await this.append('hashes', `${record.contentHash}\n`);
      this.chunksWritten++;

      const id = pageId(page.sequenceId);
      if (!this.manifestPages.has(id)) {
        this.manifestPages.add(id);
        const row: ManifestLine = {
          id,
          url: page.url,
          title: page.title,
          char_count: page.charCount,
          html_path: artifacts?.htmlPath ?? '',
          text_path: artifacts?.textPath ?? '',
        };
        await this.append('manifest', `${JSON.stringify(row)}\n`);
      }
    });
  }

  /**
   * Save audit copies of a page. Failures are logged, never fatal.
   */
  async saveArtifacts(page: PageRecord, html: string): Promise<PageArtifacts> {
    const artifacts: PageArtifacts = { htmlPath: '', textPath: '' };
    if (!this.config.saveHtml && !this.config.saveText) {
      return artifacts;
    }

    let relative: string;
    try {
      relative = urlToRelativePath(page.url);
    } catch (error) {
      this.logger.warn(`[ARTIFACT] cannot map ${page.url} to a path: ${describeError(error)}`);
      return artifacts;
    }

    if (this.config.saveHtml) {
      const rel = path.join(CORPUS_FILES.htmlDir, relative);
      if (await this.saveFile(rel, html)) {
        artifacts.htmlPath = rel;
      }
    }

    if (this.config.saveText) {
      const rel = path.join(CORPUS_FILES.textDir, relative.replace(/\.[^./\\]*$/, '') + '.txt');
      if (await this.saveFile(rel, page.text)) {
        artifacts.textPath = rel;
      }
    }

    return artifacts;
  }

  persistStats(stats: CrawlStatistics): Promise<void> {
    const filePath = path.join(this.config.outDir, CORPUS_FILES.stats);
    const content = `${JSON.stringify(toStatsSnapshot(stats), null, 2)}\n`;
    return this.enqueue(() => this.guard(filePath, 'write', () => writeFileAtomic(filePath, content)));
  }

  persistFrontier(snapshot: FrontierSnapshot): Promise<void> {
    const filePath = path.join(this.config.outDir, CORPUS_FILES.frontier);
    const content = `${JSON.stringify(snapshot)}\n`;
    return this.enqueue(() => this.guard(filePath, 'write', () => writeFileAtomic(filePath, content)));
  }

  /**
   * Persist the final snapshots and close every file
   */
  async finalize(stats: CrawlStatistics, frontier: FrontierSnapshot): Promise<void> {
    await this.persistStats(stats);
    await this.persistFrontier(frontier);
    await this.close();
  }

  async close(): Promise<void> {
    await this.tail;
    const handles = [...this.handles.entries()];
    this.handles.clear();
    this.opened = false;

    let failure: CorpusWriteError | null = null;
    for (const [target, handle] of handles) {
      try {
        await handle.close();
      } catch (error) {
        failure ??= new CorpusWriteError(
          `Failed to close ${CORPUS_FILES[target]}: ${describeError(error)}`,
          this.filePath(target),
          error
        );
      }
    }
    if (failure) throw failure;
  }

  /**
   * Refuse to resume a corpus built with another dedup key mode
   */
  private async checkDedupMode(): Promise<void> {
    const metaPath = path.join(this.config.outDir, CORPUS_FILES.meta);
    let meta: unknown;
    try {
      meta = await readJsonFile(metaPath);
    } catch (error) {
      this.logger.warn(`[RESUME] ignoring unreadable ${CORPUS_FILES.meta}: ${describeError(error)}`);
      return;
    }

    if (typeof meta !== 'object' || meta === null || !('dedup_key_mode' in meta)) {
      return;
    }
    const recorded = meta.dedup_key_mode;
    if (typeof recorded === 'string' && isDedupKeyMode(recorded) && recorded !== this.config.dedupKeyMode) {
      throw new CorpusStateError(
        `Cannot resume ${this.config.outDir}: it was built with dedup key mode "${recorded}", not "${this.config.dedupKeyMode}"`,
        metaPath
      );
    }
  }

  private isEnabled(target: AppendTarget): boolean {
    if (target === 'min' || target === 'full') {
      return this.config.formats.includes(target);
    }
    return true;
  }

  private filePath(target: AppendTarget): string {
    return path.join(this.config.outDir, CORPUS_FILES[target]);
  }

  /**
   * Run writes one after another. A failed write rejects its own caller
   * without blocking later writes.
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async append(target: AppendTarget, data: string): Promise<void> {
    const handle = this.handles.get(target);
    const filePath = this.filePath(target);
    if (!handle) {
      throw new CorpusWriteError(`${CORPUS_FILES[target]} is not open`, filePath);
    }
    await this.guard(filePath, 'append to', () => handle.appendFile(data, 'utf8'));
  }

  private async saveFile(relativePath: string, content: string): Promise<boolean> {
    const fullPath = path.join(this.config.outDir, relativePath);
    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content, 'utf8');
      return true;
    } catch (error) {
      this.logger.warn(`[ARTIFACT] failed to save ${relativePath}: ${describeError(error)}`);
      return false;
    }
  }

  private async guard<T>(filePath: string, action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CorpusWriteError) throw error;
      throw new CorpusWriteError(`Failed to ${action} ${filePath}: ${describeError(error)}`, filePath, error);
    }
  }
}
