/**
 * Corpus Resume State
 * Rebuilds visited URLs, written hashes, counters and the pending queue from a previous run's output
 */

import * as path from 'path';
import { fromStatsSnapshot } from '../crawling/crawling-statistics';
import { CrawlStatistics, FrontierSnapshot, PendingUrl } from '../crawling/crawling.types';
import { CrawlLogger, silentLogger } from '../logging/logger';
import { forEachLine, readJsonFile } from './corpus-files';
import { CORPUS_FILES, parsePageSequence } from './corpus.types';

export interface ResumeState {
  visited: Set<string>;
  hashes: Set<string>;
  nextSequenceId: number;
  stats: CrawlStatistics | null;
  frontier: FrontierSnapshot | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonLine(line: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(line);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function toPendingUrl(value: unknown): PendingUrl | null {
  if (!isRecord(value)) return null;
  const { url, depth } = value;
  if (typeof url !== 'string' || typeof depth !== 'number' || !Number.isInteger(depth) || depth < 0) {
    return null;
  }
  return { url, depth };
}

export function parseFrontierSnapshot(value: unknown): FrontierSnapshot | null {
  if (!isRecord(value) || !Array.isArray(value.pending)) {
    return null;
  }
  const pending: PendingUrl[] = [];
  for (const entry of value.pending) {
    const parsed = toPendingUrl(entry);
    if (parsed) pending.push(parsed);
  }
  return { pending };
}

/**
 * Pending URLs are everything ever admitted minus everything visited, in
 * admission order. Snapshot entries missing from the discovered log follow.
 */
function mergePending(
  discovered: PendingUrl[],
  snapshot: FrontierSnapshot | null,
  visited: Set<string>
): FrontierSnapshot | null {
  const seen = new Set<string>();
  const pending: PendingUrl[] = [];
  for (const entry of [...discovered, ...(snapshot?.pending ?? [])]) {
    if (seen.has(entry.url) || visited.has(entry.url)) continue;
    seen.add(entry.url);
    pending.push(entry);
  }
  if (pending.length === 0 && snapshot === null && discovered.length === 0) {
    return null;
  }
  return { pending };
}

/**
 * Counters can lag the output after a crash: every manifest row is a fetched
 * page and every hash a written chunk.
 */
function reconcileStats(
  stats: CrawlStatistics | null,
  pagesWithChunks: number,
  hashCount: number,
  logger: CrawlLogger
): CrawlStatistics | null {
  if (pagesWithChunks === 0 && hashCount === 0) {
    return stats;
  }
  const base = stats ?? fromStatsSnapshot({});
  const reconciled: CrawlStatistics = {
    ...base,
    pagesFetched: Math.max(base.pagesFetched, pagesWithChunks),
    chunksWritten: Math.max(base.chunksWritten, hashCount),
  };
  if (stats && (reconciled.pagesFetched !== stats.pagesFetched || reconciled.chunksWritten !== stats.chunksWritten)) {
    logger.warn(
      `[RESUME] ${CORPUS_FILES.stats} lagged the output, raised pages_fetched to ${reconciled.pagesFetched} ` +
        `and chunks_written to ${reconciled.chunksWritten}`
    );
  }
  return reconciled;
}

export function emptyResumeState(): ResumeState {
  return {
    visited: new Set(),
    hashes: new Set(),
    nextSequenceId: 0,
    stats: null,
    frontier: null,
  };
}

/**
 * Load everything a resumed run needs from `outDir`. Torn or unparsable
 * lines are skipped and reported.
 */
export async function loadResumeState(outDir: string, logger: CrawlLogger = silentLogger): Promise<ResumeState> {
  const state = emptyResumeState();
  let visitedLines = 0;
  let maxSequence = -1;
  let badLines = 0;
  const manifestIds = new Set<string>();
  const discovered: PendingUrl[] = [];

  const noteSequence = (id: unknown): void => {
    if (typeof id !== 'string') return;
    const sequence = parsePageSequence(id);
    if (sequence !== null && sequence > maxSequence) {
      maxSequence = sequence;
    }
  };

  await forEachLine(path.join(outDir, CORPUS_FILES.visited), (line) => {
    const url = line.trim();
    if (!url) return;
    visitedLines++;
    state.visited.add(url);
  });

  await forEachLine(path.join(outDir, CORPUS_FILES.manifest), (line) => {
    if (!line.trim()) return;
    const row = parseJsonLine(line);
    if (!row) {
      badLines++;
      return;
    }
    if (typeof row.url === 'string') {
      state.visited.add(row.url);
    }
    if (typeof row.id === 'string') {
      manifestIds.add(row.id);
    }
    noteSequence(row.id);
  });

  await forEachLine(path.join(outDir, CORPUS_FILES.hashes), (line) => {
    const digest = line.trim();
    if (/^[0-9a-f]{64}$/.test(digest)) {
      state.hashes.add(digest);
    }
  });

  await forEachLine(path.join(outDir, CORPUS_FILES.full), (line) => {
    if (!line.trim()) return;
    const row = parseJsonLine(line);
    if (!row) {
      badLines++;
      return;
    }
    if (typeof row.hash === 'string') {
      state.hashes.add(row.hash);
    }
    noteSequence(row.id);
  });

  await forEachLine(path.join(outDir, CORPUS_FILES.min), (line) => {
    if (!line.trim()) return;
    const row = parseJsonLine(line);
    if (!row) {
      badLines++;
      return;
    }
    noteSequence(row.id);
  });

  await forEachLine(path.join(outDir, CORPUS_FILES.discovered), (line) => {
    if (!line.trim()) return;
    const entry = toPendingUrl(parseJsonLine(line));
    if (!entry) {
      badLines++;
      return;
    }
    discovered.push(entry);
  });

  state.nextSequenceId = Math.max(visitedLines, maxSequence + 1);

  try {
    const stats = await readJsonFile(path.join(outDir, CORPUS_FILES.stats));
    state.stats = stats === null ? null : fromStatsSnapshot(stats);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`[RESUME] ignoring unreadable ${CORPUS_FILES.stats}: ${message}`);
  }

  try {
    const frontier = await readJsonFile(path.join(outDir, CORPUS_FILES.frontier));
    state.frontier = frontier === null ? null : parseFrontierSnapshot(frontier);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`[RESUME] ignoring unreadable ${CORPUS_FILES.frontier}: ${message}`);
  }

  state.frontier = mergePending(discovered, state.frontier, state.visited);
  state.stats = reconcileStats(state.stats, manifestIds.size, state.hashes.size, logger);

  if (badLines > 0) {
    logger.warn(`[RESUME] skipped ${badLines} unparsable line(s)`);
  }

  return state;
}
