/**
 * Corpus Types
 * Records written to the corpus and the files that hold them
 */

import { DedupKeyMode } from '../dedup/content-hasher';

export type OutputFormat = 'min' | 'full';

export const OUTPUT_FORMATS: OutputFormat[] = ['min', 'full'];

export const CORPUS_FILES = {
  min: 'corpus_min.jsonl',
  full: 'corpus_full.jsonl',
  manifest: 'manifest.jsonl',
  hashes: 'hashes.txt',
  visited: 'visited.txt',
  discovered: 'discovered.jsonl',
  meta: 'corpus_meta.json',
  stats: 'stats.json',
  frontier: 'frontier.json',
  htmlDir: 'html',
  textDir: 'text',
} as const;

export interface CorpusWriterConfig {
  outDir: string;
  formats: OutputFormat[];
  resume: boolean;
  saveHtml: boolean;
  saveText: boolean;
  dedupKeyMode: DedupKeyMode;
}

/**
 * A fetched and cleaned page
 */
export interface PageRecord {
  sequenceId: number;
  url: string;
  title: string;
  text: string;
  charCount: number;
}

export interface ChunkRecord {
  id: string;
  url: string;
  title: string;
  chunkIndex: number;
  chunkCount: number;
  contents: string;
  contentHash: string;
}

export interface MinCorpusLine {
  id: string;
  contents: string;
}

export interface FullCorpusLine {
  id: string;
  url: string;
  title: string;
  chunk_index: number;
  chunk_count: number;
  contents: string;
  hash: string;
}

export interface ManifestLine {
  id: string;
  url: string;
  title: string;
  char_count: number;
  html_path: string;
  text_path: string;
}

/**
 * Settings a corpus was built with; a resumed run must match them
 */
export interface CorpusMeta {
  dedup_key_mode: DedupKeyMode;
}

/**
 * Relative paths of audit copies saved for a page
 */
export interface PageArtifacts {
  htmlPath: string;
  textPath: string;
}

export function pageId(sequenceId: number): string {
  return `page-${sequenceId}`;
}

/**
 * `page-<n>` for single-chunk pages, `page-<n>-c<i>` otherwise
 */
export function chunkId(sequenceId: number, chunkIndex: number, chunkCount: number): string {
  return chunkCount > 1 ? `${pageId(sequenceId)}-c${chunkIndex}` : pageId(sequenceId);
}

/**
 * Sequence number of a `page-<n>[-c<i>]` id, or null
 */
export function parsePageSequence(id: string): number | null {
  const match = /^page-(\d+)(?:-c\d+)?$/.exec(id);
  return match ? Number(match[1]) : null;
}
