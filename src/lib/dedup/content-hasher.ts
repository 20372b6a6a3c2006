/**
 * Content Hasher
 * SHA-256 fingerprints used as dedup keys
 */

import { createHash } from 'crypto';

export type DedupKeyMode = 'content' | 'url+content';

export const DEDUP_KEY_MODES: DedupKeyMode[] = ['content', 'url+content'];

const URL_KEY_SEPARATOR = '\n';

export function isDedupKeyMode(value: string): value is DedupKeyMode {
  return DEDUP_KEY_MODES.some((mode) => mode === value);
}

/**
 * Hex SHA-256 digest of a key
 */
export function fingerprint(key: string): string {
  return createHash('sha256').update(key, 'utf8').digest('hex');
}

/**
 * Build the string hashed for dedup: the text alone, or the URL and the text
 */
export function dedupKey(url: string, text: string, mode: DedupKeyMode): string {
  return mode === 'url+content' ? `${url}${URL_KEY_SEPARATOR}${text}` : text;
}

export class ContentHasher {
  constructor(private readonly mode: DedupKeyMode = 'content') {}

  hash(url: string, text: string): string {
    return fingerprint(dedupKey(url, text, this.mode));
  }

  getMode(): DedupKeyMode {
    return this.mode;
  }
}
