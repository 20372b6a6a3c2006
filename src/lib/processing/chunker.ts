/**
 * Chunker
 * Fixed-size character windows with overlap
 */

export interface ChunkingOptions {
  /**
   * Window size in characters (0 = whole text as one chunk)
   */
  size: number;

  /**
   * Characters shared by consecutive windows; values >= size count as 0
   */
  overlap: number;
}

/**
 * Overlap actually applied for a given size
 */
export function effectiveOverlap(size: number, overlap: number): number {
  if (!Number.isFinite(overlap) || overlap < 0 || overlap >= size) {
    return 0;
  }
  return Math.floor(overlap);
}

/**
 * Split text into consecutive windows of `size` code points, each starting
 * `size - overlap` after the previous one. Always returns at least one chunk;
 * the last chunk may be shorter than `size`.
 */
export function chunkText(text: string, size?: number, overlap: number = 0): string[] {
  if (!size || size <= 0) {
    return [text];
  }

  const windowSize = Math.floor(size);
  const step = windowSize - effectiveOverlap(windowSize, overlap);
  const chars = Array.from(text);

  if (chars.length <= windowSize) {
    return [text];
  }

  const chunks: string[] = [];
  for (let start = 0; ; start += step) {
    const end = start + windowSize;
    chunks.push(chars.slice(start, end).join(''));
    if (end >= chars.length) {
      break;
    }
  }

  return chunks;
}

/**
 * Inverse of chunkText: join chunks dropping the overlapping prefix of each
 * chunk after the first.
 */
export function joinChunks(chunks: string[], overlap: number): string {
  return chunks
    .map((chunk, index) => (index === 0 ? chunk : Array.from(chunk).slice(overlap).join('')))
    .join('');
}

export class Chunker {
  constructor(private readonly options: ChunkingOptions) {}

  chunk(text: string): string[] {
    return chunkText(text, this.options.size, this.options.overlap);
  }

  /**
   * Overlap in effect after clamping
   */
  overlap(): number {
    return this.options.size > 0 ? effectiveOverlap(this.options.size, this.options.overlap) : 0;
  }
}
