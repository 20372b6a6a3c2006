/**
 * Chunker Tests
 */

import { Chunker, chunkText, effectiveOverlap, joinChunks } from '../chunker';

describe('chunkText', () => {
  it('should return the whole text when size is 0', () => {
    expect(chunkText('abcdefghij', 0, 3)).toEqual(['abcdefghij']);
    expect(chunkText('abcdefghij')).toEqual(['abcdefghij']);
  });

  it('should return the whole text when it fits in one window', () => {
    expect(chunkText('abcd', 4, 1)).toEqual(['abcd']);
    expect(chunkText('', 4, 1)).toEqual(['']);
  });

  it('should cut windows of size characters without overlap', () => {
    expect(chunkText('abcdefghij', 4, 0)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('should start each window size - overlap after the previous one', () => {
    expect(chunkText('abcdefghij', 4, 1)).toEqual(['abcd', 'defg', 'ghij']);
  });

  it('should ignore an overlap that is not smaller than size', () => {
    expect(chunkText('abcdefgh', 4, 4)).toEqual(['abcd', 'efgh']);
    expect(chunkText('abcdefgh', 4, -2)).toEqual(['abcd', 'efgh']);
  });

  it('should never split a surrogate pair', () => {
    expect(chunkText('\u{1F600}\u{1F600}\u{1F600}', 2, 0)).toEqual(['\u{1F600}\u{1F600}', '\u{1F600}']);
  });

  it('should reconstruct the text by dropping the overlap from every chunk after the first', () => {
    const text = 'Fixed-size windows with overlap keep context across chunk borders.';
    for (const overlap of [0, 1, 3, 7]) {
      const chunks = chunkText(text, 8, overlap);
      chunks.slice(0, -1).forEach((chunk) => expect(chunk).toHaveLength(8));
      expect(joinChunks(chunks, overlap)).toBe(text);
    }
  });
});

describe('effectiveOverlap', () => {
  it('should clamp invalid overlaps to zero', () => {
    expect(effectiveOverlap(10, 3)).toBe(3);
    expect(effectiveOverlap(10, 10)).toBe(0);
    expect(effectiveOverlap(10, -1)).toBe(0);
    expect(effectiveOverlap(10, Number.NaN)).toBe(0);
  });
});

describe('Chunker', () => {
  it('should chunk with its configured options', () => {
    const chunker = new Chunker({ size: 4, overlap: 1 });
    expect(chunker.chunk('abcdefghij')).toEqual(['abcd', 'defg', 'ghij']);
    expect(chunker.overlap()).toBe(1);
  });

  it('should report no overlap in single-chunk mode', () => {
    expect(new Chunker({ size: 0, overlap: 120 }).overlap()).toBe(0);
  });
});
