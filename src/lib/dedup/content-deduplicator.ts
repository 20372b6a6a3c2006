/**
 * Content Deduplicator
 * Exact-hash duplicate detection for chunks
 */

export class ContentDeduplicator {
  private seenHashes: Set<string> = new Set();

  /**
   * Check-and-insert: true the first time a digest is seen, false afterwards
   */
  shouldWrite(digest: string): boolean {
    if (this.seenHashes.has(digest)) {
      return false;
    }

    this.seenHashes.add(digest);
    return true;
  }

  hasHash(digest: string): boolean {
    return this.seenHashes.has(digest);
  }

  /**
   * Seed the index with digests written by a previous run
   */
  restore(digests: Iterable<string>): void {
    for (const digest of digests) {
      this.seenHashes.add(digest);
    }
  }

  snapshot(): string[] {
    return Array.from(this.seenHashes);
  }

  size(): number {
    return this.seenHashes.size;
  }
}
