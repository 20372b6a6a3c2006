/**
 * Crawling Queue
 * Breadth-first FIFO queue of pending URLs with O(1) membership checks
 */

import { PendingUrl } from './crawling.types';

// Dequeued slots are reclaimed once this many accumulate at the head
const COMPACT_THRESHOLD = 1024;

export class CrawlingQueue {
  private items: PendingUrl[] = [];
  private head = 0;
  private urlSet: Set<string> = new Set();

  /**
   * Add URL to queue (BFS order). Returns false if it is already queued.
   */
  enqueue(entry: PendingUrl): boolean {
    if (this.urlSet.has(entry.url)) {
      return false;
    }

    this.items.push(entry);
    this.urlSet.add(entry.url);
    return true;
  }

  /**
   * Get next URL from queue (FIFO for BFS)
   */
  dequeue(): PendingUrl | null {
    if (this.head >= this.items.length) {
      return null;
    }

    const entry = this.items[this.head];
    this.head++;
    this.urlSet.delete(entry.url);

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return entry;
  }

  /**
   * Drop a queued URL. Returns false if it was not queued.
   */
  remove(url: string): boolean {
    if (!this.urlSet.has(url)) {
      return false;
    }

    const index = this.items.findIndex((entry, i) => i >= this.head && entry.url === url);
    if (index >= 0) {
      this.items.splice(index, 1);
    }
    this.urlSet.delete(url);
    return true;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  size(): number {
    return this.items.length - this.head;
  }

  hasUrl(url: string): boolean {
    return this.urlSet.has(url);
  }

  /**
   * Queued entries in dequeue order
   */
  entries(): PendingUrl[] {
    return this.items.slice(this.head);
  }

  clear(): void {
    this.items = [];
    this.head = 0;
    this.urlSet.clear();
  }
}
