/**
 * Frontier
 * Owns the pending queue and the visited set; decides which URLs are admitted
 */

import { CrawlingQueue } from './crawling-queue';
import {
  AdmissionDecision,
  FrontierConfig,
  FrontierSnapshot,
  PendingUrl,
} from './crawling.types';
import {
  hasAllowedProtocol,
  hasNonPageExtension,
  isWithinPath,
  normalizeUrl,
  scopePath,
} from './url-normalizer';

export interface FrontierOptions {
  /**
   * Called with the pending size after every push and pop
   */
  onQueueSize?: (size: number) => void;

  /**
   * Called for every URL admitted by seed or offer (not for restored entries)
   */
  onAdmit?: (entry: PendingUrl) => void;
}

export class Frontier {
  private readonly queue = new CrawlingQueue();
  private readonly visited: Set<string> = new Set();
  private readonly baseUrl: string;
  private readonly baseHost: string;
  private readonly basePath: string;
  private readonly allowedHosts: Set<string>;
  private popped = 0;

  constructor(
    private readonly config: FrontierConfig,
    private readonly options: FrontierOptions = {}
  ) {
    const normalized = normalizeUrl(config.baseUrl);
    if (!normalized) {
      throw new Error(`Invalid base URL: ${config.baseUrl}`);
    }
    const base = new URL(normalized);
    if (!hasAllowedProtocol(base)) {
      throw new Error(`Base URL must be http or https: ${config.baseUrl}`);
    }

    this.baseUrl = normalized;
    this.baseHost = base.host;
    this.basePath = scopePath(base);
    this.allowedHosts = new Set(config.allowedHosts.map((host) => host.toLowerCase()));
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Add starting URLs at depth 0. The base URL bypasses the include/exclude
   * patterns; every other seed goes through full admission.
   * Returns the number of URLs enqueued.
   */
  seed(urls: string[]): number {
    let added = 0;
    for (const url of urls) {
      const isBase = normalizeUrl(url) === this.baseUrl;
      const decision = this.admit(url, undefined, 0, !isBase);
      if (decision.admitted && this.push({ url: decision.url, depth: 0 })) {
        added++;
      }
    }
    return added;
  }

  /**
   * Offer a link discovered on a page at `fromDepth`. Relative links are
   * resolved against `referrer` (defaults to the base URL).
   */
  offer(href: string, fromDepth: number, referrer?: string): boolean {
    const depth = fromDepth + 1;
    const decision = this.admit(href, referrer ?? this.baseUrl, depth, true);
    if (!decision.admitted) {
      return false;
    }
    return this.push({ url: decision.url, depth });
  }

  /**
   * Run the admission filters without enqueuing
   */
  evaluate(href: string, fromDepth: number, referrer?: string): AdmissionDecision {
    return this.admit(href, referrer ?? this.baseUrl, fromDepth + 1, true);
  }

  /**
   * Remove and return the next URL (FIFO). Returns null when the queue is
   * empty or the page cap has been reached.
   */
  pop(): PendingUrl | null {
    if (this.isCapped()) {
      return null;
    }

    const next = this.queue.dequeue();
    if (!next) {
      return null;
    }

    this.markVisited(next.url);
    this.popped++;
    this.reportSize();
    return next;
  }

  /**
   * Add a URL to the visited set; a queued copy is dropped so it is never popped
   */
  markVisited(url: string): void {
    this.visited.add(url);
    if (this.queue.remove(url)) {
      this.reportSize();
    }
  }

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  /**
   * True once the number of popped URLs (restored visits included) reaches maxPages
   */
  isCapped(): boolean {
    return this.config.maxPages > 0 && this.popped >= this.config.maxPages;
  }

  size(): number {
    return this.queue.size();
  }

  visitedCount(): number {
    return this.visited.size;
  }

  poppedCount(): number {
    return this.popped;
  }

  snapshot(): FrontierSnapshot {
    return { pending: this.queue.entries().map((entry) => ({ ...entry })) };
  }

  /**
   * Restore state from a previous run. Restored visits count toward maxPages;
   * pending entries already visited are dropped.
   */
  restore(visited: Iterable<string>, snapshot?: FrontierSnapshot): void {
    for (const url of visited) {
      if (!this.visited.has(url)) {
        this.visited.add(url);
        this.popped++;
      }
    }

    for (const entry of snapshot?.pending ?? []) {
      const url = normalizeUrl(entry.url);
      if (url && !this.visited.has(url)) {
        this.push({ url, depth: entry.depth }, false);
      }
    }
  }

  private push(entry: PendingUrl, discovered: boolean = true): boolean {
    if (!this.queue.enqueue(entry)) {
      return false;
    }
    this.reportSize();
    if (discovered) {
      this.options.onAdmit?.({ ...entry });
    }
    return true;
  }

  private reportSize(): void {
    this.options.onQueueSize?.(this.queue.size());
  }

  private admit(
    href: string,
    referrer: string | undefined,
    depth: number,
    applyPatterns: boolean
  ): AdmissionDecision {
    const normalized = normalizeUrl(href, referrer);
    if (!normalized) {
      return { admitted: false, reason: 'invalid_url' };
    }

    const url = new URL(normalized);
    if (!hasAllowedProtocol(url)) {
      return { admitted: false, reason: 'scheme' };
    }

    if (!this.inScope(url)) {
      return { admitted: false, reason: 'scope' };
    }

    if (hasNonPageExtension(url)) {
      return { admitted: false, reason: 'extension' };
    }

    if (applyPatterns) {
      const { includePatterns, excludePatterns } = this.config;
      if (includePatterns.length > 0 && !includePatterns.some((re) => re.test(normalized))) {
        return { admitted: false, reason: 'include_pattern' };
      }
      if (excludePatterns.some((re) => re.test(normalized))) {
        return { admitted: false, reason: 'exclude_pattern' };
      }
    }

    if (this.visited.has(normalized)) {
      return { admitted: false, reason: 'visited' };
    }

    if (this.queue.hasUrl(normalized)) {
      return { admitted: false, reason: 'pending' };
    }

    if (this.config.maxDepth > 0 && depth > this.config.maxDepth) {
      return { admitted: false, reason: 'depth' };
    }

    if (this.config.maxPending > 0 && this.queue.size() >= this.config.maxPending) {
      return { admitted: false, reason: 'frontier_full' };
    }

    return { admitted: true, url: normalized };
  }

  private inScope(url: URL): boolean {
    if (url.host === this.baseHost) {
      return isWithinPath(url, this.basePath);
    }
    return this.allowedHosts.has(url.host) || this.allowedHosts.has(url.hostname);
  }
}
