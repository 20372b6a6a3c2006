/**
 * Fetcher
 * Rate-limited HTTP GET with timeout, classified outcomes and bounded retry
 */

import { CrawlLogger, silentLogger } from '../logging/logger';
import {
  calculateRetryDelay,
  ClassifiedFailure,
  classifyError,
  classifyStatus,
  shouldRetry,
} from './fetch-errors';
import {
  FetchFailure,
  FetcherConfig,
  FetchFunction,
  FetchResponse,
  FetchResult,
} from './fetch.types';
import { PolitenessGate, sleep, SleepFunction } from './politeness';

const TEXT_CONTENT_TYPES = ['application/xhtml+xml', 'application/xml'];

export interface FetcherOptions {
  fetchImpl?: FetchFunction;
  gate?: PolitenessGate;
  sleep?: SleepFunction;
  logger?: CrawlLogger;
}

const defaultFetch: FetchFunction = (url, init) => fetch(url, init);

/**
 * Whether a Content-Type header denotes text; a missing header counts as text
 */
export function isTextContentType(contentType: string): boolean {
  const mime = contentType.split(';')[0].trim().toLowerCase();
  if (!mime) {
    return true;
  }
  return mime.startsWith('text/') || TEXT_CONTENT_TYPES.includes(mime);
}

export class Fetcher {
  private readonly fetchImpl: FetchFunction;
  private readonly gate: PolitenessGate;
  private readonly sleepFn: SleepFunction;
  private readonly logger: CrawlLogger;

  constructor(
    private readonly config: FetcherConfig,
    options: FetcherOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.gate = options.gate ?? new PolitenessGate(config.delayMs);
    this.sleepFn = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  getGate(): PolitenessGate {
    return this.gate;
  }

  /**
   * Fetch a URL. Never throws for network or HTTP problems.
   */
  async fetch(url: string): Promise<FetchResult> {
    for (let attempt = 1; ; attempt++) {
      const result = await this.attempt(url, attempt);
      if (result.kind !== 'failure') {
        return result;
      }

      if (!shouldRetry(result, attempt, this.config.maxRetries)) {
        const status = result.status !== undefined ? ` ${result.status}` : '';
        this.logger.warn(`[FETCH FAILED] ${url} -> ${result.reason}${status}: ${result.message}`);
        return result;
      }

      const delay = calculateRetryDelay(this.toClassified(result), attempt, this.config.retryBackoffMs);
      this.logger.info(`[RETRY] ${url} attempt ${attempt + 1}/${this.config.maxRetries + 1} in ${delay}ms`);
      await this.sleepFn(delay);
    }
  }

  /**
   * Body of a text document, or null on any failure (robots.txt, sitemaps)
   */
  async fetchText(url: string): Promise<string | null> {
    const result = await this.fetch(url);
    return result.kind === 'success' ? result.body : null;
  }

  private async attempt(url: string, attempt: number): Promise<FetchResult> {
    await this.gate.wait();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,text/plain;q=0.8,*/*;q=0.5',
        },
        redirect: 'follow',
        signal: controller.signal,
      });
      const contentType = response.headers.get('content-type') ?? '';

      if (!response.ok) {
        await this.discard(response);
        return this.failure(url, classifyStatus(response.status), attempt);
      }

      if (!isTextContentType(contentType)) {
        await this.discard(response);
        this.logger.info(`[SKIP NON-TEXT] ${url} (${contentType})`);
        return { kind: 'rejected', url, reason: 'non_text_content', status: response.status, contentType };
      }

      const body = await response.text();
      return {
        kind: 'success',
        url,
        finalUrl: response.url || url,
        status: response.status,
        contentType,
        body,
      };
    } catch (error) {
      return this.failure(url, classifyError(error, timedOut), attempt);
    } finally {
      clearTimeout(timer);
    }
  }

  private failure(url: string, classified: ClassifiedFailure, attempts: number): FetchFailure {
    return {
      kind: 'failure',
      url,
      reason: classified.reason,
      status: classified.statusCode,
      message: classified.message,
      retryable: classified.retryable,
      attempts,
    };
  }

  private toClassified(failure: FetchFailure): ClassifiedFailure {
    return failure.status !== undefined
      ? classifyStatus(failure.status)
      : { reason: failure.reason, message: failure.message, retryable: failure.retryable };
  }

  private async discard(response: FetchResponse): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Response body cancel failed: ${message}`);
    }
  }
}
