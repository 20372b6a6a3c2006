/**
 * Fetch Types
 * Type definitions for the polite HTTP fetcher
 */

import { FetchFailureReason } from './fetch-errors';

export interface FetcherConfig {
  /**
   * User-Agent header sent with every request
   */
  userAgent: string;

  /**
   * Per-request timeout in milliseconds (body download included)
   */
  timeoutMs: number;

  /**
   * Minimum spacing between consecutive request starts, across the whole run
   */
  delayMs: number;

  /**
   * Extra attempts for transient failures (0 = exactly one attempt)
   */
  maxRetries: number;

  /**
   * Base backoff between retries; doubles per attempt
   */
  retryBackoffMs: number;
}

export interface FetchSuccess {
  kind: 'success';
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
}

export interface FetchFailure {
  kind: 'failure';
  url: string;
  reason: FetchFailureReason;
  status?: number;
  message: string;
  retryable: boolean;
  attempts: number;
}

export interface FetchRejected {
  kind: 'rejected';
  url: string;
  reason: 'non_text_content';
  status: number;
  contentType: string;
}

export type FetchResult = FetchSuccess | FetchFailure | FetchRejected;

/**
 * The subset of the Fetch API Response the fetcher reads
 */
export interface FetchResponse {
  ok: boolean;
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
  body?: { cancel(): Promise<void> } | null;
}

export interface FetchRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  redirect: 'follow';
  signal: AbortSignal;
}

export type FetchFunction = (url: string, init: FetchRequestInit) => Promise<FetchResponse>;
