/**
 * Fetch Error Handling
 * Classification of failed requests and retry guidance
 */

export enum FetchFailureReason {
  TIMEOUT = 'timeout',
  CONNECTION_ERROR = 'connection_error',
  CLIENT_ERROR = 'client_error',
  SERVER_ERROR = 'server_error',
}

export interface ClassifiedFailure {
  reason: FetchFailureReason;
  message: string;
  statusCode?: number;
  retryable: boolean;
  retryAfter?: number; // milliseconds
}

/**
 * Classify a non-2xx HTTP status
 */
export function classifyStatus(status: number): ClassifiedFailure {
  if (status === 429) {
    return {
      reason: FetchFailureReason.CLIENT_ERROR,
      message: 'Rate limited by server',
      statusCode: status,
      retryable: true,
      retryAfter: 10000,
    };
  }

  if (status >= 500) {
    return {
      reason: FetchFailureReason.SERVER_ERROR,
      message: `Server error ${status}`,
      statusCode: status,
      retryable: true,
    };
  }

  return {
    reason: FetchFailureReason.CLIENT_ERROR,
    message: status === 404 ? 'Page not found' : `Client error ${status}`,
    statusCode: status,
    retryable: false,
  };
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }
  const cause: unknown = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    const code: unknown = cause.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Classify an error thrown by fetch; `timedOut` is set when our own timer aborted the request
 */
export function classifyError(error: unknown, timedOut: boolean = false): ClassifiedFailure {
  const name = error instanceof Error ? error.name : '';
  const code = errorCode(error);

  if (timedOut || name === 'TimeoutError' || code === 'ETIMEDOUT' || code === 'UND_ERR_CONNECT_TIMEOUT') {
    return {
      reason: FetchFailureReason.TIMEOUT,
      message: 'Request timed out',
      retryable: true,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    reason: FetchFailureReason.CONNECTION_ERROR,
    message: code ? `${message} (${code})` : message,
    retryable: true,
  };
}

/**
 * Determine if we should retry based on the failure
 */
export function shouldRetry(failure: { retryable: boolean }, attemptCount: number, maxRetries: number): boolean {
  if (attemptCount > maxRetries) return false;
  return failure.retryable;
}

/**
 * Exponential backoff, or the server-suggested delay when larger
 */
export function calculateRetryDelay(failure: ClassifiedFailure, attemptCount: number, baseDelay: number): number {
  const backoff = baseDelay * Math.pow(2, Math.max(0, attemptCount - 1));
  return Math.max(backoff, failure.retryAfter ?? 0);
}
