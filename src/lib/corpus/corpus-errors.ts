/**
 * Corpus Errors
 * Output failures invalidate the durability contract and abort the run
 */

export class CorpusWriteError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'CorpusWriteError';
  }
}

/**
 * Existing output that cannot be resumed with the current settings
 */
export class CorpusStateError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'CorpusStateError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFoundError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
