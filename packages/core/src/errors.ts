/**
 * Reader Errors
 */

/**
 * Error thrown when a storage operation fails.
 *
 * The storage error is kept unchanged as `cause`. `partial` holds whatever the
 * operation had materialised before the failure, so callers can decide whether
 * to use it.
 */
export class ReaderError<TPartial = unknown> extends Error {
  constructor(
    public readonly operation: string,
    public readonly cause: unknown,
    public readonly context: Record<string, unknown> = {},
    public readonly partial?: TPartial
  ) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'ReaderError';
  }
}

/**
 * Check whether an error is a ReaderError raised by the given operation.
 */
export function isReaderError(error: unknown, operation?: string): error is ReaderError {
  return (
    error instanceof ReaderError && (operation === undefined || error.operation === operation)
  );
}
