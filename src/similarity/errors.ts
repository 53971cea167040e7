/**
 * Retrieval error kinds
 */

/**
 * Retrieval error codes
 */
export enum RetrievalErrorCode {
  /** Unrecognized mode or parameter; fails fast */
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  /** Partition resolution failed; degraded through the routing fallback */
  ROUTING_FAILED = 'ROUTING_FAILED',
  /** Transport failure, timeout or missing partition connection */
  BACKEND_UNAVAILABLE = 'BACKEND_UNAVAILABLE',
  /** Backend rejected the query */
  BACKEND_QUERY_ERROR = 'BACKEND_QUERY_ERROR',
  /** Source document is not in the index */
  NOT_INDEXED = 'NOT_INDEXED',
  /** Response matched no known section shape */
  UNPARSABLE_RESPONSE = 'UNPARSABLE_RESPONSE',
}

/**
 * Base error class for retrieval errors
 */
export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly code: RetrievalErrorCode,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'RetrievalError';
  }
}

/**
 * Shorthand for an INVALID_CONFIGURATION error
 */
export function invalidConfiguration(message: string): RetrievalError {
  return new RetrievalError(message, RetrievalErrorCode.INVALID_CONFIGURATION);
}

/**
 * Wrap any thrown value as a RetrievalError, keeping retrieval errors as they are
 */
export function toRetrievalError(
  error: unknown,
  fallbackCode: RetrievalErrorCode = RetrievalErrorCode.BACKEND_UNAVAILABLE
): RetrievalError {
  if (error instanceof RetrievalError) {
    return error;
  }
  if (error instanceof Error) {
    return new RetrievalError(error.message, fallbackCode, error);
  }
  return new RetrievalError(String(error), fallbackCode);
}
