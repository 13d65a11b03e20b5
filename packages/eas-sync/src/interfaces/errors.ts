/**
 * @exsync/eas-sync - Errors
 *
 * Typed error carried by every failed operation. Services never throw
 * these for expected failures; they return them inside an EasResult.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Broad family of a failure, used by callers to pick a recovery path
 */
export type EasErrorCategory =
  | 'TRANSPORT' // Network or HTTP failure, retry with backoff
  | 'AUTH' // Credentials rejected after the single negotiation retry
  | 'PROTOCOL' // Parsed response carried a non-success status
  | 'PARSE' // A document could not be read or written
  | 'CAPABILITY'; // Neither protocol path can serve the operation

export type EasErrorCode =
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'HTTP_ERROR'
  | 'AUTH_FAILED'
  | 'PROVISION_REQUIRED' // HTTP 449, device must run Provision first
  | 'FOLDER_NOT_FOUND'
  | 'INVALID_SYNC_KEY'
  | 'ITEM_NOT_FOUND'
  | 'SIZE_EXCEEDED'
  | 'STATUS_ERROR'
  | 'MISSING_FIELD'
  | 'MALFORMED_RESPONSE'
  | 'MALFORMED_REQUEST'
  | 'UNSUPPORTED'
  | 'UNKNOWN';

const CATEGORY_BY_CODE: Record<EasErrorCode, EasErrorCategory> = {
  NETWORK_ERROR: 'TRANSPORT',
  TIMEOUT: 'TRANSPORT',
  HTTP_ERROR: 'TRANSPORT',
  AUTH_FAILED: 'AUTH',
  PROVISION_REQUIRED: 'PROTOCOL',
  FOLDER_NOT_FOUND: 'PROTOCOL',
  INVALID_SYNC_KEY: 'PROTOCOL',
  ITEM_NOT_FOUND: 'PROTOCOL',
  SIZE_EXCEEDED: 'PROTOCOL',
  STATUS_ERROR: 'PROTOCOL',
  MISSING_FIELD: 'PARSE',
  MALFORMED_RESPONSE: 'PARSE',
  MALFORMED_REQUEST: 'PARSE',
  UNSUPPORTED: 'CAPABILITY',
  UNKNOWN: 'PROTOCOL',
};

// =============================================================================
// Error Class
// =============================================================================

export interface EasErrorOptions {
  /** HTTP status or protocol Status element value */
  status?: number;
  cause?: unknown;
}

export class EasError extends Error {
  readonly category: EasErrorCategory;
  // With exactOptionalPropertyTypes, prefer `T | undefined` over `?: T`
  readonly status: number | undefined;
  override readonly cause: unknown;

  constructor(
    message: string,
    public readonly code: EasErrorCode,
    options: EasErrorOptions = {}
  ) {
    super(message);
    this.name = 'EasError';
    this.category = CATEGORY_BY_CODE[code];
    this.status = options.status;
    this.cause = options.cause;
  }
}

/**
 * Type guard to check if error is EasError
 */
export function isEasError(error: unknown): error is EasError {
  return error instanceof EasError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Convert an unknown thrown value into an EasError, keeping EasErrors as-is
 */
export function toEasError(error: unknown, message: string): EasError {
  if (error instanceof EasError) {
    return error;
  }

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new EasError(`${message}: request timed out`, 'TIMEOUT', { cause: error });
  }

  return new EasError(`${message}: ${getErrorMessage(error)}`, 'NETWORK_ERROR', { cause: error });
}
