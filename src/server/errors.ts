export enum ErrorCode {
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  STORE_ERROR = 'store_error',
  ENRICHMENT_UNAVAILABLE = 'enrichment_unavailable'
}

const DEFAULT_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.VALIDATION_ERROR]: 'request parameters are invalid',
  [ErrorCode.NOT_FOUND]: 'tracking data not found',
  [ErrorCode.STORE_ERROR]: 'tracking store is unavailable',
  [ErrorCode.ENRICHMENT_UNAVAILABLE]: 'lesson details are unavailable'
};

export type ErrorDetails = Record<string, unknown>;

export interface TrackingErrorOptions {
  message?: string;
  details?: ErrorDetails;
  cause?: unknown;
}

export class TrackingError extends Error {
  public readonly code: ErrorCode;

  public readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, options: TrackingErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.code = code;
    this.details = options.details;
    this.name = 'TrackingError';
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: TrackingError };

export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function failure<T>(error: TrackingError): Result<T> {
  return { ok: false, error };
}

export function createError(code: ErrorCode, options: TrackingErrorOptions = {}): TrackingError {
  const message = options.message ?? DEFAULT_MESSAGES[code];
  return new TrackingError(code, message, options);
}

export function createValidationError(fields: string[]): TrackingError {
  return createError(ErrorCode.VALIDATION_ERROR, {
    message: `${fields.join('/')} ${fields.length === 1 ? 'is' : 'are'} required`,
    details: { fields }
  });
}

export function createStoreError(operation: string, error: unknown): TrackingError {
  const reason = error instanceof Error ? error.message : String(error);
  return createError(ErrorCode.STORE_ERROR, {
    message: `failed to ${operation}: ${reason}`,
    details: { operation },
    cause: error
  });
}

export function createTypeError(fields: string[]): TrackingError {
  return createError(ErrorCode.VALIDATION_ERROR, {
    message: `${fields.join('/')} must be a string`,
    details: { fields }
  });
}

export function isTrackingError(error: unknown): error is TrackingError {
  return error instanceof TrackingError;
}

export function describeError(error: TrackingError): { code: ErrorCode; message: string } {
  return { code: error.code, message: error.message };
}
