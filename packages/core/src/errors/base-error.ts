import { ERROR_CODES, type ErrorCode, type ErrorHttpStatus } from './error-codes.js';

export class PoolNodeError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: ErrorHttpStatus;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    options?: {
      message?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    const entry = ERROR_CODES[code];
    super(options?.message ?? entry.message);
    this.name = 'PoolNodeError';
    this.code = code;
    this.httpStatus = entry.httpStatus;
    this.retryable = entry.retryable;
    this.details = options?.details;
    if (options?.cause !== undefined) this.cause = options.cause;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      retryable: this.retryable,
    };
  }
}

/** Type guard for a PoolNodeError carrying a specific code. */
export function isPoolNodeError(err: unknown, code?: ErrorCode): err is PoolNodeError {
  return err instanceof PoolNodeError && (code === undefined || err.code === code);
}
