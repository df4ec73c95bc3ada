export { ERROR_CODES, type ErrorCode, type ErrorDomain, type ErrorCodeEntry, type ErrorHttpStatus } from './error-codes.js';
export { PoolNodeError, isPoolNodeError } from './base-error.js';
