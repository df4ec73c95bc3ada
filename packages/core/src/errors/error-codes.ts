export type ErrorDomain = 'LIFECYCLE' | 'STORAGE' | 'STARTUP' | 'NETWORK' | 'CONSENSUS' | 'POOL' | 'API';

export interface ErrorCodeEntry {
  code: string;
  domain: ErrorDomain;
  httpStatus: number;
  retryable: boolean;
  message: string;
}

/**
 * Unified error code matrix. Every PoolNodeError is constructed from one of these
 * entries; the API error handler uses httpStatus directly.
 */
export const ERROR_CODES = {
  // --- LIFECYCLE domain (4) ---
  ALREADY_STOPPED: {
    code: 'ALREADY_STOPPED',
    domain: 'LIFECYCLE',
    httpStatus: 503,
    retryable: false,
    message: 'Shutdown group already stopped',
  },
  SHUTDOWN_HOOK_FAILED: {
    code: 'SHUTDOWN_HOOK_FAILED',
    domain: 'LIFECYCLE',
    httpStatus: 500,
    retryable: false,
    message: 'One or more shutdown hooks failed',
  },
  DAEMON_ALREADY_RUNNING: {
    code: 'DAEMON_ALREADY_RUNNING',
    domain: 'LIFECYCLE',
    httpStatus: 409,
    retryable: false,
    message: 'Another poolnode daemon is already running',
  },
  OPERATION_TIMEOUT: {
    code: 'OPERATION_TIMEOUT',
    domain: 'LIFECYCLE',
    httpStatus: 504,
    retryable: true,
    message: 'Operation timed out',
  },

  // --- STORAGE domain (3) ---
  STORAGE_OPEN_FAILED: {
    code: 'STORAGE_OPEN_FAILED',
    domain: 'STORAGE',
    httpStatus: 500,
    retryable: false,
    message: 'Unable to open persisted state',
  },
  CORRUPT_STATE: {
    code: 'CORRUPT_STATE',
    domain: 'STORAGE',
    httpStatus: 500,
    retryable: false,
    message: 'Database contains inconsistencies',
  },
  GENESIS_MISMATCH: {
    code: 'GENESIS_MISMATCH',
    domain: 'STORAGE',
    httpStatus: 500,
    retryable: false,
    message: 'Blockchain has wrong genesis block',
  },

  // --- STARTUP domain (1) ---
  STAGE_CONSTRUCTION_FAILED: {
    code: 'STAGE_CONSTRUCTION_FAILED',
    domain: 'STARTUP',
    httpStatus: 500,
    retryable: false,
    message: 'Module construction failed',
  },

  // --- NETWORK domain (7) ---
  INVALID_ADDRESS: {
    code: 'INVALID_ADDRESS',
    domain: 'NETWORK',
    httpStatus: 400,
    retryable: false,
    message: 'Address must be of the form host:port',
  },
  SELF_CONNECT: {
    code: 'SELF_CONNECT',
    domain: 'NETWORK',
    httpStatus: 400,
    retryable: false,
    message: 'Cannot connect to own address',
  },
  PEER_ALREADY_CONNECTED: {
    code: 'PEER_ALREADY_CONNECTED',
    domain: 'NETWORK',
    httpStatus: 409,
    retryable: false,
    message: 'Already connected to peer',
  },
  PEER_NOT_FOUND: {
    code: 'PEER_NOT_FOUND',
    domain: 'NETWORK',
    httpStatus: 404,
    retryable: false,
    message: 'Not connected to peer',
  },
  PEER_LIMIT_REACHED: {
    code: 'PEER_LIMIT_REACHED',
    domain: 'NETWORK',
    httpStatus: 503,
    retryable: true,
    message: 'Peer limit reached',
  },
  DIAL_FAILED: {
    code: 'DIAL_FAILED',
    domain: 'NETWORK',
    httpStatus: 502,
    retryable: true,
    message: 'Failed to dial peer',
  },
  DIAL_TIMEOUT: {
    code: 'DIAL_TIMEOUT',
    domain: 'NETWORK',
    httpStatus: 504,
    retryable: true,
    message: 'Dial timed out',
  },

  // --- CONSENSUS domain (1) ---
  BLOCK_NOT_FOUND: {
    code: 'BLOCK_NOT_FOUND',
    domain: 'CONSENSUS',
    httpStatus: 404,
    retryable: false,
    message: 'No block at that height on the current path',
  },

  // --- POOL domain (3) ---
  TRANSACTION_INVALID: {
    code: 'TRANSACTION_INVALID',
    domain: 'POOL',
    httpStatus: 400,
    retryable: false,
    message: 'Transaction is invalid',
  },
  TRANSACTION_DUPLICATE: {
    code: 'TRANSACTION_DUPLICATE',
    domain: 'POOL',
    httpStatus: 409,
    retryable: false,
    message: 'Transaction already in pool',
  },
  POOL_FULL: {
    code: 'POOL_FULL',
    domain: 'POOL',
    httpStatus: 503,
    retryable: true,
    message: 'Transaction pool is full',
  },

  // --- API domain (4) ---
  BROWSER_ACCESS_DISABLED: {
    code: 'BROWSER_ACCESS_DISABLED',
    domain: 'API',
    httpStatus: 400,
    retryable: false,
    message: 'Browser access disabled. Use the poolnode CLI or a client that sets the agent header.',
  },
  API_NOT_READY: {
    code: 'API_NOT_READY',
    domain: 'API',
    httpStatus: 503,
    retryable: true,
    message: 'API server is not serving yet',
  },
  VALIDATION_FAILED: {
    code: 'VALIDATION_FAILED',
    domain: 'API',
    httpStatus: 400,
    retryable: false,
    message: 'Validation error',
  },
  INTERNAL_ERROR: {
    code: 'INTERNAL_ERROR',
    domain: 'API',
    httpStatus: 500,
    retryable: false,
    message: 'Internal server error',
  },
} as const satisfies Record<string, ErrorCodeEntry>;

export type ErrorCode = keyof typeof ERROR_CODES;

/** Union of the HTTP statuses used in the table. */
export type ErrorHttpStatus = (typeof ERROR_CODES)[ErrorCode]['httpStatus'];
