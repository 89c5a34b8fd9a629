/**
 * Error Codes
 * @module errors/codes
 */

/**
 * Stable error codes for programmatic handling
 */
export const ErrorCodes = {
  // Connection lifecycle
  NOT_INITIALIZED: 'NOT_INITIALIZED',
  ALREADY_INITIALIZED: 'ALREADY_INITIALIZED',
  INVALID_CREDENTIAL: 'INVALID_CREDENTIAL',

  // Input validation
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Asset / proof lookups
  ASSET_NOT_FOUND: 'ASSET_NOT_FOUND',
  NOT_OWNER: 'NOT_OWNER',
  PROOF_UNAVAILABLE: 'PROOF_UNAVAILABLE',
  NOT_COMPRESSED: 'NOT_COMPRESSED',

  // Transaction builder
  BUILD_FAILED: 'BUILD_FAILED',

  // Transport / JSON-RPC
  NETWORK_ERROR: 'NETWORK_ERROR',
  TIMEOUT: 'TIMEOUT',
  HTTP_ERROR: 'HTTP_ERROR',
  RPC_PAYLOAD_ERROR: 'RPC_PAYLOAD_ERROR',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',

  // Submission
  INSUFFICIENT_FUNDS: 'INSUFFICIENT_FUNDS',
  EXPIRED_BLOCKHASH: 'EXPIRED_BLOCKHASH',
  UNKNOWN_SUBMIT_FAILURE: 'UNKNOWN_SUBMIT_FAILURE',
  SUBMIT_FAILED: 'SUBMIT_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
