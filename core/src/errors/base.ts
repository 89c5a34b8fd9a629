/**
 * cNFT SDK Error Classes
 * @module errors/base
 */

import { ErrorCodes, type ErrorCode } from './codes.js';

/**
 * Diagnostic values attached by the layer that observed the failure
 */
export type ErrorContext = Record<string, unknown>;

interface ErrorOptions {
  retryable?: boolean;
  cause?: Error;
  context?: ErrorContext;
}

/**
 * Base error class for all cNFT SDK errors
 */
export class CnftError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** Whether the whole operation may succeed if started again */
  readonly retryable: boolean;
  /** Original error that caused this error */
  declare readonly cause?: Error;
  /** Asset id, parameters and other values describing the failed call */
  readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
    super(message);
    this.name = 'CnftError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.cause = options?.cause;
    this.context = { ...options?.context };

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Merge additional diagnostics into this error and return it
   */
  withContext(context: ErrorContext): this {
    Object.assign(this.context, context);
    return this;
  }
}

/**
 * Error returned when the connection has not been initialized
 */
export class NotInitializedError extends CnftError {
  constructor(options?: ErrorOptions) {
    super(
      'Connection not established. Call initialize(credential, endpoint) first.',
      ErrorCodes.NOT_INITIALIZED,
      options
    );
    this.name = 'NotInitializedError';
  }
}

/**
 * Error returned on a second initialization attempt
 */
export class AlreadyInitializedError extends CnftError {
  constructor(options?: ErrorOptions) {
    super(
      'Connection already established. Connection details cannot change for the lifetime of the context.',
      ErrorCodes.ALREADY_INITIALIZED,
      options
    );
    this.name = 'AlreadyInitializedError';
  }
}

/**
 * Error returned when the credential cannot be decoded into a keypair
 */
export class InvalidCredentialError extends CnftError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCodes.INVALID_CREDENTIAL, options);
    this.name = 'InvalidCredentialError';
  }
}

/**
 * Error for invalid parameters
 */
export class InvalidArgumentError extends CnftError {
  readonly field?: string;

  constructor(message: string, options?: ErrorOptions & { field?: string }) {
    super(message, ErrorCodes.INVALID_ARGUMENT, options);
    this.name = 'InvalidArgumentError';
    this.field = options?.field;
  }
}

export class AssetNotFoundError extends CnftError {
  readonly assetId: string;

  constructor(assetId: string, options?: ErrorOptions) {
    super(
      `Asset ${assetId} not found. The id may be wrong or the RPC provider may not support the DAS API.`,
      ErrorCodes.ASSET_NOT_FOUND,
      { ...options, context: { assetId, ...options?.context } }
    );
    this.name = 'AssetNotFoundError';
    this.assetId = assetId;
  }
}

export class NotOwnerError extends CnftError {
  readonly assetId: string;
  readonly owner?: string;
  readonly caller: string;

  constructor(assetId: string, owner: string | undefined, caller: string) {
    super(
      `Asset ${assetId} is owned by ${owner ?? 'an unknown address'}, not ${caller}`,
      ErrorCodes.NOT_OWNER,
      { context: { assetId, owner, caller } }
    );
    this.name = 'NotOwnerError';
    this.assetId = assetId;
    this.owner = owner;
    this.caller = caller;
  }
}

export class ProofUnavailableError extends CnftError {
  readonly assetId: string;

  constructor(assetId: string, options?: ErrorOptions) {
    super(
      `Merkle proof for asset ${assetId} is unavailable`,
      ErrorCodes.PROOF_UNAVAILABLE,
      { ...options, context: { assetId, ...options?.context } }
    );
    this.name = 'ProofUnavailableError';
    this.assetId = assetId;
  }
}

export class NotCompressedError extends CnftError {
  readonly assetId: string;

  constructor(assetId: string, options?: ErrorOptions) {
    super(
      `Asset ${assetId} has no compression data; it is not a compressed NFT or the response is malformed`,
      ErrorCodes.NOT_COMPRESSED,
      { ...options, context: { assetId, ...options?.context } }
    );
    this.name = 'NotCompressedError';
    this.assetId = assetId;
  }
}

/**
 * Error thrown by the transaction builder, converted at the service boundary
 */
export class BuildFailedError extends CnftError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCodes.BUILD_FAILED, options);
    this.name = 'BuildFailedError';
  }
}

/**
 * Transport-level failure (connection refused, DNS failure, reset)
 */
export class NetworkError extends CnftError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCodes.NETWORK_ERROR, {
      ...options,
      retryable: options?.retryable ?? true,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Error returned when a request exceeds its deadline
 */
export class TimeoutError extends CnftError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`RPC request timed out after ${timeoutMs}ms`, ErrorCodes.TIMEOUT, {
      ...options,
      retryable: true,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Non-200 HTTP response from the RPC endpoint
 */
export class HttpError extends CnftError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, options?: ErrorOptions) {
    super(`HTTP ${status}: ${body}`, ErrorCodes.HTTP_ERROR, {
      ...options,
      retryable: options?.retryable ?? status >= 500,
    });
    this.name = 'HttpError';
    this.status = status;
    this.body = body;
  }
}

/**
 * JSON-RPC `error` member returned with HTTP 200
 */
export class RpcPayloadError extends CnftError {
  readonly payload: unknown;

  constructor(payload: unknown, options?: ErrorOptions) {
    super(`RPC error: ${describePayload(payload)}`, ErrorCodes.RPC_PAYLOAD_ERROR, options);
    this.name = 'RpcPayloadError';
    this.payload = payload;
  }

  /**
   * The `message` member of the payload, when it has one
   */
  get payloadMessage(): string | undefined {
    if (typeof this.payload === 'object' && this.payload !== null && 'message' in this.payload) {
      const { message } = this.payload;
      return typeof message === 'string' ? message : undefined;
    }
    return undefined;
  }
}

export class MalformedResponseError extends CnftError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCodes.MALFORMED_RESPONSE, options);
    this.name = 'MalformedResponseError';
  }
}

export class InsufficientFundsError extends CnftError {
  constructor(options?: ErrorOptions) {
    super(
      'Insufficient funds: the wallet cannot cover rent for the tree account and the transaction fee',
      ErrorCodes.INSUFFICIENT_FUNDS,
      options
    );
    this.name = 'InsufficientFundsError';
  }
}

export class ExpiredBlockhashError extends CnftError {
  constructor(options?: ErrorOptions) {
    super(
      'Transaction blockhash expired before it landed. Build and submit the transaction again.',
      ErrorCodes.EXPIRED_BLOCKHASH,
      { ...options, retryable: true }
    );
    this.name = 'ExpiredBlockhashError';
  }
}

export class UnknownSubmitFailureError extends CnftError {
  constructor(options?: ErrorOptions) {
    super(
      `Transaction submission failed: ${options?.cause?.message ?? 'unknown error'}`,
      ErrorCodes.UNKNOWN_SUBMIT_FAILURE,
      options
    );
    this.name = 'UnknownSubmitFailureError';
  }
}

/**
 * Generic submission failure for mint and transfer
 */
export class SubmitFailedError extends CnftError {
  /** Likely explanations for the caller */
  readonly hints: readonly string[];

  constructor(message: string, hints: readonly string[], options?: ErrorOptions) {
    super(message, ErrorCodes.SUBMIT_FAILED, options);
    this.name = 'SubmitFailedError';
    this.hints = hints;
  }
}

export function isCnftError(value: unknown): value is CnftError {
  return value instanceof CnftError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(describePayload(value));
}

function describePayload(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}
