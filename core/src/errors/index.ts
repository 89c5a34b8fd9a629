/**
 * cNFT SDK Errors
 * @module errors
 */

export {
  CnftError,
  NotInitializedError,
  AlreadyInitializedError,
  InvalidCredentialError,
  InvalidArgumentError,
  AssetNotFoundError,
  NotOwnerError,
  ProofUnavailableError,
  NotCompressedError,
  BuildFailedError,
  NetworkError,
  TimeoutError,
  HttpError,
  RpcPayloadError,
  MalformedResponseError,
  InsufficientFundsError,
  ExpiredBlockhashError,
  UnknownSubmitFailureError,
  SubmitFailedError,
  isCnftError,
  toError,
  type ErrorContext,
} from './base.js';

export { ErrorCodes, type ErrorCode } from './codes.js';
