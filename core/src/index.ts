/**
 * cNFT Core SDK
 *
 * Compressed NFT trees, mints and transfers over JSON-RPC and the DAS API.
 *
 * @packageDocumentation
 */

// Main SDK class
export { createCnftSDK, CnftSDK, type LookupError } from './CnftSDK.js';

// Connection
export { ConnectionContext, decodeSecretKey, deriveAddress } from './connection/index.js';
export type { ConnectionHandle, Credential } from './connection/index.js';

// RPC
export { RpcClient, DEFAULT_RPC_TIMEOUT_MS } from './rpc/index.js';
export type {
  AssetId,
  FetchLike,
  JsonValue,
  RpcClientOptions,
  RpcError,
  Signature,
  TransactionEnvelope,
} from './rpc/index.js';

// DAS
export { parseAssetBatch, parseAssetProofBatch } from './das/index.js';
export type { AssetRecord, AssetProof, CompressionInfo } from './das/index.js';

// Transaction building
export { runBuilder } from './builder/index.js';
export type {
  TransactionBuilder,
  CreateTreeBuild,
  MintBuildParams,
  TransferBuildParams,
} from './builder/index.js';
export {
  BUBBLEGUM_PROGRAM_ID,
  SPL_ACCOUNT_COMPRESSION_PROGRAM_ID,
  SPL_NOOP_PROGRAM_ID,
  HASH_LENGTH,
  deriveTreeConfigAddress,
  decodeHash,
  decodeProofPath,
  toProofAccountMetas,
} from './bubblegum/index.js';

// Operations
export {
  TreeService,
  MintService,
  TransferService,
  TransferStateMachine,
  InvalidTransferTransitionError,
  TRANSFER_VALID_TRANSITIONS,
  TREE_SUBMIT_FAILURE_PATTERNS,
  classifyTreeSubmitFailure,
  validateTransferArgs,
} from './operations/index.js';
export type {
  CreateTreeResult,
  CreateTreeError,
  MintParams,
  MintError,
  TransferReceipt,
  TransferError,
  TransferState,
  TransferStateChange,
  SubmitFailurePattern,
  TreeSubmitError,
  ServiceDeps,
} from './operations/index.js';

// Network configuration
export {
  DEVNET_CONFIG,
  MAINNET_CONFIG,
  CLUSTERS,
  DEFAULT_CLUSTER,
  getClusterConfig,
  getExplorerTxUrl,
  getExplorerAddressUrl,
} from './network/index.js';
export type { Cluster, ClusterConfig } from './network/index.js';

// Logger
export type { ILogger, LogLevel, LogMethod, ConsoleLoggerOptions } from './logger/index.js';
export { ConsoleLogger, NoopLogger, LOG_LEVELS, resolveLogger } from './logger/index.js';

// Errors
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
  ErrorCodes,
} from './errors/index.js';
export type { ErrorCode, ErrorContext } from './errors/index.js';

// Events
export { TypedEventEmitter } from './events/emitter.js';

// Utils
export { BASE58_PATTERN, isBase58 } from './utils/index.js';

// Types re-exports
export { ok, err } from './types/index.js';
export type {
  Result,
  CnftConfig,
  ResolvedCnftConfig,
  CnftEventType,
  CnftEventPayloads,
  CnftEventHandler,
} from './types/index.js';
