/**
 * cNFT RPC
 * @module rpc
 */

export { RpcClient, DEFAULT_RPC_TIMEOUT_MS, isJsonObject, type RpcClientOptions } from './client.js';
export type {
  AssetId,
  FetchLike,
  JsonRpcRequest,
  JsonValue,
  RpcError,
  Signature,
  TransactionEnvelope,
} from './types.js';
