/**
 * JSON-RPC Types
 * @module rpc/types
 */

import type {
  HttpError,
  MalformedResponseError,
  NetworkError,
  NotInitializedError,
  RpcPayloadError,
  TimeoutError,
} from '../errors/base.js';

/**
 * Minimal fetch signature the client depends on
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Opaque serialized transaction produced by a TransactionBuilder
 */
export type TransactionEnvelope = Uint8Array;

/**
 * Base58 transaction signature returned by `sendTransaction`
 */
export type Signature = string;

export type AssetId = string;

/**
 * Decoded JSON body, returned as-is by the DAS batch lookups
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface JsonRpcRequest<TParams> {
  jsonrpc: '2.0';
  id: number | string;
  method: string;
  params: TParams;
}

export type SendTransactionParams = [string, { encoding: 'base64' }];

export interface AssetBatchParams {
  ids: AssetId[];
}

/**
 * Failures the RPC layer classifies
 */
export type RpcError =
  | NotInitializedError
  | NetworkError
  | TimeoutError
  | HttpError
  | RpcPayloadError
  | MalformedResponseError;
