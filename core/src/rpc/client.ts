/**
 * JSON-RPC Client
 *
 * Sends `sendTransaction` and the DAS batch lookups to the endpoint held by a
 * ConnectionContext. Every failure comes back as a classified error value:
 *
 * - HTTP 200 + `result`        → ok
 * - HTTP 200 + `error`         → RpcPayloadError
 * - HTTP 200 + unparsable body → MalformedResponseError
 * - any other HTTP status      → HttpError
 * - transport failure          → NetworkError (TimeoutError past the deadline)
 *
 * Nothing is retried here.
 */

import type { ConnectionContext } from '../connection/context.js';
import {
  HttpError,
  MalformedResponseError,
  NetworkError,
  RpcPayloadError,
  TimeoutError,
  toError,
} from '../errors/base.js';
import type { ILogger } from '../logger/interface.js';
import { NoopLogger } from '../logger/noop.js';
import { err, ok, type Result } from '../types/result.js';
import { toBase64 } from '../utils/conversions.js';
import type {
  AssetBatchParams,
  AssetId,
  FetchLike,
  JsonRpcRequest,
  JsonValue,
  RpcError,
  SendTransactionParams,
  Signature,
  TransactionEnvelope,
} from './types.js';

/**
 * Default deadline for a single RPC request (30 seconds)
 */
export const DEFAULT_RPC_TIMEOUT_MS = 30_000;

/**
 * Request id used for DAS lookups
 */
const DAS_REQUEST_ID = 'test';

export interface RpcClientOptions {
  /** Deadline for each request in milliseconds */
  timeoutMs?: number;
  /** Custom fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  logger?: ILogger;
}

export class RpcClient {
  private readonly context: ConnectionContext;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly logger: ILogger;

  constructor(context: ConnectionContext, options: RpcClientOptions = {}) {
    this.context = context;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Submit a signed transaction
   *
   * @param transaction - Serialized transaction, sent base64-encoded
   * @returns The transaction signature
   */
  async submit(transaction: TransactionEnvelope): Promise<Result<Signature, RpcError>> {
    const request: JsonRpcRequest<SendTransactionParams> = {
      jsonrpc: '2.0',
      id: 1,
      method: 'sendTransaction',
      params: [toBase64(transaction), { encoding: 'base64' }],
    };

    const response = await this.call(request);
    if (!response.ok) return response;

    const body = response.value;
    if (!isJsonObject(body)) {
      return err(new MalformedResponseError('sendTransaction response is not a JSON object'));
    }

    if ('result' in body) {
      const signature = body.result;
      if (typeof signature !== 'string') {
        return err(
          new MalformedResponseError('sendTransaction result is not a signature string', {
            context: { result: signature },
          })
        );
      }
      return ok(signature);
    }

    if ('error' in body) {
      return err(new RpcPayloadError(body.error));
    }

    return err(new MalformedResponseError('sendTransaction response has neither result nor error'));
  }

  /**
   * DAS `getAssetBatch`. The decoded body is returned unmodified.
   */
  async getAssetBatch(ids: AssetId[]): Promise<Result<JsonValue, RpcError>> {
    return this.call<AssetBatchParams>({
      jsonrpc: '2.0',
      id: DAS_REQUEST_ID,
      method: 'getAssetBatch',
      params: { ids },
    });
  }

  /**
   * DAS `getAssetProofBatch`. The decoded body is returned unmodified.
   */
  async getAssetProofBatch(ids: AssetId[]): Promise<Result<JsonValue, RpcError>> {
    return this.call<AssetBatchParams>({
      jsonrpc: '2.0',
      id: DAS_REQUEST_ID,
      method: 'getAssetProofBatch',
      params: { ids },
    });
  }

  /**
   * POST a request and decode a 200 response body
   */
  private async call<TParams>(request: JsonRpcRequest<TParams>): Promise<Result<JsonValue, RpcError>> {
    const endpoint = this.context.endpoint();
    if (!endpoint.ok) return endpoint;

    const startTime = Date.now();
    let status: number;
    let text: string;

    try {
      const response = await this.fetchFn(endpoint.value, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const cause = toError(error);
      this.logger.warn(`${request.method} transport failure after ${Date.now() - startTime}ms: ${cause.message}`);
      if (cause.name === 'TimeoutError') {
        return err(new TimeoutError(this.timeoutMs, { cause, context: { method: request.method } }));
      }
      return err(
        new NetworkError(`Request to RPC endpoint failed: ${cause.message}`, {
          cause,
          context: { method: request.method },
        })
      );
    }

    this.logger.debug(
      `${request.method} → ${new URL(endpoint.value).host}: HTTP ${status} in ${Date.now() - startTime}ms`
    );

    if (status !== 200) {
      return err(new HttpError(status, text, { context: { method: request.method } }));
    }

    return parseJson(text, request.method);
  }
}

function parseJson(text: string, method: string): Result<JsonValue, MalformedResponseError> {
  try {
    const body: JsonValue = JSON.parse(text);
    return ok(body);
  } catch (error) {
    return err(
      new MalformedResponseError(`Invalid JSON response to ${method}`, {
        cause: toError(error),
        context: { method, body: text.slice(0, 200) },
      })
    );
  }
}

export function isJsonObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
