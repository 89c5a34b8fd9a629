/**
 * Shared test fixtures: in-process JSON-RPC endpoint, fake builder, wallets
 */

import { Keypair } from '@solana/web3.js';
import bs58 from 'bs58';
import { vi } from 'vitest';
import type { CreateTreeBuild, MintBuildParams, TransactionBuilder, TransferBuildParams } from '../builder/interface.js';
import { ConnectionContext } from '../connection/context.js';
import type { Credential } from '../connection/credential.js';
import { TypedEventEmitter } from '../events/emitter.js';
import type { ILogger } from '../logger/interface.js';
import type { ServiceDeps } from '../operations/types.js';
import { RpcClient } from '../rpc/client.js';
import type { FetchLike, JsonValue } from '../rpc/types.js';
import type { CnftEventPayloads } from '../types/events.js';

export const TEST_ENDPOINT = 'https://rpc.test.invalid';
export const TEST_SIGNATURE = '5VERYsig1111111111111111111111111111111111111111';
export const TEST_ASSET_ID = 'Asset1111111111111111111111111111111111111111';
export const TEST_TREE = 'Tree111111111111111111111111111111111111111';
export const TEST_RECIPIENT = 'Recipient2222222222222222222222222222222222';
export const TEST_ROOT = 'Root3333333333333333333333333333333333333333';
export const TEST_PROOF_PATH = ['Node4444444444444444444444444444444444444444', 'Node5555555555555555555555555555555555555555'];

export interface TestWallet {
  credential: string;
  secretKey: Uint8Array;
  address: string;
}

export function createTestWallet(): TestWallet {
  const keypair = Keypair.generate();
  return {
    credential: bs58.encode(keypair.secretKey),
    secretKey: keypair.secretKey,
    address: keypair.publicKey.toBase58(),
  };
}

// ============ JSON-RPC stand-in ============

export interface RecordedRequest {
  url: string;
  method: string;
  id: JsonValue;
  params: JsonValue;
}

type MethodHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: JsonValue, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status });
}

/**
 * Fetch stub that routes requests by JSON-RPC method and records each one.
 * An unrouted method answers with HTTP 404.
 */
export function createRpcStub(handlers: Record<string, MethodHandler> = {}) {
  const requests: RecordedRequest[] = [];

  const fetch = vi.fn<FetchLike>(async (url, init) => {
    const request = readRequest(url, init);
    requests.push(request);
    const handler = handlers[request.method];
    return handler ? handler(request) : textResponse(`no handler for ${request.method}`, 404);
  });

  return {
    fetch,
    requests,
    methods: () => requests.map((request) => request.method),
  };
}

function readRequest(url: string, init: RequestInit): RecordedRequest {
  const raw: JsonValue = typeof init.body === 'string' ? JSON.parse(init.body) : null;
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { url, method: '', id: null, params: null };
  }
  return {
    url,
    method: typeof raw.method === 'string' ? raw.method : '',
    id: raw.id ?? null,
    params: raw.params ?? null,
  };
}

// ============ DAS bodies ============

export function assetBatchBody(options: {
  id?: string;
  owner?: string;
  compression?: { [key: string]: JsonValue } | null;
} = {}): JsonValue {
  const record: { [key: string]: JsonValue } = {
    id: options.id ?? TEST_ASSET_ID,
    ownership: { owner: options.owner ?? '' },
  };
  if (options.compression !== null) {
    record.compression = options.compression ?? {
      creator_hash: 'CreatorHash111111111111111111111111111111111',
      data_hash: 'DataHash11111111111111111111111111111111111',
      leaf_id: 7,
      tree: TEST_TREE,
      compressed: true,
    };
  }
  return { jsonrpc: '2.0', id: 'test', result: [record] };
}

export function proofBatchBody(assetId = TEST_ASSET_ID): JsonValue {
  return {
    jsonrpc: '2.0',
    id: 'test',
    result: {
      [assetId]: {
        proof: TEST_PROOF_PATH,
        root: TEST_ROOT,
        tree_id: TEST_TREE,
        node_index: 16391,
      },
    },
  };
}

export function signatureBody(signature = TEST_SIGNATURE): JsonValue {
  return { jsonrpc: '2.0', id: 1, result: signature };
}

export function rpcErrorBody(message: string, code = -32002): JsonValue {
  return { jsonrpc: '2.0', id: 1, error: { code, message } };
}

// ============ Builder ============

export const TEST_TRANSACTION = Uint8Array.from([1, 2, 3, 4]);

export function createFakeBuilder(overrides: Partial<TransactionBuilder> = {}) {
  const builder = {
    buildCreateTree: vi.fn(
      overrides.buildCreateTree ??
        (async (_credential: Credential): Promise<CreateTreeBuild> => ({
          transaction: TEST_TRANSACTION,
          treeAddress: TEST_TREE,
        }))
    ),
    buildMint: vi.fn(
      overrides.buildMint ?? (async (_credential: Credential, _params: MintBuildParams) => TEST_TRANSACTION)
    ),
    buildTransfer: vi.fn(
      overrides.buildTransfer ??
        (async (_credential: Credential, _params: TransferBuildParams) => TEST_TRANSACTION)
    ),
  } satisfies TransactionBuilder;
  return builder;
}

// ============ Services ============

/**
 * Logger whose every method is a spy
 */
export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ILogger;
}

export function createServiceHarness(
  handlers: Record<string, MethodHandler> = {},
  builderOverrides: Partial<TransactionBuilder> = {},
  wallet: TestWallet = createTestWallet()
) {
  const context = new ConnectionContext();
  context.initialize(wallet.credential, TEST_ENDPOINT);

  const stub = createRpcStub(handlers);
  const rpc = new RpcClient(context, { fetch: stub.fetch });
  const builder = createFakeBuilder(builderOverrides);
  const logger = createTestLogger();
  const events = new TypedEventEmitter<CnftEventPayloads>({ logger });
  const onStatusChange = vi.fn<(status: string) => void>();

  const deps: ServiceDeps = { context, rpc, builder, logger, events, onStatusChange };
  return { wallet, context, stub, rpc, builder, logger, events, onStatusChange, deps };
}
