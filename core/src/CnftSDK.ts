/**
 * cNFT SDK - Main Class
 *
 * Create Merkle trees, mint compressed NFTs into them and transfer them
 * between wallets, against any JSON-RPC endpoint that serves the DAS API.
 */

import { ConnectionContext } from './connection/context.js';
import type { Credential } from './connection/credential.js';
import { parseAssetBatch, parseAssetProofBatch } from './das/parse.js';
import type { AssetProof, AssetRecord } from './das/types.js';
import {
  InvalidArgumentError,
  type AlreadyInitializedError,
  type AssetNotFoundError,
  type InvalidCredentialError,
  type NotInitializedError,
  type ProofUnavailableError,
} from './errors/base.js';
import { TypedEventEmitter } from './events/emitter.js';
import type { ILogger } from './logger/interface.js';
import { resolveLogger } from './logger/resolve.js';
import {
  DEFAULT_CLUSTER,
  getExplorerAddressUrl,
  getExplorerTxUrl,
  type Cluster,
} from './network/presets.js';
import { MintService, type MintError, type MintParams } from './operations/mint.js';
import { TransferService, type TransferError, type TransferReceipt } from './operations/transfer.js';
import { TreeService, type CreateTreeError, type CreateTreeResult } from './operations/tree.js';
import { DEFAULT_RPC_TIMEOUT_MS, RpcClient } from './rpc/client.js';
import type { RpcError, Signature } from './rpc/types.js';
import type { CnftConfig, ResolvedCnftConfig } from './types/config.js';
import type { CnftEventHandler, CnftEventPayloads, CnftEventType } from './types/events.js';
import { err, ok, type Result } from './types/result.js';
import { isNonEmptyString } from './utils/validation.js';

export type LookupError = InvalidArgumentError | RpcError;

/**
 * cNFT SDK
 *
 * One instance owns one connection: `initialize` succeeds exactly once and
 * every other operation reports NotInitialized until it has.
 *
 * @example
 * ```typescript
 * import { CnftSDK } from '@cnft-kit/core';
 *
 * const sdk = new CnftSDK({ builder: myBubblegumBuilder });
 * sdk.initialize(secretKeyBase58, 'https://my-das-rpc.example');
 *
 * const tree = await sdk.createTree();
 * if (!tree.ok) throw tree.error;
 *
 * await sdk.mint({
 *   treeAddress: tree.value.treeAddress,
 *   name: 'Ticket #1',
 *   symbol: 'TIX',
 *   uri: 'https://example.com/1.json',
 *   creatorAddress: walletAddress,
 *   royaltyBasisPoints: 500,
 * });
 *
 * const receipt = await sdk.transfer(assetId, recipient);
 * ```
 */
export class CnftSDK {
  private readonly config: ResolvedCnftConfig;
  private readonly logger: ILogger;
  private readonly context = new ConnectionContext();
  private readonly rpc: RpcClient;
  private readonly trees: TreeService;
  private readonly mints: MintService;
  private readonly transfers: TransferService;
  private readonly eventEmitter: TypedEventEmitter<CnftEventPayloads>;

  constructor(config: CnftConfig) {
    this.logger = resolveLogger(config);
    this.eventEmitter = new TypedEventEmitter<CnftEventPayloads>({ logger: this.logger });
    this.config = {
      builder: config.builder,
      cluster: config.cluster ?? DEFAULT_CLUSTER,
      timeoutMs: config.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS,
      fetch: config.fetch ?? ((input, init) => fetch(input, init)),
      logger: this.logger,
      debug: config.debug ?? false,
      onStatusChange: config.onStatusChange,
    };

    this.rpc = new RpcClient(this.context, {
      timeoutMs: this.config.timeoutMs,
      fetch: this.config.fetch,
      logger: this.logger,
    });

    const deps = {
      context: this.context,
      rpc: this.rpc,
      builder: this.config.builder,
      logger: this.logger,
      events: this.eventEmitter,
      onStatusChange: this.config.onStatusChange,
    };
    this.trees = new TreeService(deps);
    this.mints = new MintService(deps);
    this.transfers = new TransferService(deps);

    this.logger.debug(`cNFT SDK configured for ${this.config.cluster}`);
  }

  /**
   * Store the wallet credential and RPC endpoint. Succeeds once per instance.
   *
   * @param credential - 64-byte secret key (base58, JSON byte array or raw bytes)
   * @param endpoint - JSON-RPC URL serving the DAS API
   */
  initialize(
    credential: Credential,
    endpoint: string
  ): Result<{ endpoint: string }, AlreadyInitializedError | InvalidArgumentError> {
    const handle = this.context.initialize(credential, endpoint);
    if (!handle.ok) {
      this.logger.warn(`Initialization failed (${handle.error.code}): ${handle.error.message}`, handle.error);
      return handle;
    }

    // An undecodable credential is reported by the operations that need the address.
    const address = handle.value.address();
    this.logger.info(`cNFT SDK initialized against ${handle.value.endpoint}`);
    this.eventEmitter.emit('initialized', {
      address: address.ok ? address.value : null,
      endpoint: handle.value.endpoint,
      timestamp: Date.now(),
    });

    return ok({ endpoint: handle.value.endpoint });
  }

  isInitialized(): boolean {
    return this.context.isInitialized();
  }

  /**
   * Address of the connected wallet
   */
  getAddress(): Result<string, NotInitializedError | InvalidCredentialError> {
    return this.context.address();
  }

  // ============================================
  // WORKFLOWS
  // ============================================

  /**
   * Create a Merkle tree owned by the connected wallet
   */
  async createTree(): Promise<Result<CreateTreeResult, CreateTreeError>> {
    return this.trees.createTree();
  }

  /**
   * Mint a compressed NFT into an existing tree
   */
  async mint(params: MintParams): Promise<Result<Signature, MintError>> {
    return this.mints.mint(params);
  }

  /**
   * Transfer a compressed NFT owned by the connected wallet
   */
  async transfer(assetId: string, toAddress: string): Promise<Result<TransferReceipt, TransferError>> {
    return this.transfers.transfer(assetId, toAddress);
  }

  // ============================================
  // DAS LOOKUPS
  // ============================================

  /**
   * Read the current state of an asset. Nothing is cached.
   */
  async getAsset(assetId: string): Promise<Result<AssetRecord, LookupError | AssetNotFoundError>> {
    const id = requireAssetId(assetId);
    if (!id.ok) return id;

    const body = await this.rpc.getAssetBatch([id.value]);
    if (!body.ok) return body;
    return parseAssetBatch(body.value, id.value);
  }

  /**
   * Read the current Merkle proof of an asset. Only valid until the tree next changes.
   */
  async getAssetProof(assetId: string): Promise<Result<AssetProof, LookupError | ProofUnavailableError>> {
    const id = requireAssetId(assetId);
    if (!id.ok) return id;

    const body = await this.rpc.getAssetProofBatch([id.value]);
    if (!body.ok) return body;
    return parseAssetProofBatch(body.value, id.value);
  }

  // ============================================
  // EVENT EMITTER API
  // ============================================

  /**
   * Subscribe to an SDK event
   *
   * @returns Unsubscribe function
   */
  on<E extends CnftEventType>(event: E, handler: CnftEventHandler<E>): () => void {
    return this.eventEmitter.on(event, handler);
  }

  off<E extends CnftEventType>(event: E, handler: CnftEventHandler<E>): void {
    this.eventEmitter.off(event, handler);
  }

  /**
   * Subscribe to the next occurrence of an SDK event
   *
   * @returns Unsubscribe function
   */
  once<E extends CnftEventType>(event: E, handler: CnftEventHandler<E>): () => void {
    return this.eventEmitter.once(event, handler);
  }

  // ============================================
  // CONFIG
  // ============================================

  getExplorerTxUrl(signature: string): string {
    return getExplorerTxUrl(signature, this.config.cluster);
  }

  getExplorerAddressUrl(address: string): string {
    return getExplorerAddressUrl(address, this.config.cluster);
  }

  getConfig(): {
    cluster: Cluster;
    timeoutMs: number;
    endpoint: string | null;
    debug: boolean;
  } {
    const endpoint = this.context.endpoint();
    return {
      cluster: this.config.cluster,
      timeoutMs: this.config.timeoutMs,
      endpoint: endpoint.ok ? endpoint.value : null,
      debug: this.config.debug,
    };
  }
}

function requireAssetId(assetId: string): Result<string, InvalidArgumentError> {
  if (!isNonEmptyString(assetId)) {
    return err(new InvalidArgumentError('Asset id must be a non-empty string', { field: 'assetId' }));
  }
  return ok(assetId.trim());
}

/**
 * Create a new CnftSDK instance (convenience function)
 */
export function createCnftSDK(config: CnftConfig): CnftSDK {
  return new CnftSDK(config);
}
