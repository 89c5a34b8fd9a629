/**
 * DAS response parsing
 *
 * Turns raw `getAssetBatch` / `getAssetProofBatch` bodies into typed records.
 * Field names follow the DAS wire format (snake_case).
 */

import { AssetNotFoundError, ProofUnavailableError, RpcPayloadError } from '../errors/base.js';
import { isJsonObject } from '../rpc/client.js';
import type { JsonValue } from '../rpc/types.js';
import { err, ok, type Result } from '../types/result.js';
import type { AssetProof, AssetRecord, CompressionInfo } from './types.js';

/**
 * Read the first record of a `getAssetBatch` body
 */
export function parseAssetBatch(body: JsonValue, assetId: string): Result<AssetRecord, AssetNotFoundError> {
  if (!isJsonObject(body)) {
    return err(new AssetNotFoundError(assetId, { context: { reason: 'response is not a JSON object' } }));
  }

  const results = body.result;
  if (!Array.isArray(results) || results.length === 0) {
    return err(new AssetNotFoundError(assetId, payloadErrorOptions(body)));
  }

  const record = results[0];
  if (!isJsonObject(record)) {
    return err(new AssetNotFoundError(assetId, { context: { reason: 'first result is empty' } }));
  }

  const ownership = record.ownership;
  const owner = isJsonObject(ownership) && typeof ownership.owner === 'string' ? ownership.owner : undefined;

  return ok({
    id: typeof record.id === 'string' ? record.id : assetId,
    owner,
    compression: parseCompression(record.compression),
  });
}

/**
 * Read the proof keyed by `assetId` from a `getAssetProofBatch` body
 */
export function parseAssetProofBatch(body: JsonValue, assetId: string): Result<AssetProof, ProofUnavailableError> {
  const results = isJsonObject(body) ? body.result : undefined;
  if (!isJsonObject(results)) {
    return err(new ProofUnavailableError(assetId, isJsonObject(body) ? payloadErrorOptions(body) : undefined));
  }

  const entry = results[assetId];
  if (!isJsonObject(entry)) {
    return err(new ProofUnavailableError(assetId, { context: { reason: 'no proof keyed by asset id' } }));
  }

  const proof = entry.proof;
  const root = entry.root;
  if (!isStringArray(proof) || typeof root !== 'string') {
    return err(new ProofUnavailableError(assetId, { context: { reason: 'proof or root missing' } }));
  }

  return ok({
    proofPath: proof,
    root,
    treeId: typeof entry.tree_id === 'string' ? entry.tree_id : undefined,
    nodeIndex: typeof entry.node_index === 'number' ? entry.node_index : undefined,
  });
}

function parseCompression(value: JsonValue | undefined): CompressionInfo | undefined {
  if (!isJsonObject(value)) return undefined;

  const { creator_hash, data_hash, leaf_id, tree, compressed } = value;
  if (
    typeof creator_hash !== 'string' ||
    typeof data_hash !== 'string' ||
    typeof leaf_id !== 'number' ||
    !Number.isInteger(leaf_id) ||
    leaf_id < 0 ||
    typeof tree !== 'string' ||
    tree === ''
  ) {
    return undefined;
  }

  return {
    creatorHash: creator_hash,
    dataHash: data_hash,
    leafId: leaf_id,
    treeAddress: tree,
    compressed: typeof compressed === 'boolean' ? compressed : undefined,
  };
}

function isStringArray(value: JsonValue | undefined): value is string[] {
  return Array.isArray(value) && value.every((node) => typeof node === 'string');
}

/**
 * Attach a JSON-RPC `error` member, if the body carries one, as the cause
 */
function payloadErrorOptions(body: { [key: string]: JsonValue }): { cause?: Error } | undefined {
  return 'error' in body ? { cause: new RpcPayloadError(body.error) } : undefined;
}
