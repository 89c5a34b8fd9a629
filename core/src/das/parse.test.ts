import { describe, it, expect } from 'vitest';
import { AssetNotFoundError, ProofUnavailableError, RpcPayloadError } from '../errors/base.js';
import {
  assetBatchBody,
  proofBatchBody,
  rpcErrorBody,
  TEST_ASSET_ID,
  TEST_PROOF_PATH,
  TEST_ROOT,
  TEST_TREE,
} from '../testing/fixtures.js';
import { parseAssetBatch, parseAssetProofBatch } from './parse.js';

describe('parseAssetBatch', () => {
  it('should read owner and compression from the first record', () => {
    const result = parseAssetBatch(assetBatchBody({ owner: 'OwnerA' }), TEST_ASSET_ID);

    expect(result).toEqual({
      ok: true,
      value: {
        id: TEST_ASSET_ID,
        owner: 'OwnerA',
        compression: {
          creatorHash: 'CreatorHash111111111111111111111111111111111',
          dataHash: 'DataHash11111111111111111111111111111111111',
          leafId: 7,
          treeAddress: TEST_TREE,
          compressed: true,
        },
      },
    });
  });

  it('should leave compression undefined when a field is missing', () => {
    const body = assetBatchBody({
      owner: 'OwnerA',
      compression: { creator_hash: 'c', data_hash: 'd', tree: TEST_TREE },
    });

    const result = parseAssetBatch(body, TEST_ASSET_ID);

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.compression).toBeUndefined();
  });

  it('should reject a negative or fractional leaf id', () => {
    const negative = parseAssetBatch(
      assetBatchBody({ compression: { creator_hash: 'c', data_hash: 'd', leaf_id: -1, tree: TEST_TREE } }),
      TEST_ASSET_ID
    );
    const fractional = parseAssetBatch(
      assetBatchBody({ compression: { creator_hash: 'c', data_hash: 'd', leaf_id: 1.5, tree: TEST_TREE } }),
      TEST_ASSET_ID
    );

    expect(negative.ok && negative.value.compression).toBeUndefined();
    expect(fractional.ok && fractional.value.compression).toBeUndefined();
  });

  it('should report AssetNotFound for an empty result array', () => {
    const result = parseAssetBatch({ jsonrpc: '2.0', id: 'test', result: [] }, TEST_ASSET_ID);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(AssetNotFoundError);
      expect(result.error.assetId).toBe(TEST_ASSET_ID);
      expect(result.error.cause).toBeUndefined();
    }
  });

  it('should report AssetNotFound for a null first record', () => {
    const result = parseAssetBatch({ jsonrpc: '2.0', id: 'test', result: [null] }, TEST_ASSET_ID);

    expect(result.ok).toBe(false);
  });

  it('should carry a JSON-RPC error member as the cause', () => {
    const result = parseAssetBatch(rpcErrorBody('Method not found', -32601), TEST_ASSET_ID);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.cause).toBeInstanceOf(RpcPayloadError);
      expect(result.error.cause?.message).toBe('RPC error: {"code":-32601,"message":"Method not found"}');
    }
  });

  it('should reject a body that is not an object', () => {
    expect(parseAssetBatch('nope', TEST_ASSET_ID).ok).toBe(false);
    expect(parseAssetBatch([], TEST_ASSET_ID).ok).toBe(false);
  });
});

describe('parseAssetProofBatch', () => {
  it('should read the proof keyed by asset id', () => {
    const result = parseAssetProofBatch(proofBatchBody(), TEST_ASSET_ID);

    expect(result).toEqual({
      ok: true,
      value: { proofPath: TEST_PROOF_PATH, root: TEST_ROOT, treeId: TEST_TREE, nodeIndex: 16391 },
    });
  });

  it('should report ProofUnavailable when the asset id is not a key', () => {
    const result = parseAssetProofBatch(proofBatchBody('SomeOtherAsset'), TEST_ASSET_ID);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ProofUnavailableError);
      expect(result.error.context.reason).toBe('no proof keyed by asset id');
    }
  });

  it('should report ProofUnavailable when proof nodes are not strings', () => {
    const body = { result: { [TEST_ASSET_ID]: { proof: ['a', 1], root: TEST_ROOT } } };

    const result = parseAssetProofBatch(body, TEST_ASSET_ID);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.context.reason).toBe('proof or root missing');
  });

  it('should carry a JSON-RPC error member as the cause', () => {
    const result = parseAssetProofBatch(rpcErrorBody('Internal error', -32603), TEST_ASSET_ID);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.cause).toBeInstanceOf(RpcPayloadError);
  });
});
