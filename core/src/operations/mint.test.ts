import { describe, it, expect, vi } from 'vitest';
import { ConnectionContext } from '../connection/context.js';
import { BuildFailedError, NotInitializedError, RpcPayloadError, SubmitFailedError } from '../errors/base.js';
import {
  createServiceHarness,
  jsonResponse,
  rpcErrorBody,
  signatureBody,
  TEST_SIGNATURE,
  TEST_TREE,
} from '../testing/fixtures.js';
import { MintService, type MintParams } from './mint.js';

function mintParams(overrides: Partial<MintParams> = {}): MintParams {
  return {
    treeAddress: TEST_TREE,
    name: 'Test Ticket',
    symbol: 'TIX',
    uri: 'https://example.com/ticket.json',
    creatorAddress: 'Creator111111111111111111111111111111111111',
    royaltyBasisPoints: 500,
    ...overrides,
  };
}

describe('MintService.mint', () => {
  it('should pass the metadata through unchanged and return the signature', async () => {
    const harness = createServiceHarness({ sendTransaction: () => jsonResponse(signatureBody()) });
    const submitted = vi.fn();
    harness.events.on('mint:submitted', submitted);
    const params = mintParams();

    const result = await new MintService(harness.deps).mint(params);

    expect(result).toEqual({ ok: true, value: TEST_SIGNATURE });
    expect(harness.builder.buildMint).toHaveBeenCalledWith(harness.wallet.credential, params);
    expect(submitted).toHaveBeenCalledWith({ treeAddress: TEST_TREE, signature: TEST_SIGNATURE });
  });

  it('should return NotInitialized before building', async () => {
    const harness = createServiceHarness();

    const onError = vi.fn();
    harness.events.on('error', onError);

    const result = await new MintService({ ...harness.deps, context: new ConnectionContext() }).mint(mintParams());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotInitializedError);
      expect(onError).toHaveBeenCalledWith({ operation: 'mint', error: result.error });
      expect(harness.logger.warn).toHaveBeenCalledWith(
        `Mint failed (${result.error.code}): ${result.error.message}`,
        result.error
      );
    }
    expect(harness.builder.buildMint).not.toHaveBeenCalled();
  });

  it('should report a builder rejection as BuildFailed with the parameters', async () => {
    const harness = createServiceHarness(
      {},
      { buildMint: () => Promise.reject(new Error('name too long')) }
    );

    const result = await new MintService(harness.deps).mint(mintParams({ name: 'x'.repeat(64) }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(BuildFailedError);
      expect(result.error.message).toBe('Failed to build mint transaction: name too long');
      expect(result.error.context.name).toBe('x'.repeat(64));
    }
    expect(harness.stub.fetch).not.toHaveBeenCalled();
  });

  it('should wrap a submission failure in SubmitFailed with hints and the cause', async () => {
    const harness = createServiceHarness({
      sendTransaction: () => jsonResponse(rpcErrorBody('custom program error: 0x1')),
    });

    const result = await new MintService(harness.deps).mint(mintParams());

    expect(result.ok).toBe(false);
    if (!result.ok && result.error instanceof SubmitFailedError) {
      expect(result.error.message).toBe(
        'Mint transaction failed: RPC error: {"code":-32002,"message":"custom program error: 0x1"}'
      );
      expect(result.error.cause).toBeInstanceOf(RpcPayloadError);
      expect(result.error.hints).toContain('Insufficient SOL balance for transaction fees');
      expect(result.error.context.treeAddress).toBe(TEST_TREE);
    } else {
      expect.unreachable('expected SubmitFailedError');
    }
  });
});
