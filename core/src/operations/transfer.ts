/**
 * Compressed NFT transfer
 *
 * Validates arguments, reads the asset, checks that the connected wallet owns
 * it, reads the Merkle proof, then builds and submits the transfer. The
 * proof/root pair is a snapshot: any tree mutation between the proof read and
 * submission invalidates it, so nothing is cached and a failed transfer must
 * be started again from the beginning.
 */

import { runBuilder } from '../builder/run.js';
import {
  InvalidArgumentError,
  NotCompressedError,
  NotOwnerError,
  SubmitFailedError,
  type AssetNotFoundError,
  type BuildFailedError,
  type CnftError,
  type InvalidCredentialError,
  type NotInitializedError,
  type ProofUnavailableError,
} from '../errors/base.js';
import { parseAssetBatch, parseAssetProofBatch } from '../das/parse.js';
import type { RpcError, Signature } from '../rpc/types.js';
import { err, ok, type Result } from '../types/result.js';
import { isBase58, isNonEmptyString } from '../utils/validation.js';
import { reportFailure, reportStatus } from './report.js';
import { TransferStateMachine } from './transfer-state.js';
import type { ServiceDeps } from './types.js';

export interface TransferReceipt {
  signature: Signature;
  assetId: string;
  toAddress: string;
  treeAddress: string;
  leafId: number;
}

export type TransferError =
  | InvalidArgumentError
  | NotInitializedError
  | InvalidCredentialError
  | AssetNotFoundError
  | NotOwnerError
  | ProofUnavailableError
  | NotCompressedError
  | BuildFailedError
  | SubmitFailedError
  | RpcError;

const TRANSFER_SUBMIT_HINTS = [
  'Insufficient SOL balance for transaction fees',
  'The Merkle proof is stale: the tree changed after the proof was fetched',
  'The asset was transferred concurrently by another request',
  'Network congestion or RPC issues',
] as const;

export class TransferService {
  constructor(private readonly deps: ServiceDeps) {}

  /**
   * Transfer a compressed NFT owned by the connected wallet
   *
   * @param assetId - DAS asset id of the compressed NFT
   * @param toAddress - Recipient wallet address (base58)
   */
  async transfer(assetId: string, toAddress: string): Promise<Result<TransferReceipt, TransferError>> {
    const { deps } = this;
    const { context, rpc, builder, events } = deps;

    const machine = new TransferStateMachine(({ from, to }) => {
      deps.logger?.debug(`Transfer ${assetId}: ${from} -> ${to}`);
      events?.emit('transfer:state', { assetId, from, to });
    });

    const fail = (error: TransferError): Result<never, TransferError> => {
      machine.transition('Failed');
      return err(reportFailure(deps, 'transfer', error));
    };

    machine.transition('Validating');
    const validated = validateTransferArgs(assetId, toAddress);
    if (!validated.ok) return fail(validated.error);
    const id = validated.value;

    const credential = context.credential();
    if (!credential.ok) return fail(credential.error);

    machine.transition('FetchingAsset');
    reportStatus(deps, 'Fetching asset data...');
    const assetBody = await rpc.getAssetBatch([id]);
    if (!assetBody.ok) return fail(withAssetContext(assetBody.error, id, 'getAssetBatch'));

    const asset = parseAssetBatch(assetBody.value, id);
    if (!asset.ok) return fail(asset.error);

    machine.transition('VerifyingOwnership');
    const caller = context.address();
    if (!caller.ok) return fail(caller.error);
    if (asset.value.owner !== caller.value) {
      return fail(new NotOwnerError(id, asset.value.owner, caller.value));
    }

    machine.transition('FetchingProof');
    reportStatus(deps, 'Fetching asset proof...');
    const proofBody = await rpc.getAssetProofBatch([id]);
    if (!proofBody.ok) return fail(withAssetContext(proofBody.error, id, 'getAssetProofBatch'));

    const proof = parseAssetProofBatch(proofBody.value, id);
    if (!proof.ok) return fail(proof.error);

    const compression = asset.value.compression;
    if (!compression || compression.compressed === false) {
      return fail(new NotCompressedError(id));
    }

    machine.transition('Building');
    reportStatus(deps, 'Building transfer transaction...');
    const built = await runBuilder(
      'transfer',
      () =>
        builder.buildTransfer(credential.value, {
          toAddress,
          assetId: id,
          leafId: compression.leafId,
          dataHash: compression.dataHash,
          creatorHash: compression.creatorHash,
          root: proof.value.root,
          proofPath: proof.value.proofPath,
          treeAddress: compression.treeAddress,
        }),
      { assetId: id, toAddress }
    );
    if (!built.ok) return fail(built.error);

    machine.transition('Submitting');
    reportStatus(deps, 'Submitting transfer transaction...');
    const submitted = await rpc.submit(built.value);
    if (!submitted.ok) {
      return fail(
        new SubmitFailedError(
          `Transfer transaction failed: ${submitted.error.message}. Restart the transfer to read a fresh proof.`,
          TRANSFER_SUBMIT_HINTS,
          {
            cause: submitted.error,
            retryable: true,
            context: { assetId: id, toAddress, root: proof.value.root },
          }
        )
      );
    }

    machine.transition('Done');
    deps.logger?.info(`Transferred ${id} to ${toAddress}: ${submitted.value}`);
    events?.emit('transfer:submitted', { assetId: id, toAddress, signature: submitted.value });

    return ok({
      signature: submitted.value,
      assetId: id,
      toAddress,
      treeAddress: compression.treeAddress,
      leafId: compression.leafId,
    });
  }
}

/**
 * Check transfer arguments before any I/O
 *
 * @returns The trimmed asset id
 */
export function validateTransferArgs(assetId: unknown, toAddress: unknown): Result<string, InvalidArgumentError> {
  if (!isNonEmptyString(assetId)) {
    return err(new InvalidArgumentError('Asset id must be a non-empty string', { field: 'assetId' }));
  }

  if (!isNonEmptyString(toAddress)) {
    return err(
      new InvalidArgumentError('Recipient address must be a non-empty base58 string', { field: 'toAddress' })
    );
  }

  if (!isBase58(toAddress)) {
    return err(
      new InvalidArgumentError(
        `Recipient address must be base58 (no 0, O, I or l): ${toAddress}`,
        { field: 'toAddress' }
      )
    );
  }

  return ok(assetId.trim());
}

function withAssetContext<E extends CnftError>(error: E, assetId: string, method: string): E {
  return error.withContext({ assetId, method });
}
