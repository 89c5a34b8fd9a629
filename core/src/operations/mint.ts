/**
 * Compressed NFT minting
 *
 * credential → buildMint → submit. Name, symbol, URI and creator address are
 * passed through opaque; the builder enforces their format.
 */

import type { MintBuildParams } from '../builder/interface.js';
import { runBuilder } from '../builder/run.js';
import { SubmitFailedError, type BuildFailedError, type NotInitializedError } from '../errors/base.js';
import type { Signature } from '../rpc/types.js';
import { err, ok, type Result } from '../types/result.js';
import { reportFailure, reportStatus } from './report.js';
import type { ServiceDeps } from './types.js';

export type MintParams = MintBuildParams;

export type MintError = NotInitializedError | BuildFailedError | SubmitFailedError;

const MINT_SUBMIT_HINTS = [
  'Insufficient SOL balance for transaction fees',
  'Invalid Merkle tree address, or the wallet is not the tree creator or delegate',
  'Network congestion or RPC issues',
] as const;

export class MintService {
  constructor(private readonly deps: ServiceDeps) {}

  /**
   * Mint a compressed NFT into an existing tree
   *
   * @returns The transaction signature
   */
  async mint(params: MintParams): Promise<Result<Signature, MintError>> {
    const { deps } = this;
    const { context, rpc, builder, events } = deps;
    const diagnostics = { ...params };

    const credential = context.credential();
    if (!credential.ok) return err(reportFailure(deps, 'mint', credential.error));

    reportStatus(deps, 'Building mint transaction...');
    const built = await runBuilder('mint', () => builder.buildMint(credential.value, params), diagnostics);
    if (!built.ok) return err(reportFailure(deps, 'mint', built.error));

    reportStatus(deps, 'Submitting mint transaction...');
    const submitted = await rpc.submit(built.value);
    if (!submitted.ok) {
      const error = new SubmitFailedError(
        `Mint transaction failed: ${submitted.error.message}`,
        MINT_SUBMIT_HINTS,
        { cause: submitted.error, retryable: submitted.error.retryable, context: diagnostics }
      );
      return err(reportFailure(deps, 'mint', error));
    }

    deps.logger?.info(`Minted into tree ${params.treeAddress}: ${submitted.value}`);
    events?.emit('mint:submitted', { treeAddress: params.treeAddress, signature: submitted.value });
    return ok(submitted.value);
  }
}
