/**
 * Merkle tree creation
 *
 * credential → buildCreateTree → submit. The tree address comes from the
 * build step; the submit response only supplies the signature.
 */

import { runBuilder } from '../builder/run.js';
import type { BuildFailedError, NotInitializedError } from '../errors/base.js';
import { err, ok, type Result } from '../types/result.js';
import { classifyTreeSubmitFailure, type TreeSubmitError } from './classify.js';
import { reportFailure, reportStatus } from './report.js';
import type { ServiceDeps } from './types.js';

export interface CreateTreeResult {
  /** Address of the new Merkle tree account */
  treeAddress: string;
  /** Signature of the creation transaction */
  signature: string;
}

export type CreateTreeError = NotInitializedError | BuildFailedError | TreeSubmitError;

export class TreeService {
  constructor(private readonly deps: ServiceDeps) {}

  /**
   * Create a Merkle tree for compressed NFTs. Not retried: on
   * ExpiredBlockhash call again so a fresh blockhash is built in.
   */
  async createTree(): Promise<Result<CreateTreeResult, CreateTreeError>> {
    const { deps } = this;
    const { context, rpc, builder, events } = deps;

    const credential = context.credential();
    if (!credential.ok) return err(reportFailure(deps, 'createTree', credential.error));

    reportStatus(deps, 'Building tree creation transaction...');
    const built = await runBuilder('tree creation', () => builder.buildCreateTree(credential.value));
    if (!built.ok) return err(reportFailure(deps, 'createTree', built.error));

    const { transaction, treeAddress } = built.value;
    reportStatus(deps, 'Submitting tree creation transaction...');
    const submitted = await rpc.submit(transaction);

    if (!submitted.ok) {
      const error = classifyTreeSubmitFailure(submitted.error).withContext({ treeAddress });
      return err(reportFailure(deps, 'createTree', error));
    }

    deps.logger?.info(`Merkle tree created: ${treeAddress}`);
    events?.emit('tree:created', { treeAddress, signature: submitted.value });
    return ok({ treeAddress, signature: submitted.value });
  }
}
