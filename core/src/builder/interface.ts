/**
 * Transaction Builder Contract
 * @module builder/interface
 */

import type { Credential } from '../connection/credential.js';
import type { TransactionEnvelope } from '../rpc/types.js';

/**
 * Output of tree creation: the signed transaction plus the address of the
 * tree account it creates
 */
export interface CreateTreeBuild {
  transaction: TransactionEnvelope;
  treeAddress: string;
}

/**
 * Metadata for a new compressed NFT
 */
export interface MintBuildParams {
  treeAddress: string;
  name: string;
  symbol: string;
  /** Off-chain metadata JSON URI */
  uri: string;
  creatorAddress: string;
  /** Creator's royalty on secondary sales, in basis points */
  royaltyBasisPoints: number;
}

/**
 * Everything needed to move a leaf to a new owner. `root` and `proofPath`
 * come from a single proof query and are passed through unmodified.
 */
export interface TransferBuildParams {
  toAddress: string;
  assetId: string;
  leafId: number;
  dataHash: string;
  creatorHash: string;
  root: string;
  proofPath: string[];
  treeAddress: string;
}

/**
 * Encodes and signs Bubblegum instructions. Implementations are free to fetch
 * a recent blockhash; any thrown error or rejection is reported to callers as
 * `BuildFailed`.
 */
export interface TransactionBuilder {
  buildCreateTree(credential: Credential): Promise<CreateTreeBuild>;
  buildMint(credential: Credential, params: MintBuildParams): Promise<TransactionEnvelope>;
  buildTransfer(credential: Credential, params: TransferBuildParams): Promise<TransactionEnvelope>;
}
