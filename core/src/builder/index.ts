/**
 * cNFT Transaction Builder
 * @module builder
 */

export type {
  TransactionBuilder,
  CreateTreeBuild,
  MintBuildParams,
  TransferBuildParams,
} from './interface.js';
export { runBuilder } from './run.js';
