/**
 * cNFT Workflows
 * @module operations
 */

export { TreeService, type CreateTreeResult, type CreateTreeError } from './tree.js';
export { MintService, type MintParams, type MintError } from './mint.js';
export {
  TransferService,
  validateTransferArgs,
  type TransferReceipt,
  type TransferError,
} from './transfer.js';
export {
  TransferStateMachine,
  InvalidTransferTransitionError,
  TRANSFER_VALID_TRANSITIONS,
  type TransferState,
  type TransferStateChange,
} from './transfer-state.js';
export {
  classifyTreeSubmitFailure,
  TREE_SUBMIT_FAILURE_PATTERNS,
  type SubmitFailurePattern,
  type TreeSubmitError,
} from './classify.js';
export type { ServiceDeps } from './types.js';
