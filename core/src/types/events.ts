/**
 * SDK Event Types
 * @module types/events
 */

import type { CnftError } from '../errors/base.js';
import type { TransferState } from '../operations/transfer-state.js';

/**
 * Event payload for each event type
 */
export interface CnftEventPayloads {
  // Lifecycle
  initialized: { address: string | null; endpoint: string; timestamp: number };

  // Tree
  'tree:created': { treeAddress: string; signature: string };

  // Mint
  'mint:submitted': { treeAddress: string; signature: string };

  // Transfer
  'transfer:state': { assetId: string; from: TransferState; to: TransferState };
  'transfer:submitted': { assetId: string; toAddress: string; signature: string };

  // Any classified failure returned by a workflow
  error: { operation: 'createTree' | 'mint' | 'transfer'; error: CnftError };
}

export type CnftEventType = keyof CnftEventPayloads;

export type CnftEventHandler<E extends CnftEventType> = (
  payload: CnftEventPayloads[E]
) => void;
