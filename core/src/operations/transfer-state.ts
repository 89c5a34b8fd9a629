/**
 * Transfer state machine
 *
 * Idle → Validating → FetchingAsset → VerifyingOwnership → FetchingProof
 *      → Building → Submitting → Done
 *
 * Every non-terminal state may also move to Failed. Done and Failed are
 * terminal: a failed transfer is started again from scratch with a new
 * machine, never resumed.
 */

export type TransferState =
  | 'Idle'
  | 'Validating'
  | 'FetchingAsset'
  | 'VerifyingOwnership'
  | 'FetchingProof'
  | 'Building'
  | 'Submitting'
  | 'Done'
  | 'Failed';

export const TRANSFER_VALID_TRANSITIONS: Record<TransferState, readonly TransferState[]> = {
  Idle: ['Validating'],
  Validating: ['FetchingAsset', 'Failed'],
  FetchingAsset: ['VerifyingOwnership', 'Failed'],
  VerifyingOwnership: ['FetchingProof', 'Failed'],
  FetchingProof: ['Building', 'Failed'],
  Building: ['Submitting', 'Failed'],
  Submitting: ['Done', 'Failed'],
  Done: [],
  Failed: [],
};

/**
 * Error for invalid state transitions (a bug in the caller, not a runtime condition)
 */
export class InvalidTransferTransitionError extends Error {
  constructor(
    public readonly from: TransferState,
    public readonly to: TransferState
  ) {
    super(`Invalid transfer state transition: ${from} -> ${to}`);
    this.name = 'InvalidTransferTransitionError';
  }
}

export interface TransferStateChange {
  from: TransferState;
  to: TransferState;
  timestamp: number;
}

export class TransferStateMachine {
  private current: TransferState = 'Idle';
  private readonly history: TransferStateChange[] = [];

  constructor(private readonly onTransition?: (change: TransferStateChange) => void) {}

  get state(): TransferState {
    return this.current;
  }

  isTerminal(): boolean {
    return TRANSFER_VALID_TRANSITIONS[this.current].length === 0;
  }

  isValidTransition(to: TransferState): boolean {
    return TRANSFER_VALID_TRANSITIONS[this.current].includes(to);
  }

  transition(to: TransferState): void {
    if (!this.isValidTransition(to)) {
      throw new InvalidTransferTransitionError(this.current, to);
    }

    const change: TransferStateChange = { from: this.current, to, timestamp: Date.now() };
    this.current = to;
    this.history.push(change);
    this.onTransition?.(change);
  }

  getHistory(): TransferStateChange[] {
    return [...this.history];
  }
}
