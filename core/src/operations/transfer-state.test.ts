import { describe, it, expect, vi } from 'vitest';
import { InvalidTransferTransitionError, TransferStateMachine } from './transfer-state.js';

describe('TransferStateMachine', () => {
  it('should start idle and not terminal', () => {
    const machine = new TransferStateMachine();

    expect(machine.state).toBe('Idle');
    expect(machine.isTerminal()).toBe(false);
    expect(machine.getHistory()).toEqual([]);
  });

  it('should walk the happy path to Done', () => {
    const onTransition = vi.fn();
    const machine = new TransferStateMachine(onTransition);

    machine.transition('Validating');
    machine.transition('FetchingAsset');
    machine.transition('VerifyingOwnership');
    machine.transition('FetchingProof');
    machine.transition('Building');
    machine.transition('Submitting');
    machine.transition('Done');

    expect(machine.state).toBe('Done');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory().map((change) => change.to)).toEqual([
      'Validating',
      'FetchingAsset',
      'VerifyingOwnership',
      'FetchingProof',
      'Building',
      'Submitting',
      'Done',
    ]);
    expect(onTransition).toHaveBeenCalledTimes(7);
    expect(onTransition.mock.calls[0][0]).toMatchObject({ from: 'Idle', to: 'Validating' });
  });

  it('should allow Failed from any non-terminal state after Idle', () => {
    const machine = new TransferStateMachine();
    machine.transition('Validating');
    machine.transition('FetchingAsset');

    machine.transition('Failed');

    expect(machine.state).toBe('Failed');
    expect(machine.isTerminal()).toBe(true);
  });

  it('should reject skipped steps', () => {
    const machine = new TransferStateMachine();
    machine.transition('Validating');

    expect(() => machine.transition('FetchingProof')).toThrow(InvalidTransferTransitionError);
    expect(() => machine.transition('FetchingProof')).toThrow(
      'Invalid transfer state transition: Validating -> FetchingProof'
    );
    expect(machine.state).toBe('Validating');
  });

  it('should not leave a terminal state', () => {
    const machine = new TransferStateMachine();
    machine.transition('Validating');
    machine.transition('Failed');

    expect(machine.isValidTransition('Validating')).toBe(false);
    expect(() => machine.transition('Validating')).toThrow(InvalidTransferTransitionError);
  });

  it('should return a copy of the history', () => {
    const machine = new TransferStateMachine();
    machine.transition('Validating');

    machine.getHistory().pop();

    expect(machine.getHistory()).toHaveLength(1);
  });
});
