/**
 * Status and failure reporting shared by the workflows
 * @module operations/report
 */

import type { CnftError } from '../errors/base.js';
import type { CnftEventPayloads } from '../types/events.js';
import type { ServiceDeps } from './types.js';

export type WorkflowName = CnftEventPayloads['error']['operation'];

const WORKFLOW_LABELS: Record<WorkflowName, string> = {
  createTree: 'Tree creation',
  mint: 'Mint',
  transfer: 'Transfer',
};

/**
 * Log a progress message and hand it to `onStatusChange`. The callback
 * cannot fail the workflow: a throw is logged at error level.
 */
export function reportStatus(deps: ServiceDeps, status: string): void {
  deps.logger?.debug(status);
  if (!deps.onStatusChange) return;

  try {
    deps.onStatusChange(status);
  } catch (error) {
    deps.logger?.error(`onStatusChange threw on "${status}"`, error);
  }
}

/**
 * Warn and emit `error` for a failure the workflow is about to return
 */
export function reportFailure<E extends CnftError>(deps: ServiceDeps, operation: WorkflowName, error: E): E {
  deps.logger?.warn(`${WORKFLOW_LABELS[operation]} failed (${error.code}): ${error.message}`, error);
  deps.events?.emit('error', { operation, error });
  return error;
}
