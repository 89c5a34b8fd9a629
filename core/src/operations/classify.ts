/**
 * Submit failure classification for tree creation
 *
 * Matching is by substring on the JSON-RPC error message. This is brittle:
 * `0x1` also matches any custom program error whose hex code starts with 1
 * (`0x10`, `0x1771`, ...), and `blockhash` is case-sensitive. Replace the table with structured program error
 * codes if the RPC provider starts exposing them.
 */

import {
  ExpiredBlockhashError,
  InsufficientFundsError,
  RpcPayloadError,
  UnknownSubmitFailureError,
} from '../errors/base.js';
import type { RpcError } from '../rpc/types.js';

export type TreeSubmitError = InsufficientFundsError | ExpiredBlockhashError | UnknownSubmitFailureError;

export interface SubmitFailurePattern {
  /** Substring looked for in the RPC error message */
  marker: string;
  classify: (cause: RpcError) => TreeSubmitError;
}

/**
 * Checked in order; the first matching marker wins
 */
export const TREE_SUBMIT_FAILURE_PATTERNS: readonly SubmitFailurePattern[] = [
  // Custom program error 0x1: system program "insufficient lamports"
  { marker: '0x1', classify: (cause) => new InsufficientFundsError({ cause }) },
  { marker: 'blockhash', classify: (cause) => new ExpiredBlockhashError({ cause }) },
];

/**
 * Map a failed tree-creation submission onto its error kind. Only JSON-RPC
 * payload errors with a message are inspected; HTTP, transport and malformed
 * response failures are always UnknownSubmitFailure.
 */
export function classifyTreeSubmitFailure(
  cause: RpcError,
  patterns: readonly SubmitFailurePattern[] = TREE_SUBMIT_FAILURE_PATTERNS
): TreeSubmitError {
  const message = cause instanceof RpcPayloadError ? cause.payloadMessage : undefined;
  if (message !== undefined) {
    const match = patterns.find((pattern) => message.includes(pattern.marker));
    if (match) return match.classify(cause);
  }
  return new UnknownSubmitFailureError({ cause });
}
