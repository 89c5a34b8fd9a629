/**
 * cNFT SDK Configuration Types
 * @module types/config
 */

import type { TransactionBuilder } from '../builder/interface.js';
import type { ILogger } from '../logger/interface.js';
import type { Cluster } from '../network/presets.js';
import type { FetchLike } from '../rpc/types.js';

/**
 * cNFT SDK Configuration
 *
 * Credential and endpoint are deliberately absent: they are passed once to
 * `initialize` and never read from the environment.
 */
export interface CnftConfig {
  /** Encodes and signs tree, mint and transfer transactions */
  builder: TransactionBuilder;

  /** Cluster used for explorer links (default: 'devnet') */
  cluster?: Cluster;

  /** Deadline for each RPC request in milliseconds (default: 30000) */
  timeoutMs?: number;

  /** Custom fetch implementation (default: global fetch) */
  fetch?: FetchLike;

  /** Logger instance (default: NoopLogger) */
  logger?: ILogger;

  /** Log at debug level to the console when no logger is given */
  debug?: boolean;

  /** Progress callback for workflow steps */
  onStatusChange?: (status: string) => void;
}

/**
 * Resolved SDK configuration with all defaults applied
 */
export interface ResolvedCnftConfig {
  builder: TransactionBuilder;
  cluster: Cluster;
  timeoutMs: number;
  fetch: FetchLike;
  logger: ILogger;
  debug: boolean;
  onStatusChange?: (status: string) => void;
}
