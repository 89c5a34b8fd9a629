/**
 * Shared service dependencies
 * @module operations/types
 */

import type { TransactionBuilder } from '../builder/interface.js';
import type { ConnectionContext } from '../connection/context.js';
import type { TypedEventEmitter } from '../events/emitter.js';
import type { ILogger } from '../logger/interface.js';
import type { RpcClient } from '../rpc/client.js';
import type { CnftEventPayloads } from '../types/events.js';

export interface ServiceDeps {
  context: ConnectionContext;
  rpc: RpcClient;
  builder: TransactionBuilder;
  logger?: ILogger;
  events?: TypedEventEmitter<CnftEventPayloads>;
  onStatusChange?: (status: string) => void;
}
