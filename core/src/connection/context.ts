/**
 * Connection Context
 *
 * Holds the credential + RPC endpoint pair. Write-once: the first successful
 * `initialize` fixes the values for the lifetime of the context, later calls
 * are rejected and leave the state untouched. Construct one context and pass
 * it to every service that needs it.
 */

import {
  AlreadyInitializedError,
  InvalidArgumentError,
  type InvalidCredentialError,
  NotInitializedError,
} from '../errors/base.js';
import { err, ok, type Result } from '../types/result.js';
import { deriveAddress, type Credential } from './credential.js';

interface ConnectionState {
  readonly credential: Credential;
  readonly endpoint: string;
}

/**
 * Read-only view of an established connection
 */
export interface ConnectionHandle {
  readonly endpoint: string;
  /** Public address controlled by the credential */
  address(): Result<string, InvalidCredentialError>;
}

export class ConnectionContext {
  private state: ConnectionState | null = null;
  private cachedAddress: string | null = null;

  /**
   * Establish the connection. Succeeds exactly once.
   *
   * @param credential - Secret key of the wallet that pays for and signs transactions
   * @param endpoint - JSON-RPC URL; must serve the DAS API for transfers
   */
  initialize(
    credential: Credential,
    endpoint: string
  ): Result<ConnectionHandle, AlreadyInitializedError | InvalidArgumentError> {
    if (this.state) {
      return err(new AlreadyInitializedError({ context: { endpoint: this.state.endpoint } }));
    }

    const endpointCheck = validateEndpoint(endpoint);
    if (!endpointCheck.ok) return endpointCheck;

    this.state = Object.freeze({
      credential: credential instanceof Uint8Array ? Uint8Array.from(credential) : credential,
      endpoint: endpointCheck.value,
    });

    const state = this.state;
    return ok({
      endpoint: state.endpoint,
      address: () => this.deriveCachedAddress(state.credential),
    });
  }

  isInitialized(): boolean {
    return this.state !== null;
  }

  /**
   * The stored credential. Byte credentials are copied on every read.
   */
  credential(): Result<Credential, NotInitializedError> {
    if (!this.state) return err(new NotInitializedError());
    const { credential } = this.state;
    return ok(credential instanceof Uint8Array ? Uint8Array.from(credential) : credential);
  }

  endpoint(): Result<string, NotInitializedError> {
    if (!this.state) return err(new NotInitializedError());
    return ok(this.state.endpoint);
  }

  /**
   * Public address derived from the stored credential
   */
  address(): Result<string, NotInitializedError | InvalidCredentialError> {
    if (!this.state) return err(new NotInitializedError());
    return this.deriveCachedAddress(this.state.credential);
  }

  private deriveCachedAddress(credential: Credential): Result<string, InvalidCredentialError> {
    if (this.cachedAddress !== null) return ok(this.cachedAddress);

    const derived = deriveAddress(credential);
    if (derived.ok) {
      this.cachedAddress = derived.value;
    }
    return derived;
  }
}

function validateEndpoint(endpoint: string): Result<string, InvalidArgumentError> {
  const trimmed = typeof endpoint === 'string' ? endpoint.trim() : '';
  if (trimmed === '') {
    return err(new InvalidArgumentError('RPC endpoint must be a non-empty URL', { field: 'endpoint' }));
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch (e) {
    return err(
      new InvalidArgumentError(`RPC endpoint is not a valid URL: ${trimmed}`, {
        field: 'endpoint',
        cause: e instanceof Error ? e : undefined,
      })
    );
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return err(
      new InvalidArgumentError(`RPC endpoint must use http or https, got ${url.protocol}`, {
        field: 'endpoint',
      })
    );
  }

  return ok(trimmed);
}
