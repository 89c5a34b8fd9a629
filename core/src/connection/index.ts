/**
 * cNFT Connection
 * @module connection
 */

export { ConnectionContext, type ConnectionHandle } from './context.js';
export { decodeSecretKey, deriveAddress, type Credential } from './credential.js';
