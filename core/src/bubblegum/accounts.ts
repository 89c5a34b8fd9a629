/**
 * Account helpers for TransactionBuilder implementations
 * @module bubblegum/accounts
 */

import { PublicKey, type AccountMeta } from '@solana/web3.js';
import bs58 from 'bs58';
import { InvalidArgumentError } from '../errors/base.js';
import { err, ok, type Result } from '../types/result.js';
import { BUBBLEGUM_PROGRAM_ID, HASH_LENGTH } from './constants.js';

/**
 * Tree config PDA: seeds = [merkle_tree] under the Bubblegum program
 */
export function deriveTreeConfigAddress(
  treeAddress: string | PublicKey,
  programId: PublicKey = BUBBLEGUM_PROGRAM_ID
): PublicKey {
  const tree = treeAddress instanceof PublicKey ? treeAddress : new PublicKey(treeAddress);
  const [treeConfig] = PublicKey.findProgramAddressSync([tree.toBytes()], programId);
  return treeConfig;
}

/**
 * Decode a base58 hash (proof node, root, data or creator hash) to 32 bytes
 */
export function decodeHash(value: string, field: string): Result<Uint8Array, InvalidArgumentError> {
  let bytes: Uint8Array;
  try {
    bytes = bs58.decode(value);
  } catch (e) {
    return err(
      new InvalidArgumentError(`${field} is not valid base58: ${value}`, {
        field,
        cause: e instanceof Error ? e : undefined,
      })
    );
  }

  if (bytes.length !== HASH_LENGTH) {
    return err(
      new InvalidArgumentError(`${field} must decode to ${HASH_LENGTH} bytes, got ${bytes.length}`, {
        field,
      })
    );
  }
  return ok(bytes);
}

/**
 * Decode an ordered proof path, failing on the first malformed node
 */
export function decodeProofPath(proofPath: readonly string[]): Result<Uint8Array[], InvalidArgumentError> {
  const nodes: Uint8Array[] = [];
  for (const [index, node] of proofPath.entries()) {
    const decoded = decodeHash(node, `proofPath[${index}]`);
    if (!decoded.ok) return decoded;
    nodes.push(decoded.value);
  }
  return ok(nodes);
}

/**
 * Proof nodes as the read-only, non-signer remaining accounts a Bubblegum
 * transfer instruction expects, in leaf-to-root order
 */
export function toProofAccountMetas(proofPath: readonly string[]): Result<AccountMeta[], InvalidArgumentError> {
  const decoded = decodeProofPath(proofPath);
  if (!decoded.ok) return decoded;

  return ok(
    decoded.value.map((node) => ({
      pubkey: new PublicKey(node),
      isSigner: false,
      isWritable: false,
    }))
  );
}
