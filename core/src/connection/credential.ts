/**
 * Credential decoding and address derivation
 * @module connection/credential
 */

import { Keypair } from '@solana/web3.js';
import bs58 from 'bs58';
import { InvalidCredentialError } from '../errors/base.js';
import { err, ok, type Result } from '../types/result.js';
import { arraysEqual } from '../utils/conversions.js';

/**
 * Signing-capable secret: a 64-byte ed25519 secret key (32-byte seed followed
 * by the 32-byte public key), as base58 text, as the JSON byte array written
 * by `solana-keygen`, or as raw bytes.
 */
export type Credential = string | Uint8Array;

const SECRET_KEY_LENGTH = 64;
const SEED_LENGTH = 32;

/**
 * Decode a credential into its 64 secret-key bytes
 */
export function decodeSecretKey(credential: Credential): Result<Uint8Array, InvalidCredentialError> {
  if (credential instanceof Uint8Array) {
    return checkLength(credential);
  }

  const text = credential.trim();
  if (text === '') {
    return err(new InvalidCredentialError('Credential is empty'));
  }

  if (text.startsWith('[')) {
    return decodeJsonBytes(text);
  }

  try {
    return checkLength(bs58.decode(text));
  } catch (e) {
    return err(
      new InvalidCredentialError('Credential is not valid base58', {
        cause: e instanceof Error ? e : undefined,
      })
    );
  }
}

/**
 * Derive the base58 public address controlled by a credential.
 *
 * The public key is recomputed from the 32-byte seed; a secret key whose
 * embedded public half disagrees with the derived key is rejected.
 */
export function deriveAddress(credential: Credential): Result<string, InvalidCredentialError> {
  const decoded = decodeSecretKey(credential);
  if (!decoded.ok) return decoded;

  const secretKey = decoded.value;
  const keypair = Keypair.fromSeed(secretKey.slice(0, SEED_LENGTH));
  const derived = keypair.publicKey.toBytes();

  if (!arraysEqual(derived, secretKey.slice(SEED_LENGTH))) {
    return err(
      new InvalidCredentialError('Credential public key does not match the key derived from its seed')
    );
  }

  return ok(keypair.publicKey.toBase58());
}

function checkLength(bytes: Uint8Array): Result<Uint8Array, InvalidCredentialError> {
  if (bytes.length !== SECRET_KEY_LENGTH) {
    return err(
      new InvalidCredentialError(
        `Credential must decode to ${SECRET_KEY_LENGTH} bytes, got ${bytes.length}`
      )
    );
  }
  return ok(bytes);
}

function decodeJsonBytes(text: string): Result<Uint8Array, InvalidCredentialError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return err(
      new InvalidCredentialError('Credential is not a valid JSON byte array', {
        cause: e instanceof Error ? e : undefined,
      })
    );
  }

  if (!Array.isArray(parsed) || !parsed.every(isByte)) {
    return err(new InvalidCredentialError('Credential JSON must be an array of bytes'));
  }

  return checkLength(Uint8Array.from(parsed));
}

function isByte(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;
}
