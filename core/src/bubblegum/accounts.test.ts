import { Keypair, PublicKey } from '@solana/web3.js';
import bs58 from 'bs58';
import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../errors/base.js';
import { decodeHash, decodeProofPath, deriveTreeConfigAddress, toProofAccountMetas } from './accounts.js';
import { BUBBLEGUM_PROGRAM_ID } from './constants.js';

const NODE_A = bs58.encode(new Uint8Array(32).fill(1));
const NODE_B = bs58.encode(new Uint8Array(32).fill(2));

describe('deriveTreeConfigAddress', () => {
  it('should derive the PDA seeded by the tree address', () => {
    const tree = Keypair.generate().publicKey;
    const [expected] = PublicKey.findProgramAddressSync([tree.toBytes()], BUBBLEGUM_PROGRAM_ID);

    expect(deriveTreeConfigAddress(tree).equals(expected)).toBe(true);
    expect(deriveTreeConfigAddress(tree.toBase58()).equals(expected)).toBe(true);
  });
});

describe('decodeHash', () => {
  it('should decode a 32-byte base58 hash', () => {
    const result = decodeHash(NODE_A, 'root');

    expect(result.ok).toBe(true);
    if (result.ok) expect(Array.from(result.value)).toEqual(new Array(32).fill(1));
  });

  it('should reject a hash of the wrong length', () => {
    const result = decodeHash(bs58.encode(new Uint8Array(31).fill(1)), 'root');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe('root');
      expect(result.error.message).toBe('root must decode to 32 bytes, got 31');
    }
  });

  it('should reject text outside the base58 alphabet', () => {
    const result = decodeHash('0OIl', 'dataHash');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('dataHash is not valid base58: 0OIl');
  });
});

describe('decodeProofPath', () => {
  it('should name the index of the first malformed node', () => {
    const result = decodeProofPath([NODE_A, 'short', NODE_B]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidArgumentError);
      expect(result.error.field).toBe('proofPath[1]');
    }
  });

  it('should accept an empty path', () => {
    expect(decodeProofPath([])).toEqual({ ok: true, value: [] });
  });
});

describe('toProofAccountMetas', () => {
  it('should return read-only non-signer metas in order', () => {
    const result = toProofAccountMetas([NODE_A, NODE_B]);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((meta) => meta.pubkey.toBase58())).toEqual([NODE_A, NODE_B]);
      expect(result.value.every((meta) => !meta.isSigner && !meta.isWritable)).toBe(true);
    }
  });
});
