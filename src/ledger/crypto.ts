import nacl from 'tweetnacl';
import { blake2b } from '@noble/hashes/blake2b';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import type { H256, H512 } from '../interfaces';

// Order of the Ed25519 base point.
const GROUP_ORDER = (1n << 252n) + 27742317777372353535851937790883648493n;

export const ZERO_SIGNATURE: H512 = '0'.repeat(128);

export interface KeyPair {
  publicKey: H256;
  secretKey: Uint8Array;
}

export function hash256(data: Uint8Array): H256 {
  return bytesToHex(blake2b(data, { dkLen: 32 }));
}

function readScalar(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  return value;
}

/**
 * Rejects signatures whose S half is not reduced mod the group order, so a
 * signature has exactly one accepted encoding.
 */
export function isCanonicalSignature(signature: Uint8Array): boolean {
  return signature.length === 64 && readScalar(signature.subarray(32)) < GROUP_ORDER;
}

export function verifySignature(publicKey: H256, message: Uint8Array, signature: H512): boolean {
  const sig = hexToBytes(signature);
  const key = hexToBytes(publicKey);
  if (key.length !== 32 || !isCanonicalSignature(sig)) {
    return false;
  }
  return nacl.sign.detached.verify(message, sig, key);
}

export function sign(secretKey: Uint8Array, message: Uint8Array): H512 {
  return bytesToHex(nacl.sign.detached(message, secretKey));
}

export function keyPairFromSeed(seed: Uint8Array): KeyPair {
  const pair = nacl.sign.keyPair.fromSeed(seed);
  return { publicKey: bytesToHex(pair.publicKey), secretKey: pair.secretKey };
}
