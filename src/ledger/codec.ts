import { concatBytes, hexToBytes } from '@noble/hashes/utils';
import type { H256, H512, Transaction, TransactionInput, TransactionOutput } from '../interfaces';

export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;

function encodeUnsigned(value: bigint, bytes: number, max: bigint): Uint8Array {
  if (value < 0n || value > max) {
    throw new RangeError(`value ${value} does not fit in ${bytes * 8} bits`);
  }
  const out = new Uint8Array(bytes);
  let rest = value;
  for (let i = 0; i < bytes; i++) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}

export function encodeU64(value: bigint | number): Uint8Array {
  return encodeUnsigned(BigInt(value), 8, U64_MAX);
}

export function encodeU128(value: bigint): Uint8Array {
  return encodeUnsigned(value, 16, U128_MAX);
}

/**
 * Compact (variable-width) length prefix. Small values use the two low bits
 * as a mode tag; anything from 2^30 up is written as its minimal
 * little-endian bytes after a header byte holding the byte count.
 */
export function encodeCompact(value: bigint | number): Uint8Array {
  const n = BigInt(value);
  if (n < 0n) {
    throw new RangeError('compact values are unsigned');
  }
  if (n < 1n << 6n) {
    return Uint8Array.of(Number(n << 2n));
  }
  if (n < 1n << 14n) {
    return encodeUnsigned((n << 2n) | 1n, 2, 0xffffn);
  }
  if (n < 1n << 30n) {
    return encodeUnsigned((n << 2n) | 2n, 4, 0xffffffffn);
  }
  const body: number[] = [];
  let rest = n;
  while (rest > 0n) {
    body.push(Number(rest & 0xffn));
    rest >>= 8n;
  }
  return Uint8Array.of(((body.length - 4) << 2) | 3, ...body);
}

function fixedHex(hex: string, bytes: number): Uint8Array {
  const out = hexToBytes(hex);
  if (out.length !== bytes) {
    throw new RangeError(`expected ${bytes} bytes, got ${out.length}`);
  }
  return out;
}

export function encodeH256(hex: H256): Uint8Array {
  return fixedHex(hex, 32);
}

export function encodeH512(hex: H512): Uint8Array {
  return fixedHex(hex, 64);
}

export function encodeBytes(bytes: Uint8Array): Uint8Array {
  return concatBytes(encodeCompact(bytes.length), bytes);
}

export function encodeVec<T>(items: readonly T[], encodeItem: (item: T) => Uint8Array): Uint8Array {
  return concatBytes(encodeCompact(items.length), ...items.map(encodeItem));
}

export function encodeOutput(output: TransactionOutput): Uint8Array {
  return concatBytes(encodeU128(output.value), encodeH256(output.ownerKey));
}

export function encodeInput(input: TransactionInput): Uint8Array {
  return concatBytes(encodeH256(input.outPoint), encodeH512(input.signature));
}

export function encodeTransaction(tx: Transaction): Uint8Array {
  return concatBytes(encodeVec(tx.inputs, encodeInput), encodeVec(tx.outputs, encodeOutput));
}
