import { concatBytes } from '@noble/hashes/utils';
import type { H256, Transaction, TransactionOutput } from '../interfaces';
import { encodeBytes, encodeH256, encodeOutput, encodeTransaction, encodeU64, encodeVec } from './codec';
import { hash256, sign, ZERO_SIGNATURE } from './crypto';

export { encodeTransaction };

/**
 * The bytes every spender signs: the transaction with all input signatures
 * zeroed, so each owner can sign independently of the others.
 */
export function signingPayload(tx: Transaction): Uint8Array {
  return encodeTransaction({
    inputs: tx.inputs.map((input) => ({ outPoint: input.outPoint, signature: ZERO_SIGNATURE })),
    outputs: tx.outputs,
  });
}

export function transactionHash(tx: Transaction): H256 {
  return hash256(encodeTransaction(tx));
}

// Binds the new output to the exact signed bytes of the transaction.
export function transactionOutputId(encodedTx: Uint8Array, index: bigint | number): H256 {
  return hash256(concatBytes(encodeBytes(encodedTx), encodeU64(index)));
}

export function genesisOutputId(output: TransactionOutput): H256 {
  return hash256(encodeOutput(output));
}

export function rewardOutputId(output: TransactionOutput, height: number): H256 {
  return hash256(concatBytes(encodeOutput(output), encodeU64(height)));
}

export function blockId(height: number, transactions: readonly Transaction[]): H256 {
  return hash256(
    concatBytes(encodeU64(height), encodeVec(transactions.map(transactionHash), encodeH256)),
  );
}

/**
 * Fills every input's signature over the signing payload. `secretKeys[i]`
 * signs input `i`.
 */
export function signTransaction(tx: Transaction, secretKeys: readonly Uint8Array[]): Transaction {
  if (secretKeys.length !== tx.inputs.length) {
    throw new RangeError(`expected ${tx.inputs.length} secret keys, got ${secretKeys.length}`);
  }
  const payload = signingPayload(tx);
  return {
    inputs: tx.inputs.map((input, i) => ({
      outPoint: input.outPoint,
      signature: sign(secretKeys[i], payload),
    })),
    outputs: tx.outputs.map((output) => ({ ...output })),
  };
}

export function sameOutput(a: TransactionOutput | undefined, b: TransactionOutput | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.value === b.value && a.ownerKey === b.ownerKey;
}
