import type { H256, Transaction, Value } from '../interfaces';
import { checkedAdd, checkedSub } from './arithmetic';
import { verifySignature } from './crypto';
import type { ValidationErrorKind } from './errors';
import type { UtxoStore } from './store';
import { encodeTransaction, signingPayload, transactionOutputId } from './transaction';

export interface FullyValid {
  status: 'FullyValid';
  requires: [];
  provides: H256[];
  reward: Value;
}

/** Some inputs reference outputs the ledger does not hold (yet). */
export interface Pending {
  status: 'Pending';
  requires: H256[];
  provides: H256[];
}

export interface Rejected {
  status: 'Rejected';
  error: ValidationErrorKind;
}

export type Verdict = FullyValid | Pending | Rejected;

const reject = (error: ValidationErrorKind): Rejected => ({ status: 'Rejected', error });

/**
 * Checks a transaction against the current ledger without touching it.
 *
 * Inputs whose out point is absent are collected as `requires` instead of
 * failing, so a pool can hold the transaction until its parents commit.
 * Every input that does resolve has its signature checked either way.
 */
export function validateTransaction(tx: Transaction, ledger: UtxoStore): Verdict {
  if (tx.inputs.length === 0) {
    return reject('EmptyInputs');
  }
  if (tx.outputs.length === 0) {
    return reject('EmptyOutputs');
  }

  // One out point per transaction. A key owner can produce several valid
  // signatures over one payload, so comparing (outPoint, signature) pairs
  // alone would let the same output be counted twice.
  const seenInputs = new Set<H256>();
  for (const input of tx.inputs) {
    if (seenInputs.has(input.outPoint)) {
      return reject('DuplicateInput');
    }
    seenInputs.add(input.outPoint);
  }

  const seenOutputs = new Set<string>();
  for (const output of tx.outputs) {
    const key = `${output.value}:${output.ownerKey}`;
    if (seenOutputs.has(key)) {
      return reject('DuplicateOutput');
    }
    seenOutputs.add(key);
  }

  const payload = signingPayload(tx);
  let totalInput: Value = 0n;
  const missing = new Set<H256>();

  for (const input of tx.inputs) {
    const spent = ledger.get(input.outPoint);
    if (!spent) {
      missing.add(input.outPoint);
      continue;
    }
    if (!verifySignature(spent.ownerKey, payload, input.signature)) {
      return reject('InvalidSignature');
    }
    const next = checkedAdd(totalInput, spent.value);
    if (next === undefined) {
      return reject('InputOverflow');
    }
    totalInput = next;
  }

  const encoded = encodeTransaction(tx);
  let totalOutput: Value = 0n;
  const provides: H256[] = [];

  for (const [index, output] of tx.outputs.entries()) {
    if (output.value === 0n) {
      return reject('ZeroValueOutput');
    }
    const id = transactionOutputId(encoded, index);
    if (ledger.contains(id)) {
      return reject('OutputCollision');
    }
    const next = checkedAdd(totalOutput, output.value);
    if (next === undefined) {
      return reject('OutputOverflow');
    }
    totalOutput = next;
    provides.push(id);
  }

  if (missing.size > 0) {
    return { status: 'Pending', requires: [...missing], provides };
  }

  if (totalInput < totalOutput) {
    return reject('InsufficientInputValue');
  }
  const reward = checkedSub(totalInput, totalOutput);
  if (reward === undefined) {
    return reject('RewardUnderflow');
  }
  return { status: 'FullyValid', requires: [], provides, reward };
}
