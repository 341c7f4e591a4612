import type { Transaction } from '../interfaces';
import { checkedAdd } from './arithmetic';
import { RewardOverflowError } from './errors';
import type { UtxoStore } from './store';
import type { FullyValid } from './validator';

/**
 * Applies a fully validated transaction. The verdict must come from
 * `validateTransaction` against this same ledger state.
 *
 * The reward check runs before the first write, so an overflow leaves the
 * ledger untouched.
 */
export function commitTransaction(tx: Transaction, verdict: FullyValid, ledger: UtxoStore): void {
  const pooled = checkedAdd(ledger.getRewardPool(), verdict.reward);
  if (pooled === undefined) {
    throw new RewardOverflowError();
  }
  ledger.putRewardPool(pooled);

  for (const input of tx.inputs) {
    ledger.remove(input.outPoint);
  }

  tx.outputs.forEach((output, index) => {
    ledger.put(verdict.provides[index], output);
  });
}
