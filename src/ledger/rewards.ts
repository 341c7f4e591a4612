import type { H256, TransactionOutput, Value } from '../interfaces';
import type { UtxoStore } from './store';
import { rewardOutputId } from './transaction';

export interface MintedReward {
  id: H256;
  output: TransactionOutput;
}

export type DistributionOutcome =
  | { kind: 'DistributionSkipped'; reason: 'NoAuthorities'; pooled: Value }
  | { kind: 'Deferred'; pooled: Value; authorities: number }
  | {
      kind: 'Distributed';
      share: Value;
      remainder: Value;
      minted: MintedReward[];
      // payouts whose id already existed; their share is not minted
      wasted: MintedReward[];
    };

/**
 * Splits the pooled fees evenly across the authority set at block
 * finalization. The remainder stays in the pool for the next block.
 *
 * With no authorities nothing is touched. When the pool is smaller than the
 * authority count the whole pool is carried forward.
 */
export function distributeRewards(
  authorities: readonly H256[],
  height: number,
  ledger: UtxoStore,
): DistributionOutcome {
  const recipients = [...new Set(authorities)];
  if (recipients.length === 0) {
    return { kind: 'DistributionSkipped', reason: 'NoAuthorities', pooled: ledger.getRewardPool() };
  }

  const pooled = ledger.takeRewardPool();
  const count = BigInt(recipients.length);
  const share = pooled / count;

  if (share === 0n) {
    ledger.putRewardPool(pooled);
    return { kind: 'Deferred', pooled, authorities: recipients.length };
  }

  const remainder = pooled - share * count;
  ledger.putRewardPool(remainder);

  const minted: MintedReward[] = [];
  const wasted: MintedReward[] = [];
  for (const authority of recipients) {
    const output: TransactionOutput = { value: share, ownerKey: authority };
    const id = rewardOutputId(output, height);
    if (ledger.contains(id)) {
      wasted.push({ id, output });
      continue;
    }
    ledger.put(id, output);
    minted.push({ id, output });
  }

  return { kind: 'Distributed', share, remainder, minted, wasted };
}
