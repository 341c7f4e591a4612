import { describe, expect, test } from 'vitest';
import { distributeRewards } from '../src/ledger/rewards';
import { MemoryUtxoStore } from '../src/ledger/store';
import { rewardOutputId } from '../src/ledger/transaction';
import { authorityA, authorityB, authorityC, output } from './helpers';

function storeWithPool(pooled: bigint) {
  const store = new MemoryUtxoStore();
  store.putRewardPool(pooled);
  return store;
}

describe('distributeRewards', () => {
  test('splits the pool evenly and carries the remainder forward', () => {
    const store = storeWithPool(10n);

    const outcome = distributeRewards([authorityA, authorityB, authorityC], 4, store);

    expect(outcome.kind).toBe('Distributed');
    if (outcome.kind !== 'Distributed') return;
    expect(outcome.share).toBe(3n);
    expect(outcome.remainder).toBe(1n);
    expect(outcome.wasted).toEqual([]);
    expect(outcome.minted.map((reward) => reward.output)).toEqual([
      output(3n, authorityA),
      output(3n, authorityB),
      output(3n, authorityC),
    ]);
    for (const authority of [authorityA, authorityB, authorityC]) {
      expect(store.get(rewardOutputId(output(3n, authority), 4))).toEqual(output(3n, authority));
    }
    expect(store.getRewardPool()).toBe(1n);
  });

  test('an empty authority set leaves the pool untouched', () => {
    const store = storeWithPool(10n);

    expect(distributeRewards([], 4, store)).toEqual({
      kind: 'DistributionSkipped',
      reason: 'NoAuthorities',
      pooled: 10n,
    });
    expect(store.getRewardPool()).toBe(10n);
    expect(store.size).toBe(0);
  });

  test('a pool smaller than the authority count is kept whole', () => {
    const store = storeWithPool(2n);

    expect(distributeRewards([authorityA, authorityB, authorityC], 4, store)).toEqual({
      kind: 'Deferred',
      pooled: 2n,
      authorities: 3,
    });
    expect(store.getRewardPool()).toBe(2n);
    expect(store.size).toBe(0);
  });

  test('a payout whose id already exists is skipped', () => {
    const store = storeWithPool(9n);
    const taken = rewardOutputId(output(3n, authorityB), 4);
    store.put(taken, output(3n, authorityB));

    const outcome = distributeRewards([authorityA, authorityB, authorityC], 4, store);

    expect(outcome.kind).toBe('Distributed');
    if (outcome.kind !== 'Distributed') return;
    expect(outcome.minted.map((reward) => reward.output.ownerKey)).toEqual([authorityA, authorityC]);
    expect(outcome.wasted).toEqual([{ id: taken, output: output(3n, authorityB) }]);
    expect(store.size).toBe(3);
    expect(store.getRewardPool()).toBe(0n);
  });

  test('repeated authorities are paid once', () => {
    const store = storeWithPool(10n);

    const outcome = distributeRewards([authorityA, authorityA, authorityB], 2, store);

    expect(outcome.kind === 'Distributed' && outcome.share).toBe(5n);
    expect(store.size).toBe(2);
    expect(store.getRewardPool()).toBe(0n);
  });

  test('an empty pool is deferred', () => {
    const store = storeWithPool(0n);
    expect(distributeRewards([authorityA], 1, store).kind).toBe('Deferred');
    expect(store.size).toBe(0);
  });
});
