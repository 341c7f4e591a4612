import type { H256, TransactionOutput, UtxoEntry, Value } from '../interfaces';
import { sameOutput } from './transaction';

/**
 * Unspent-output set plus the reward-pool register. Every key present is
 * currently spendable.
 */
export interface UtxoStore {
  get(id: H256): TransactionOutput | undefined;
  contains(id: H256): boolean;
  put(id: H256, output: TransactionOutput): void;
  remove(id: H256): void;
  getRewardPool(): Value;
  putRewardPool(value: Value): void;
  /** Returns the pool value and resets it to zero. */
  takeRewardPool(): Value;
}

export interface UtxoChange {
  id: H256;
  before?: TransactionOutput;
  after?: TransactionOutput;
}

export interface ChangeSet {
  utxos: UtxoChange[];
  rewardPool: { before: Value; after: Value };
}

export function applyChanges(store: UtxoStore, changes: ChangeSet): void {
  for (const change of changes.utxos) {
    if (change.after) {
      store.put(change.id, change.after);
    } else {
      store.remove(change.id);
    }
  }
  store.putRewardPool(changes.rewardPool.after);
}

export function invertChanges(changes: ChangeSet): ChangeSet {
  return {
    utxos: [...changes.utxos].reverse().map((c) => ({ id: c.id, before: c.after, after: c.before })),
    rewardPool: { before: changes.rewardPool.after, after: changes.rewardPool.before },
  };
}

export class MemoryUtxoStore implements UtxoStore {
  private readonly utxos = new Map<H256, TransactionOutput>();
  private rewardPool: Value = 0n;

  get size(): number {
    return this.utxos.size;
  }

  get(id: H256): TransactionOutput | undefined {
    return this.utxos.get(id);
  }

  contains(id: H256): boolean {
    return this.utxos.has(id);
  }

  put(id: H256, output: TransactionOutput): void {
    this.utxos.set(id, Object.freeze({ value: output.value, ownerKey: output.ownerKey }));
  }

  remove(id: H256): void {
    this.utxos.delete(id);
  }

  getRewardPool(): Value {
    return this.rewardPool;
  }

  putRewardPool(value: Value): void {
    this.rewardPool = value;
  }

  takeRewardPool(): Value {
    const value = this.rewardPool;
    this.rewardPool = 0n;
    return value;
  }

  entries(): UtxoEntry[] {
    return [...this.utxos].map(([id, output]) => ({ id, output }));
  }

  /** Opens a write batch over this store; nothing reaches it until `apply`. */
  stage(): StagedUtxoStore {
    return new StagedUtxoStore(this);
  }

  apply(changes: ChangeSet): void {
    applyChanges(this, changes);
  }

  load(entries: Iterable<UtxoEntry>, rewardPool: Value): void {
    this.clear();
    for (const { id, output } of entries) {
      this.put(id, output);
    }
    this.rewardPool = rewardPool;
  }

  clear(): void {
    this.utxos.clear();
    this.rewardPool = 0n;
  }
}

/**
 * Copy-on-write view over another store. Reads fall through to the base until
 * a key is written; `changes()` reports the net difference.
 */
export class StagedUtxoStore implements UtxoStore {
  // null marks a removal
  private readonly overlay = new Map<H256, TransactionOutput | null>();
  private rewardPool: Value;

  constructor(private readonly base: UtxoStore) {
    this.rewardPool = base.getRewardPool();
  }

  get(id: H256): TransactionOutput | undefined {
    const staged = this.overlay.get(id);
    if (staged === null) {
      return undefined;
    }
    return staged ?? this.base.get(id);
  }

  contains(id: H256): boolean {
    return this.get(id) !== undefined;
  }

  put(id: H256, output: TransactionOutput): void {
    this.overlay.set(id, { value: output.value, ownerKey: output.ownerKey });
  }

  remove(id: H256): void {
    this.overlay.set(id, null);
  }

  getRewardPool(): Value {
    return this.rewardPool;
  }

  putRewardPool(value: Value): void {
    this.rewardPool = value;
  }

  takeRewardPool(): Value {
    const value = this.rewardPool;
    this.rewardPool = 0n;
    return value;
  }

  changes(): ChangeSet {
    const utxos: UtxoChange[] = [];
    for (const [id, staged] of this.overlay) {
      const before = this.base.get(id);
      const after = staged ?? undefined;
      if (!sameOutput(before, after)) {
        utxos.push({ id, before, after });
      }
    }
    return {
      utxos,
      rewardPool: { before: this.base.getRewardPool(), after: this.rewardPool },
    };
  }
}
