import type { H256, Transaction } from '../interfaces';
import type { UtxoStore } from './store';
import { transactionHash } from './transaction';
import { validateTransaction, type FullyValid, type Pending, type Rejected } from './validator';

export interface PoolEntry {
  hash: H256;
  transaction: Transaction;
  verdict: FullyValid | Pending;
  arrival: number;
}

export type Submission =
  | { status: 'Imported'; entry: PoolEntry; evicted?: H256 }
  | { status: 'AlreadyImported'; entry: PoolEntry }
  | { status: 'PoolFull'; hash: H256 }
  | { status: 'Rejected'; hash: H256; verdict: Rejected };

/**
 * Holds transactions that passed validation, including those still waiting
 * on outputs another transaction will create. `readyQueue` orders them so
 * that every transaction comes after whatever provides its inputs.
 *
 * When full, a fully valid submission evicts the oldest pending entry;
 * a pending submission is refused.
 */
export class TransactionPool {
  private readonly pool = new Map<H256, PoolEntry>();
  private arrivals = 0;

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.pool.size;
  }

  entries(): PoolEntry[] {
    return [...this.pool.values()];
  }

  get(hash: H256): PoolEntry | undefined {
    return this.pool.get(hash);
  }

  submit(transaction: Transaction, ledger: UtxoStore): Submission {
    const hash = transactionHash(transaction);
    const existing = this.pool.get(hash);
    if (existing) {
      return { status: 'AlreadyImported', entry: existing };
    }

    const verdict = validateTransaction(transaction, ledger);
    if (verdict.status === 'Rejected') {
      return { status: 'Rejected', hash, verdict };
    }
    let evicted: H256 | undefined;
    if (this.pool.size >= this.capacity) {
      evicted = verdict.status === 'FullyValid' ? this.oldestPending()?.hash : undefined;
      if (evicted === undefined) {
        return { status: 'PoolFull', hash };
      }
      this.pool.delete(evicted);
    }

    const entry: PoolEntry = { hash, transaction, verdict, arrival: this.arrivals++ };
    this.pool.set(hash, entry);
    return evicted === undefined ? { status: 'Imported', entry } : { status: 'Imported', entry, evicted };
  }

  // Map iteration follows insertion order, which is arrival order.
  private oldestPending(): PoolEntry | undefined {
    for (const entry of this.pool.values()) {
      if (entry.verdict.status === 'Pending') {
        return entry;
      }
    }
    return undefined;
  }

  /**
   * Fully valid entries by reward (highest first, then arrival), followed by
   * pending entries once everything they require is provided earlier in the
   * queue. Pending entries whose requirements nobody provides are left out.
   */
  readyQueue(): PoolEntry[] {
    const queue: PoolEntry[] = [];
    const provided = new Set<H256>();
    const take = (entry: PoolEntry) => {
      queue.push(entry);
      entry.verdict.provides.forEach((id) => provided.add(id));
    };

    const entries = this.entries();
    entries
      .filter((entry) => entry.verdict.status === 'FullyValid')
      .sort((a, b) => {
        const ra = a.verdict.status === 'FullyValid' ? a.verdict.reward : 0n;
        const rb = b.verdict.status === 'FullyValid' ? b.verdict.reward : 0n;
        if (ra !== rb) {
          return ra > rb ? -1 : 1;
        }
        return a.arrival - b.arrival;
      })
      .forEach(take);

    let waiting = entries.filter((entry) => entry.verdict.status === 'Pending');
    let progressed = true;
    while (progressed) {
      progressed = false;
      const stillWaiting: PoolEntry[] = [];
      for (const entry of waiting) {
        if (entry.verdict.requires.every((id) => provided.has(id))) {
          take(entry);
          progressed = true;
        } else {
          stillWaiting.push(entry);
        }
      }
      waiting = stillWaiting;
    }

    return queue;
  }

  remove(hashes: Iterable<H256>): void {
    for (const hash of hashes) {
      this.pool.delete(hash);
    }
  }

  /**
   * Re-checks every entry against the new ledger state. Returns the hashes
   * dropped because they no longer validate.
   */
  revalidate(ledger: UtxoStore): H256[] {
    const dropped: H256[] = [];
    for (const entry of this.entries()) {
      const verdict = validateTransaction(entry.transaction, ledger);
      if (verdict.status === 'Rejected') {
        this.pool.delete(entry.hash);
        dropped.push(entry.hash);
      } else {
        entry.verdict = verdict;
      }
    }
    return dropped;
  }

  clear(): void {
    this.pool.clear();
  }
}
