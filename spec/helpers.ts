import type { BlockHeader, H256, Transaction, TransactionOutput } from '../src/interfaces';
import type { JournaledBlock, LedgerRepository, LedgerSnapshot } from '../src/db/repository';
import { keyPairFromSeed, ZERO_SIGNATURE, type KeyPair } from '../src/ledger/crypto';
import { seedGenesis } from '../src/ledger/genesis';
import { MemoryUtxoStore, type ChangeSet } from '../src/ledger/store';
import { signTransaction } from '../src/ledger/transaction';
import { createLogger } from '../src/logger';

export const alice = keyPairFromSeed(new Uint8Array(32).fill(1));
export const bob = keyPairFromSeed(new Uint8Array(32).fill(2));
export const carol = keyPairFromSeed(new Uint8Array(32).fill(3));

export const authorityA: H256 = 'aa'.repeat(32);
export const authorityB: H256 = 'bb'.repeat(32);
export const authorityC: H256 = 'cc'.repeat(32);

export const silentLogger = createLogger({ level: 'silent' });

export function output(value: bigint, owner: KeyPair | H256): TransactionOutput {
  return { value, ownerKey: typeof owner === 'string' ? owner : owner.publicKey };
}

export function ledgerWith(outputs: TransactionOutput[]): { store: MemoryUtxoStore; ids: H256[] } {
  const store = new MemoryUtxoStore();
  const ids = seedGenesis(outputs, store).map((entry) => entry.id);
  return { store, ids };
}

/** Builds a transaction and signs input `i` with `inputs[i].key`. */
export function spend(inputs: { outPoint: H256; key: KeyPair }[], outputs: TransactionOutput[]): Transaction {
  const unsigned: Transaction = {
    inputs: inputs.map((input) => ({ outPoint: input.outPoint, signature: ZERO_SIGNATURE })),
    outputs,
  };
  return signTransaction(
    unsigned,
    inputs.map((input) => input.key.secretKey),
  );
}

export function transactionJson(tx: Transaction) {
  return {
    inputs: tx.inputs,
    outputs: tx.outputs.map((o) => ({ value: o.value.toString(), ownerKey: o.ownerKey })),
  };
}

/** In-process stand-in for the PostgreSQL repository. */
export class MemoryLedgerRepository implements LedgerRepository {
  private readonly store = new MemoryUtxoStore();
  blocks: JournaledBlock[] = [];
  failWith: Error | undefined;

  async load(): Promise<LedgerSnapshot> {
    return {
      utxos: this.store.entries(),
      rewardPool: this.store.getRewardPool(),
      blocks: [...this.blocks],
    };
  }

  async appendBlock(header: BlockHeader, changes: ChangeSet): Promise<void> {
    this.check();
    this.blocks.push({ header, changes });
    this.store.apply(changes);
  }

  async revertBlocks(targetHeight: number, changes: ChangeSet): Promise<void> {
    this.check();
    this.store.apply(changes);
    this.blocks = this.blocks.filter((block) => block.header.height <= targetHeight);
  }

  async resetTo(header: BlockHeader, changes: ChangeSet): Promise<void> {
    this.check();
    this.store.clear();
    this.store.apply(changes);
    this.blocks = [{ header, changes }];
  }

  private check() {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}
