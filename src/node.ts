import type { Block, BlockHeader, H256, Transaction, TransactionOutput, Value } from './interfaces';
import type { JournaledBlock, LedgerRepository } from './db/repository';
import type { Logger } from './logger';
import {
  BlockRejectedError,
  InvalidBlockHeightError,
  InvalidBlockIdError,
  RollbackHeightError,
} from './ledger/errors';
import { genesisBlockId, seedGenesis } from './ledger/genesis';
import { commitTransaction } from './ledger/mutator';
import { distributeRewards, type DistributionOutcome } from './ledger/rewards';
import { applyChanges, invertChanges, MemoryUtxoStore } from './ledger/store';
import { blockId, transactionHash } from './ledger/transaction';
import { TransactionPool, type Submission } from './ledger/txpool';
import { validateTransaction } from './ledger/validator';

export interface NotificationSink {
  transactionSuccess(transaction: Transaction, hash: H256): void;
}

export interface LedgerNodeOptions {
  repository: LedgerRepository;
  genesis: readonly TransactionOutput[];
  logger: Logger;
  poolCapacity: number;
  sink?: NotificationSink;
}

export interface BlockReceipt {
  header: BlockHeader;
  transactions: H256[];
  distribution: DistributionOutcome;
  droppedFromPool: H256[];
}

export class LoggingNotificationSink implements NotificationSink {
  constructor(private readonly logger: Logger) {}

  transactionSuccess(_transaction: Transaction, hash: H256): void {
    this.logger.info({ hash }, 'Transaction committed');
  }
}

/**
 * Owns the in-memory ledger and keeps it in step with the repository.
 *
 * Every state change is staged first, persisted, then applied to memory, so
 * a failed write leaves both sides as they were. Mutating calls run one at a
 * time.
 */
export class LedgerNode {
  readonly pool: TransactionPool;
  private readonly store = new MemoryUtxoStore();
  private readonly repository: LedgerRepository;
  private readonly genesis: readonly TransactionOutput[];
  private readonly logger: Logger;
  private readonly sink: NotificationSink;
  private journal: JournaledBlock[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(options: LedgerNodeOptions) {
    this.repository = options.repository;
    this.genesis = options.genesis;
    this.logger = options.logger;
    this.pool = new TransactionPool(options.poolCapacity);
    this.sink = options.sink ?? new LoggingNotificationSink(options.logger);
  }

  get currentHeight(): number {
    return this.journal.length > 0 ? this.journal[this.journal.length - 1].header.height : 0;
  }

  get blocks(): BlockHeader[] {
    return this.journal.map((block) => block.header);
  }

  get rewardPool(): Value {
    return this.store.getRewardPool();
  }

  get utxoCount(): number {
    return this.store.size;
  }

  getUtxo(id: H256): TransactionOutput | undefined {
    return this.store.get(id);
  }

  balanceOf(ownerKey: H256): Value {
    return this.store
      .entries()
      .filter((entry) => entry.output.ownerKey === ownerKey)
      .reduce((sum, entry) => sum + entry.output.value, 0n);
  }

  start(): Promise<void> {
    return this.exclusive(async () => {
      const snapshot = await this.repository.load();
      if (snapshot.blocks.length === 0) {
        const genesis = this.genesisBlock();
        await this.repository.appendBlock(genesis.header, genesis.changes);
        this.install(genesis);
        return;
      }
      this.store.load(snapshot.utxos, snapshot.rewardPool);
      this.journal = snapshot.blocks;
      this.logger.info({ height: this.currentHeight, utxos: this.store.size }, 'Ledger state loaded');
    });
  }

  submitTransaction(transaction: Transaction): Submission {
    return this.pool.submit(transaction, this.store);
  }

  importBlock(block: Block): Promise<BlockReceipt> {
    return this.exclusive(() => this.applyBlock(block));
  }

  rollback(targetHeight: number): Promise<void> {
    return this.exclusive(() => this.revertTo(targetHeight));
  }

  reset(): Promise<void> {
    return this.exclusive(async () => {
      const genesis = this.genesisBlock();
      await this.repository.resetTo(genesis.header, genesis.changes);
      this.store.clear();
      this.pool.clear();
      this.install(genesis);
    });
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.tail.then(work);
    // the caller sees failures through `run`; the chain only needs to settle
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Block 0, staged against an empty ledger. */
  private genesisBlock(): JournaledBlock {
    const staged = new MemoryUtxoStore().stage();
    seedGenesis(this.genesis, staged);
    return {
      header: { id: genesisBlockId(this.genesis), height: 0 },
      changes: staged.changes(),
    };
  }

  private install(genesis: JournaledBlock) {
    this.store.apply(genesis.changes);
    this.journal = [genesis];
    this.logger.info({ outputs: genesis.changes.utxos.length }, 'Genesis seeded');
  }

  private async applyBlock(block: Block): Promise<BlockReceipt> {
    const expectedHeight = this.currentHeight + 1;
    if (block.height !== expectedHeight) {
      throw new InvalidBlockHeightError(expectedHeight, block.height);
    }
    const id = blockId(block.height, block.transactions);
    if (block.id !== id) {
      throw new InvalidBlockIdError(id, block.id);
    }

    const staged = this.store.stage();
    const hashes: H256[] = [];
    block.transactions.forEach((transaction, index) => {
      const verdict = validateTransaction(transaction, staged);
      if (verdict.status === 'Rejected') {
        throw new BlockRejectedError(index, verdict.error);
      }
      if (verdict.status === 'Pending') {
        throw new BlockRejectedError(index, 'MissingDependency', verdict.requires);
      }
      commitTransaction(transaction, verdict, staged);
      hashes.push(transactionHash(transaction));
    });

    const distribution = distributeRewards(block.authorities, block.height, staged);
    const header: BlockHeader = { id, height: block.height };
    const changes = staged.changes();

    await this.repository.appendBlock(header, changes);
    this.store.apply(changes);
    this.journal.push({ header, changes });

    this.logDistribution(block.height, distribution);
    block.transactions.forEach((transaction, index) => this.notify(transaction, hashes[index]));

    this.pool.remove(hashes);
    const droppedFromPool = this.pool.revalidate(this.store);

    this.logger.info({ height: block.height, id, transactions: hashes.length }, 'Block accepted');
    return { header, transactions: hashes, distribution, droppedFromPool };
  }

  private async revertTo(targetHeight: number): Promise<void> {
    if (!Number.isInteger(targetHeight) || targetHeight < 0) {
      throw new RollbackHeightError('Invalid height parameter');
    }
    if (targetHeight > this.currentHeight) {
      throw new RollbackHeightError('Target height cannot be greater than current height');
    }

    const staged = this.store.stage();
    const reverted = this.journal.filter((block) => block.header.height > targetHeight).reverse();
    for (const block of reverted) {
      applyChanges(staged, invertChanges(block.changes));
    }
    const changes = staged.changes();

    await this.repository.revertBlocks(targetHeight, changes);
    this.store.apply(changes);
    this.journal = this.journal.filter((block) => block.header.height <= targetHeight);
    this.pool.revalidate(this.store);

    this.logger.info({ height: targetHeight, reverted: reverted.length }, 'Rolled back');
  }

  private logDistribution(height: number, outcome: DistributionOutcome) {
    switch (outcome.kind) {
      case 'DistributionSkipped':
        this.logger.warn({ height, pooled: outcome.pooled }, 'No authorities; reward left in pool');
        break;
      case 'Deferred':
        this.logger.info({ height, pooled: outcome.pooled, authorities: outcome.authorities }, 'Reward below one unit per authority; carried forward');
        break;
      case 'Distributed':
        for (const reward of outcome.minted) {
          this.logger.info({ height, id: reward.id, owner: reward.output.ownerKey }, 'Transaction reward sent');
        }
        for (const reward of outcome.wasted) {
          this.logger.warn({ height, id: reward.id, owner: reward.output.ownerKey }, 'Transaction reward wasted due to id collision');
        }
        break;
    }
  }

  private notify(transaction: Transaction, hash: H256) {
    try {
      this.sink.transactionSuccess(transaction, hash);
    } catch (error) {
      this.logger.warn({ err: error, hash }, 'Notification sink failed');
    }
  }
}
