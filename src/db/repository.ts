import type { BlockHeader, TransactionOutput, UtxoEntry, Value } from "../interfaces";
import type { ChangeSet, UtxoChange } from "../ledger/store";
import { withTransaction, type Database, type Queryable } from "./pool";

export interface JournaledBlock {
  header: BlockHeader;
  changes: ChangeSet;
}

export interface LedgerSnapshot {
  utxos: UtxoEntry[];
  rewardPool: Value;
  blocks: JournaledBlock[];
}

/**
 * Durable side of the ledger. Each write method is all-or-nothing.
 */
export interface LedgerRepository {
  load(): Promise<LedgerSnapshot>;
  appendBlock(header: BlockHeader, changes: ChangeSet): Promise<void>;
  /** Applies `changes` and deletes every block above `targetHeight`. */
  revertBlocks(targetHeight: number, changes: ChangeSet): Promise<void>;
  /** Deletes everything and writes `header` as the only block. */
  resetTo(header: BlockHeader, changes: ChangeSet): Promise<void>;
}

interface UtxoRow {
  id: string;
  value: string;
  owner_key: string;
}

interface BlockRow {
  id: string;
  height: number;
  reward_before: string;
  reward_after: string;
}

interface JournalRow {
  height: number;
  utxo_id: string;
  before_value: string | null;
  before_owner: string | null;
  after_value: string | null;
  after_owner: string | null;
}

function toOutput(value: string | null, ownerKey: string | null): TransactionOutput | undefined {
  if (value === null || ownerKey === null) {
    return undefined;
  }
  return { value: BigInt(value), ownerKey };
}

async function applyUtxoChanges(db: Queryable, changes: ChangeSet) {
  for (const change of changes.utxos) {
    if (change.after) {
      await db.query(
        `INSERT INTO utxos (id, value, owner_key) VALUES ($1, $2, $3)
         ON CONFLICT (id) DO UPDATE SET value = $2, owner_key = $3`,
        [change.id, change.after.value.toString(), change.after.ownerKey]
      );
    } else {
      await db.query('DELETE FROM utxos WHERE id = $1', [change.id]);
    }
  }

  await db.query(
    `INSERT INTO reward_pool (id, value) VALUES (1, $1)
     ON CONFLICT (id) DO UPDATE SET value = $1`,
    [changes.rewardPool.after.toString()]
  );
}

async function insertBlock(db: Queryable, header: BlockHeader, changes: ChangeSet) {
  await db.query(
    'INSERT INTO blocks (id, height, reward_before, reward_after) VALUES ($1, $2, $3, $4)',
    [header.id, header.height, changes.rewardPool.before.toString(), changes.rewardPool.after.toString()]
  );

  for (const [seq, change] of changes.utxos.entries()) {
    await db.query(
      `INSERT INTO utxo_journal
         (height, seq, utxo_id, before_value, before_owner, after_value, after_owner)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        header.height,
        seq,
        change.id,
        change.before?.value.toString() ?? null,
        change.before?.ownerKey ?? null,
        change.after?.value.toString() ?? null,
        change.after?.ownerKey ?? null,
      ]
    );
  }

  await applyUtxoChanges(db, changes);
}

export class PgLedgerRepository implements LedgerRepository {
  constructor(private readonly db: Database) {}

  async load(): Promise<LedgerSnapshot> {
    const utxoResult = await this.db.query<UtxoRow>('SELECT id, value, owner_key FROM utxos');
    const rewardResult = await this.db.query<{ value: string }>('SELECT value FROM reward_pool WHERE id = 1');
    const blockResult = await this.db.query<BlockRow>(
      'SELECT id, height, reward_before, reward_after FROM blocks ORDER BY height'
    );
    const journalResult = await this.db.query<JournalRow>(
      `SELECT height, utxo_id, before_value, before_owner, after_value, after_owner
       FROM utxo_journal ORDER BY height, seq`
    );

    const journal = new Map<number, UtxoChange[]>();
    for (const row of journalResult.rows) {
      const changes = journal.get(row.height) ?? [];
      changes.push({
        id: row.utxo_id,
        before: toOutput(row.before_value, row.before_owner),
        after: toOutput(row.after_value, row.after_owner),
      });
      journal.set(row.height, changes);
    }

    return {
      utxos: utxoResult.rows.map((row) => ({
        id: row.id,
        output: { value: BigInt(row.value), ownerKey: row.owner_key },
      })),
      rewardPool: rewardResult.rows.length > 0 ? BigInt(rewardResult.rows[0].value) : 0n,
      blocks: blockResult.rows.map((row) => ({
        header: { id: row.id, height: row.height },
        changes: {
          utxos: journal.get(row.height) ?? [],
          rewardPool: { before: BigInt(row.reward_before), after: BigInt(row.reward_after) },
        },
      })),
    };
  }

  async appendBlock(header: BlockHeader, changes: ChangeSet): Promise<void> {
    await withTransaction(this.db, (client) => insertBlock(client, header, changes));
  }

  async revertBlocks(targetHeight: number, changes: ChangeSet): Promise<void> {
    await withTransaction(this.db, async (client) => {
      await applyUtxoChanges(client, changes);
      await client.query('DELETE FROM blocks WHERE height > $1', [targetHeight]);
    });
  }

  async resetTo(header: BlockHeader, changes: ChangeSet): Promise<void> {
    await withTransaction(this.db, async (client) => {
      await client.query('DELETE FROM utxo_journal');
      await client.query('DELETE FROM blocks');
      await client.query('DELETE FROM utxos');
      await client.query('DELETE FROM reward_pool');
      await insertBlock(client, header, changes);
    });
  }
}
