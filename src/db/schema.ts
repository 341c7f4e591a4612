import type { Queryable } from "./pool";

export async function createTables(db: Queryable) {
  await db.query(`
    CREATE TABLE IF NOT EXISTS blocks (
      id TEXT PRIMARY KEY,
      height INTEGER UNIQUE NOT NULL,
      reward_before NUMERIC(39, 0) NOT NULL,
      reward_after NUMERIC(39, 0) NOT NULL,
      created_at TIMESTAMP DEFAULT NOW()
    );
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS utxos (
      id TEXT PRIMARY KEY,
      value NUMERIC(39, 0) NOT NULL,
      owner_key TEXT NOT NULL
    );
  `);

  await db.query(`CREATE INDEX IF NOT EXISTS utxos_owner_key_idx ON utxos (owner_key);`);

  await db.query(`
    CREATE TABLE IF NOT EXISTS reward_pool (
      id SMALLINT PRIMARY KEY CHECK (id = 1),
      value NUMERIC(39, 0) NOT NULL
    );
  `);

  // One row per UTXO touched by a block; lets a rollback restore prior state.
  await db.query(`
    CREATE TABLE IF NOT EXISTS utxo_journal (
      height INTEGER NOT NULL REFERENCES blocks(height) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      utxo_id TEXT NOT NULL,
      before_value NUMERIC(39, 0),
      before_owner TEXT,
      after_value NUMERIC(39, 0),
      after_owner TEXT,
      PRIMARY KEY (height, seq)
    );
  `);
}
