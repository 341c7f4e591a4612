import { Pool, type QueryResult, type QueryResultRow } from "pg";
import { createTables } from "./schema";

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface Database extends Queryable {
  connect(): Promise<Queryable & { release(): void }>;
}

let dbPool: Pool | null = null;

export function getDbPool(): Pool {
  if (!dbPool) {
    throw new Error("Database not initialized");
  }
  return dbPool;
}

export async function initDb(databaseUrl: string) {
  const pool = new Pool({ connectionString: databaseUrl });
  await createTables(pool);
  dbPool = pool;
}

export async function closeDb() {
  if (dbPool) {
    await dbPool.end();
    dbPool = null;
  }
}

/** Runs `work` on one client between BEGIN and COMMIT; any throw rolls back. */
export async function withTransaction<T>(db: Database, work: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
