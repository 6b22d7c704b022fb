/**
 * db.ts — PostgreSQL connection layer
 *
 * One pool per importer invocation:
 *   const pool = createPool(dsn);
 *   await verifyConnection(pool);        // ConnectionError when unreachable
 *   const store = await createImportStore(pool);
 *   ...
 *   await pool.end();
 */

import pg from "pg";
import { ConnectionError } from "./errors.js";
import { log } from "./logger.js";

const { Pool } = pg;
type Pool = pg.Pool;
type PoolClient = pg.PoolClient;
type QueryResult = pg.QueryResult;

export type { Pool, PoolClient, QueryResult };

const DSN_PATTERN = /^postgres(?:ql)?:\/\//i;

/**
 * Create a connection pool. The DSN must be a postgres:// URL.
 */
export function createPool(connectionString: string): Pool {
  if (!DSN_PATTERN.test(connectionString)) {
    throw new ConnectionError("DSN must be a postgres:// or postgresql:// URL");
  }

  const pool = new Pool({
    connectionString,
    max: 2,
    connectionTimeoutMillis: 5000,  // fail after 5s if no connection available
    idleTimeoutMillis: 30000,
    statement_timeout: 120000,
  });

  // Unhandled idle-client errors crash the process
  pool.on("error", (err) => {
    log.db.error({ err }, "idle client error");
  });

  return pool;
}

/**
 * Round-trip a trivial query, wrapping any failure in ConnectionError.
 */
export async function verifyConnection(pool: Pool): Promise<void> {
  try {
    await pool.query("SELECT 1");
  } catch (err) {
    throw new ConnectionError(
      `database unreachable: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

/**
 * Run a sequence of DDL statements inside a single transaction.
 */
export async function initSchema(
  pool: Pool,
  statements: string[],
): Promise<void> {
  await withTransaction(pool, async (client) => {
    for (const stmt of statements) {
      await client.query(stmt);
    }
  });
}

/**
 * Execute a callback inside a transaction.
 * Commits on success, rolls back on error.
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
}
