/**
 * import-store.ts — Staging and production tables for imported records
 *
 * Three tables:
 * - manga_records_staging: append-only, one row per imported line per run
 * - manga_records: one row per (dataset, identifier), upserted from staging
 * - manga_import_runs: audit trail, one row per (run, dataset)
 *
 * Each write operation runs in its own transaction, so a failed purge
 * never rolls back a promotion that already committed.
 */

import { createPool, initSchema, verifyConnection, withTransaction, type Pool } from "../db.js";
import type { DatasetKind } from "../datasets/index.js";
import type { JsonRecord } from "../jsonl.js";
import { log } from "../logger.js";

// ═══════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════

export interface StagedRow {
  identifier: string;
  payload: JsonRecord;
}

export interface StageInput {
  runId: string;
  dataset: DatasetKind;
  rows: StagedRow[];
  sourceFile: string;
  loadedAt: Date;
}

export interface ImportRunEntry {
  runId: string;
  dataset: DatasetKind;
  sourceFile: string;
  validated: boolean;
  rowsStaged: number;
  rowsPromoted: number;
  rowsPurged: number;
  rowsSkipped: number;
  purgeError: string | null;
  startedAt: Date;
  finishedAt: Date;
}

// ═══════════════════════════════════════════════════════════
// Store Interface
// ═══════════════════════════════════════════════════════════

export interface ImportStore {
  /** Insert rows into staging in one transaction; returns rows inserted. */
  stage(input: StageInput): Promise<number>;
  /** Upsert a run's staged rows into production; last line per identifier wins. */
  promote(runId: string, dataset: DatasetKind): Promise<number>;
  /** Delete one dataset's staging rows loaded strictly before `olderThan`. */
  purgeStaging(dataset: DatasetKind, olderThan: Date): Promise<number>;
  recordRun(entry: ImportRunEntry): Promise<void>;
  close(): Promise<void>;
}

export interface ImportStoreOptions {
  batchSize?: number;
  /** End the pool on close() */
  ownsPool?: boolean;
}

// ═══════════════════════════════════════════════════════════
// Schema DDL
// ═══════════════════════════════════════════════════════════

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS manga_records_staging (
    id BIGSERIAL PRIMARY KEY,
    run_id UUID NOT NULL,
    dataset TEXT NOT NULL CHECK (dataset IN ('series', 'populaires')),
    identifier TEXT NOT NULL,
    payload JSONB NOT NULL,
    source_file TEXT NOT NULL,
    loaded_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_staging_run ON manga_records_staging(run_id, dataset)`,
  `CREATE INDEX IF NOT EXISTS idx_staging_key ON manga_records_staging(dataset, identifier)`,
  `CREATE INDEX IF NOT EXISTS idx_staging_loaded ON manga_records_staging(dataset, loaded_at)`,

  `CREATE TABLE IF NOT EXISTS manga_records (
    dataset TEXT NOT NULL CHECK (dataset IN ('series', 'populaires')),
    identifier TEXT NOT NULL,
    payload JSONB NOT NULL,
    run_id UUID NOT NULL,
    loaded_at TIMESTAMPTZ NOT NULL,
    first_seen_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (dataset, identifier)
  )`,

  `CREATE TABLE IF NOT EXISTS manga_import_runs (
    run_id UUID NOT NULL,
    dataset TEXT NOT NULL,
    source_file TEXT NOT NULL,
    validated BOOLEAN NOT NULL,
    rows_staged INTEGER NOT NULL,
    rows_promoted INTEGER NOT NULL,
    rows_purged INTEGER NOT NULL,
    rows_skipped INTEGER NOT NULL,
    purge_error TEXT,
    started_at TIMESTAMPTZ NOT NULL,
    finished_at TIMESTAMPTZ NOT NULL,
    PRIMARY KEY (run_id, dataset)
  )`,
];

// ═══════════════════════════════════════════════════════════
// SQL
// ═══════════════════════════════════════════════════════════

const SQL = {
  // ORDINALITY keeps staging ids in file order so promotion can pick the last line
  stage: `INSERT INTO manga_records_staging (run_id, dataset, identifier, payload, source_file, loaded_at)
    SELECT $1::uuid, $2::text, t.identifier, t.payload::jsonb, $3::text, $4::timestamptz
    FROM unnest($5::text[], $6::text[]) WITH ORDINALITY AS t(identifier, payload, ord)
    ORDER BY t.ord`,

  promote: `INSERT INTO manga_records AS m (dataset, identifier, payload, run_id, loaded_at)
    SELECT DISTINCT ON (s.identifier) s.dataset, s.identifier, s.payload, s.run_id, s.loaded_at
    FROM manga_records_staging s
    WHERE s.run_id = $1 AND s.dataset = $2
    ORDER BY s.identifier, s.id DESC
    ON CONFLICT (dataset, identifier) DO UPDATE SET
      payload = EXCLUDED.payload,
      run_id = EXCLUDED.run_id,
      loaded_at = EXCLUDED.loaded_at,
      updated_at = NOW()
    WHERE m.loaded_at <= EXCLUDED.loaded_at`,

  purge: `DELETE FROM manga_records_staging WHERE dataset = $1 AND loaded_at < $2`,

  recordRun: `INSERT INTO manga_import_runs (run_id, dataset, source_file, validated, rows_staged,
      rows_promoted, rows_purged, rows_skipped, purge_error, started_at, finished_at)
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
    ON CONFLICT (run_id, dataset) DO UPDATE SET
      source_file = EXCLUDED.source_file,
      validated = EXCLUDED.validated,
      rows_staged = EXCLUDED.rows_staged,
      rows_promoted = EXCLUDED.rows_promoted,
      rows_purged = EXCLUDED.rows_purged,
      rows_skipped = EXCLUDED.rows_skipped,
      purge_error = EXCLUDED.purge_error,
      finished_at = EXCLUDED.finished_at`,
} as const;

// ═══════════════════════════════════════════════════════════
// Implementation
// ═══════════════════════════════════════════════════════════

export async function createImportStore(pool: Pool, options: ImportStoreOptions = {}): Promise<ImportStore> {
  const batchSize = Math.max(1, options.batchSize ?? 500);
  await initSchema(pool, SCHEMA_STATEMENTS);
  log.db.debug("import store initialized");

  return {
    async stage({ runId, dataset, rows, sourceFile, loadedAt }) {
      return withTransaction(pool, async (client) => {
        let inserted = 0;
        for (let start = 0; start < rows.length; start += batchSize) {
          const batch = rows.slice(start, start + batchSize);
          const result = await client.query(SQL.stage, [
            runId,
            dataset,
            sourceFile,
            loadedAt.toISOString(),
            batch.map((row) => row.identifier),
            batch.map((row) => JSON.stringify(row.payload)),
          ]);
          inserted += result.rowCount ?? 0;
        }
        log.db.debug({ runId, dataset, inserted }, "rows staged");
        return inserted;
      });
    },

    async promote(runId, dataset) {
      return withTransaction(pool, async (client) => {
        const result = await client.query(SQL.promote, [runId, dataset]);
        return result.rowCount ?? 0;
      });
    },

    async purgeStaging(dataset, olderThan) {
      return withTransaction(pool, async (client) => {
        const result = await client.query(SQL.purge, [dataset, olderThan.toISOString()]);
        return result.rowCount ?? 0;
      });
    },

    async recordRun(entry) {
      await withTransaction(pool, async (client) => {
        await client.query(SQL.recordRun, [
          entry.runId,
          entry.dataset,
          entry.sourceFile,
          entry.validated,
          entry.rowsStaged,
          entry.rowsPromoted,
          entry.rowsPurged,
          entry.rowsSkipped,
          entry.purgeError,
          entry.startedAt.toISOString(),
          entry.finishedAt.toISOString(),
        ]);
      });
    },

    async close() {
      if (options.ownsPool) await pool.end();
    },
  };
}

/**
 * Connect to `dsn`, verify the connection and initialize the schema.
 * The returned store owns its pool.
 */
export async function openImportStore(dsn: string, batchSize?: number): Promise<ImportStore> {
  const pool = createPool(dsn);
  try {
    await verifyConnection(pool);
    return await createImportStore(pool, { batchSize, ownsPool: true });
  } catch (err) {
    await pool.end();
    throw err;
  }
}
