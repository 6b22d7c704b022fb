/**
 * importer.ts — Load a backfilled JSONL file into staging, then production.
 *
 * Order of operations:
 *   1. resolve the DSN (ConfigError when absent)
 *   2. unless skipped, run the validation gate on the dataset's default files
 *   3. read the file; malformed lines and rows without an identifier are skipped
 *   4. stage all rows in one transaction
 *   5. promote the run's rows in a second transaction
 *   6. purge staging rows older than the retention window in a third
 *   7. record the run in the audit table
 *
 * A stage-only run stops after step 4: promotion and purge are skipped and
 * the staged rows stay for a later run to supersede.
 *
 * Nothing reaches the database when the gate fails. A purge failure is
 * logged and reported; the promotion stays committed.
 */

import { randomUUID } from "node:crypto";
import { resolve } from "node:path";
import { requireDsn, type AppConfig } from "../config.js";
import { DATASET_DEFINITIONS, datasetFiles, type DatasetDefinition, type DatasetKind } from "../datasets/index.js";
import { isNonBlank } from "../datasets/rules.js";
import {
  InputReadError,
  PartialRowError,
  UsageError,
  ValidationGateError,
  errorMessage,
} from "../errors.js";
import { readJsonl } from "../jsonl.js";
import { log } from "../logger.js";
import { openImportStore, type ImportStore, type StagedRow } from "../stores/import-store.js";
import { createValidationGate, type ValidationGate } from "./validation-gate.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface ImportOptions {
  dataset: DatasetKind;
  /** Defaults to the dataset's backfilled file under the data directory */
  file?: string;
  dsn?: string;
  skipValidation?: boolean;
  /** The caller already validated `file`; recorded when the gate is skipped */
  preValidated?: boolean;
  keepDays?: number;
  runId?: string;
  /** Stage rows without promoting them or purging staging */
  stageOnly?: boolean;
  /** Rows per staging INSERT; defaults to configuration */
  batchSize?: number;
}

export interface ImporterDeps {
  config: AppConfig;
  openStore?: (dsn: string, batchSize: number) => Promise<ImportStore>;
  gate?: ValidationGate;
  now?: () => Date;
}

export interface ImportResult {
  dataset: DatasetKind;
  runId: string;
  file: string;
  validated: boolean;
  stageOnly: boolean;
  rowsStaged: number;
  rowsPromoted: number;
  rowsPurged: number;
  rowsSkipped: number;
  purgeError?: string;
}

// ─── Row Loading ────────────────────────────────────────────────

export interface ImportRows {
  rows: StagedRow[];
  skipped: PartialRowError[];
}

export async function readImportRows(file: string, definition: DatasetDefinition): Promise<ImportRows> {
  const content = await readJsonl(file);
  const skipped = content.malformed.map((bad) => new PartialRowError(bad.line, `malformed JSON (${bad.detail})`));
  const rows: StagedRow[] = [];
  for (const { line, record } of content.lines) {
    const identifier = record[definition.identifierField];
    if (!isNonBlank(identifier)) {
      skipped.push(new PartialRowError(line, `missing ${definition.identifierField}`));
      continue;
    }
    rows.push({ identifier, payload: record });
  }
  skipped.sort((a, b) => a.line - b.line);
  return { rows, skipped };
}

// ─── Import ─────────────────────────────────────────────────────

export async function importDataset(options: ImportOptions, deps: ImporterDeps): Promise<ImportResult> {
  const { config } = deps;
  const now = deps.now ?? (() => new Date());
  const definition = DATASET_DEFINITIONS[options.dataset];
  const keepDays = options.keepDays ?? config.keepDays;
  if (!Number.isInteger(keepDays) || keepDays < 0) {
    throw new UsageError(`keep-days must be a non-negative integer, got ${keepDays}`);
  }
  const batchSize = options.batchSize ?? config.batchSize;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new UsageError(`batch size must be a positive integer, got ${batchSize}`);
  }
  if (options.runId !== undefined && !UUID_PATTERN.test(options.runId)) {
    throw new UsageError(`run id must be a UUID, got '${options.runId}'`);
  }

  const dsn = requireDsn(config, options.dsn);
  const defaults = datasetFiles(config.dataDir, config.reportDir, options.dataset);
  const file = options.file ?? defaults.backfilled;
  const runId = options.runId ?? randomUUID();
  const startedAt = now();

  let validated = options.skipValidation === true && options.preValidated === true;
  if (!options.skipValidation) {
    if (resolve(file) !== resolve(defaults.backfilled)) {
      log.import.warn(
        { dataset: options.dataset, file, gated: defaults.backfilled },
        "validation gate checks the default files, not the file being imported",
      );
    }
    const gate = deps.gate ?? createValidationGate(config, now);
    const { report } = await gate(options.dataset);
    if (!report.passed) {
      throw new ValidationGateError([options.dataset], `${report.violations.length} violation(s), ${report.malformedLines.length} malformed line(s)`);
    }
    validated = true;
  }

  const { rows, skipped } = await readImportRows(file, definition);
  for (const partial of skipped) {
    log.import.warn({ dataset: options.dataset, file, line: partial.line, reason: partial.message }, "skipping row");
  }
  if (rows.length === 0) {
    throw new InputReadError(file, "no importable records");
  }

  const stageOnly = options.stageOnly === true;
  const openStore = deps.openStore ?? openImportStore;
  const store = await openStore(dsn, batchSize);
  try {
    const loadedAt = now();
    const rowsStaged = await store.stage({ runId, dataset: options.dataset, rows, sourceFile: file, loadedAt });

    let rowsPromoted = 0;
    let rowsPurged = 0;
    let purgeError: string | undefined;
    const cutoff = new Date(loadedAt.getTime() - keepDays * DAY_MS);
    if (stageOnly) {
      log.import.info({ dataset: options.dataset, runId, rowsStaged }, "stage only: promotion and purge skipped");
    } else {
      rowsPromoted = await store.promote(runId, options.dataset);
      try {
        rowsPurged = await store.purgeStaging(options.dataset, cutoff);
      } catch (err) {
        purgeError = errorMessage(err);
        log.import.error({ err, dataset: options.dataset, runId }, "staging purge failed; promoted rows kept");
      }
    }

    const result: ImportResult = {
      dataset: options.dataset,
      runId,
      file,
      validated,
      stageOnly,
      rowsStaged,
      rowsPromoted,
      rowsPurged,
      rowsSkipped: skipped.length,
      ...(purgeError !== undefined ? { purgeError } : {}),
    };

    await store.recordRun({
      runId,
      dataset: options.dataset,
      sourceFile: file,
      validated,
      rowsStaged,
      rowsPromoted,
      rowsPurged,
      rowsSkipped: skipped.length,
      purgeError: purgeError ?? null,
      startedAt,
      finishedAt: now(),
    });

    log.import.info({ ...result, cutoff: cutoff.toISOString() }, "import complete");
    return result;
  } finally {
    await store.close();
  }
}
