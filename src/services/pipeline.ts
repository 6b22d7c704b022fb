/**
 * pipeline.ts — Backfill → Validate → Import for both datasets.
 *
 * States:
 *
 *   start ──► backfilled ──► validated ──► imported ──► done
 *     │            │             │             │
 *     └────────────┴─────┬───────┴─────────────┘
 *                        ▼
 *                      failed
 *
 * `start ──► validated` is taken when backfill is disabled (the raw files
 * are validated instead). A run with import disabled ends, successfully,
 * in `validated`. Every transition is recorded and the whole run is written
 * to `summary_report.json` in the report directory, success or not.
 */

import { join } from "node:path";
import { requireDsn, type AppConfig } from "../config.js";
import { DATASETS, datasetFiles, type DatasetKind } from "../datasets/index.js";
import { EXIT_CODES, ValidationGateError, errorMessage, exitCodeFor, type ExitCode } from "../errors.js";
import { stableJsonStringify, writeFileAtomic } from "../jsonl.js";
import { log } from "../logger.js";
import type { ImportStore } from "../stores/import-store.js";
import { backfillFile, type BackfillResult } from "./backfill.js";
import { importDataset, type ImportResult } from "./importer.js";
import { writeValidationReport } from "./validation-report.js";
import { validateFile } from "./validator.js";

export const SUMMARY_FILE_NAME = "summary_report.json";

export type PipelineState = "start" | "backfilled" | "validated" | "imported" | "done" | "failed";

const ALLOWED: Record<PipelineState, readonly PipelineState[]> = {
  start: ["backfilled", "validated", "failed"],
  backfilled: ["validated", "failed"],
  validated: ["imported", "failed"],
  imported: ["done", "failed"],
  done: [],
  failed: [],
};

export interface PipelineOptions {
  /** Default true; false validates (and imports) the raw files */
  backfill?: boolean;
  /** Default true */
  validate?: boolean;
  /** Default true; false ends the run in `validated` */
  import?: boolean;
  dsn?: string;
  keepDays?: number;
  datasets?: readonly DatasetKind[];
}

export interface PipelineDeps {
  config: AppConfig;
  openStore?: (dsn: string, batchSize: number) => Promise<ImportStore>;
  now?: () => Date;
}

export interface Transition {
  from: PipelineState;
  to: PipelineState;
  at: string;
  detail: string;
}

export interface DatasetVerdict {
  dataset: DatasetKind;
  file: string;
  passed: boolean;
  totalRecords: number;
  violations: number;
  malformedLines: number;
  warningsFailed: string[];
  reportPath: string;
}

export interface PipelineResult {
  state: PipelineState;
  success: boolean;
  exitCode: ExitCode;
  startedAt: string;
  finishedAt: string;
  transitions: Transition[];
  backfills: BackfillResult[];
  validations: DatasetVerdict[];
  imports: ImportResult[];
  failure?: { stage: PipelineState; error: string; message: string };
  summaryPath: string;
}

// ─── State Machine ──────────────────────────────────────────────

export class IllegalTransitionError extends Error {
  override readonly name = "IllegalTransitionError";

  constructor(from: PipelineState, to: PipelineState) {
    super(`illegal pipeline transition ${from} → ${to}`);
  }
}

class PipelineRun {
  private current: PipelineState = "start";
  readonly transitions: Transition[] = [];

  constructor(private readonly now: () => Date) {}

  get state(): PipelineState {
    return this.current;
  }

  advance(to: PipelineState, detail: string): void {
    if (!ALLOWED[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.transitions.push({ from: this.current, to, at: this.now().toISOString(), detail });
    log.pipeline.info({ from: this.current, to, detail }, "pipeline transition");
    this.current = to;
  }
}

// ─── Run ────────────────────────────────────────────────────────

export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineResult> {
  const { config } = deps;
  const now = deps.now ?? (() => new Date());
  const datasets = options.datasets ?? DATASETS;
  const doBackfill = options.backfill ?? true;
  const doValidate = options.validate ?? true;
  const doImport = options.import ?? true;

  const run = new PipelineRun(now);
  const startedAt = now().toISOString();
  const backfills: BackfillResult[] = [];
  const validations: DatasetVerdict[] = [];
  const imports: ImportResult[] = [];
  let failure: PipelineResult["failure"];
  let exitCode: ExitCode = EXIT_CODES.ok;

  log.pipeline.info({ datasets, backfill: doBackfill, validate: doValidate, import: doImport }, "pipeline start");

  try {
    // Fail before touching any file when an import would have no database
    const dsn = doImport ? requireDsn(config, options.dsn) : undefined;
    const inputs = new Map<DatasetKind, string>();

    if (doBackfill) {
      for (const dataset of datasets) {
        const files = datasetFiles(config.dataDir, config.reportDir, dataset);
        const result = await backfillFile(files.raw, {
          dataset,
          outPath: files.backfilled,
          referencePaths: [files.backfilled],
          now,
        });
        backfills.push(result);
        inputs.set(dataset, result.outputPath);
      }
      run.advance("backfilled", backfills.map((b) => `${b.dataset}: ${b.records} records`).join("; "));
    } else {
      for (const dataset of datasets) {
        inputs.set(dataset, datasetFiles(config.dataDir, config.reportDir, dataset).raw);
      }
    }

    if (doValidate) {
      for (const [dataset, file] of inputs) {
        const report = await validateFile(file, { dataset, now });
        const reportPath = await writeValidationReport(report, config.reportDir);
        validations.push({
          dataset,
          file,
          passed: report.passed,
          totalRecords: report.totalRecords,
          violations: report.violations.length,
          malformedLines: report.malformedLines.length,
          warningsFailed: report.warnings.filter((w) => !w.passed).map((w) => w.name),
          reportPath,
        });
      }
      const failed = validations.filter((v) => !v.passed);
      if (failed.length > 0) {
        throw new ValidationGateError(failed.map((v) => v.dataset));
      }
      run.advance("validated", validations.map((v) => `${v.dataset}: passed`).join("; "));
    } else {
      run.advance("validated", "validation skipped");
    }

    if (dsn !== undefined) {
      for (const [dataset, file] of inputs) {
        imports.push(await importDataset(
          { dataset, file, dsn, skipValidation: true, preValidated: doValidate, keepDays: options.keepDays },
          { config, openStore: deps.openStore, now },
        ));
      }
      run.advance("imported", imports.map((i) => `${i.dataset}: ${i.rowsStaged} staged, ${i.rowsPromoted} promoted`).join("; "));
      run.advance("done", "pipeline complete");
    }
  } catch (err) {
    const stage = run.state;
    failure = { stage, error: err instanceof Error ? err.name : "Error", message: errorMessage(err) };
    exitCode = exitCodeFor(err);
    run.advance("failed", failure.message);
    log.pipeline.error({ err, stage }, "pipeline failed");
  }

  const result: PipelineResult = {
    state: run.state,
    success: run.state !== "failed",
    exitCode,
    startedAt,
    finishedAt: now().toISOString(),
    transitions: run.transitions,
    backfills,
    validations,
    imports,
    ...(failure ? { failure } : {}),
    summaryPath: join(config.reportDir, SUMMARY_FILE_NAME),
  };

  await writeFileAtomic(result.summaryPath, `${stableJsonStringify(result, 2)}\n`);
  log.pipeline.info({ state: result.state, success: result.success, summary: result.summaryPath }, "pipeline finished");
  return result;
}
