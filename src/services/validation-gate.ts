/**
 * validation-gate.ts — Backfill then validate a dataset's default files.
 *
 * The importer runs this before touching the database. It always checks
 * the default raw → backfilled pair under the data directory, whatever
 * file the import was asked to load.
 */

import { datasetFiles, type DatasetFiles, type DatasetKind } from "../datasets/index.js";
import type { AppConfig } from "../config.js";
import { backfillFile, type BackfillResult } from "./backfill.js";
import { writeValidationReport } from "./validation-report.js";
import { validateFile, type ValidationReport } from "./validator.js";

export interface GateOutcome {
  dataset: DatasetKind;
  files: DatasetFiles;
  backfill: BackfillResult;
  report: ValidationReport;
  reportPath: string;
}

export type ValidationGate = (dataset: DatasetKind) => Promise<GateOutcome>;

export function createValidationGate(config: AppConfig, now: () => Date = () => new Date()): ValidationGate {
  return async (dataset) => {
    const files = datasetFiles(config.dataDir, config.reportDir, dataset);
    const backfill = await backfillFile(files.raw, {
      dataset,
      outPath: files.backfilled,
      referencePaths: [files.backfilled],
      now,
    });
    const report = await validateFile(files.backfilled, { dataset, now });
    const reportPath = await writeValidationReport(report, config.reportDir);
    return { dataset, files, backfill, report, reportPath };
  };
}
