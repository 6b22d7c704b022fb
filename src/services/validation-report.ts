/**
 * validation-report.ts — Persist validation reports and render summaries.
 *
 * Reports are written as pretty-printed JSON with sorted keys, so two runs
 * over the same input differ only in `runAt`.
 */

import { join } from "node:path";
import { DATASET_DEFINITIONS } from "../datasets/index.js";
import { stableJsonStringify, writeFileAtomic } from "../jsonl.js";
import type { ValidationReport } from "./validator.js";

/** Write `report` to `reportDir`, named after the dataset unless `fileName` is given. */
export async function writeValidationReport(
  report: ValidationReport,
  reportDir: string,
  fileName?: string,
): Promise<string> {
  const path = join(reportDir, fileName ?? DATASET_DEFINITIONS[report.dataset].reportFileName);
  await writeFileAtomic(path, `${stableJsonStringify(report, 2)}\n`);
  return path;
}

function preview(value: unknown): string {
  const text = value === undefined ? "undefined" : JSON.stringify(value);
  return text.length > 60 ? `${text.slice(0, 57)}...` : text;
}

/** Human-readable verdict, one line per failed expectation. */
export function formatReportSummary(report: ValidationReport): string[] {
  const verdict = report.passed ? "PASS" : "FAIL";
  const lines = [`${verdict} ${report.dataset} ${report.file} (${report.totalRecords} records)`];
  for (const failure of report.failedExpectations) {
    const samples = failure.sampleValues.map(preview).join(", ");
    lines.push(`  ✗ ${failure.field} ${failure.rule}: ${failure.count} record(s) [${samples}]`);
  }
  for (const bad of report.malformedLines) {
    lines.push(`  ✗ line ${bad.line}: ${bad.message}`);
  }
  for (const warning of report.warnings.filter((w) => !w.passed)) {
    lines.push(`  ⚠ ${warning.name}: ${warning.failed}/${warning.total} below ${warning.mostly}`);
  }
  return lines;
}
