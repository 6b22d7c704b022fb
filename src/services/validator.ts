/**
 * validator.ts — Critical and warning expectations over a JSONL file.
 *
 * A file passes when it has at least `minRows` records (default 1), no
 * malformed lines and no critical violations. Warning expectations are
 * always evaluated and reported, but never affect the verdict.
 *
 * Violation order is deterministic: per record, schema fields in schema
 * order, then extra required fields, then record rules; uniqueness
 * violations after all records.
 */

import type { ZodIssue } from "zod";
import { resolveDataset, type DatasetDefinition, type DatasetKind, type RuleContext } from "../datasets/index.js";
import { readJsonl, toMalformedLine, type JsonRecord, type JsonlLine, type MalformedLine } from "../jsonl.js";
import { log } from "../logger.js";

// ─── Types ──────────────────────────────────────────────────────

export interface Violation {
  /** 0-based index among parsed records; -1 for file-level violations */
  recordIndex: number;
  /** 1-based line in the file; 0 for file-level violations */
  line: number;
  field: string;
  rule: string;
  observedValue: unknown;
}

export interface WarningResult {
  name: string;
  field: string;
  mostly: number;
  failed: number;
  total: number;
  passed: boolean;
}

export interface FailedExpectation {
  field: string;
  rule: string;
  count: number;
  sampleRecordIndexes: number[];
  sampleValues: unknown[];
}

export interface ValidationReport {
  dataset: DatasetKind;
  file: string;
  passed: boolean;
  totalRecords: number;
  violations: Violation[];
  malformedLines: MalformedLine[];
  failedExpectations: FailedExpectation[];
  warnings: WarningResult[];
  runAt: string;
}

/** File-level expectations layered on top of the dataset definition */
export interface FileExpectations {
  /** Fields every record must carry with a non-null value */
  requiredFields?: string[];
  /** Minimum record count; defaults to 1 */
  minRows?: number;
}

export interface ValidateOptions extends FileExpectations {
  dataset?: DatasetKind;
  now?: () => Date;
}

const SAMPLE_LIMIT = 5;

// ─── Critical Expectations ──────────────────────────────────────

function ruleForIssue(issue: ZodIssue, observed: unknown): string {
  if (observed === undefined || observed === null) return "required";
  switch (issue.code) {
    case "invalid_type":
      return "type";
    case "invalid_enum_value":
    case "invalid_literal":
      return "in_set";
    default:
      return issue.message;
  }
}

function checkRecord(
  definition: DatasetDefinition,
  { line, record }: JsonlLine,
  recordIndex: number,
  ctx: RuleContext,
  requiredFields: string[],
): Violation[] {
  const violations: Violation[] = [];
  // One violation per field and rule (zod may report several checks on one value)
  const seen = new Set<string>();
  const parsed = definition.schema.safeParse(record);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path.map(String).join(".") || "(record)";
      const observed = issue.path.length > 0 ? record[String(issue.path[0])] : record;
      const rule = ruleForIssue(issue, observed);
      const key = `${field}\u0000${rule}`;
      if (seen.has(key)) continue;
      seen.add(key);
      violations.push({ recordIndex, line, field, rule, observedValue: observed ?? null });
    }
  }

  for (const field of requiredFields) {
    const value = Object.hasOwn(record, field) ? record[field] : undefined;
    if (value !== undefined && value !== null) continue;
    if (seen.has(`${field}\u0000required`)) continue;
    violations.push({ recordIndex, line, field, rule: "required", observedValue: null });
  }

  for (const rule of definition.recordRules) {
    if (!rule.check(record, ctx)) {
      violations.push({ recordIndex, line, field: rule.field, rule: rule.name, observedValue: record[rule.field] ?? null });
    }
  }
  return violations;
}

function checkUnique(definition: DatasetDefinition, lines: JsonlLine[]): Violation[] {
  const violations: Violation[] = [];
  for (const fields of definition.uniqueKeys) {
    const firstSeen = new Map<string, number>();
    lines.forEach(({ line, record }, recordIndex) => {
      const values = fields.map((field) => record[field]);
      if (values.some((value) => value === undefined || value === null)) return;
      const key = JSON.stringify(values);
      if (!firstSeen.has(key)) {
        firstSeen.set(key, recordIndex);
        return;
      }
      violations.push({
        recordIndex,
        line,
        field: fields.join("+"),
        rule: "unique",
        observedValue: fields.length === 1 ? values[0] : values,
      });
    });
  }
  return violations;
}

// ─── Warning Expectations ───────────────────────────────────────

function checkWarnings(definition: DatasetDefinition, records: JsonRecord[], ctx: RuleContext): WarningResult[] {
  return definition.warningRules.map((rule) => {
    const failed = records.filter((record) => !rule.check(record, ctx)).length;
    const total = records.length;
    return {
      name: rule.name,
      field: rule.field,
      mostly: rule.mostly,
      failed,
      total,
      passed: total === 0 || (total - failed) / total >= rule.mostly,
    };
  });
}

// ─── Aggregation ────────────────────────────────────────────────

/** Group violations by (field, rule) with a few samples each, in first-seen order. */
export function summarizeViolations(violations: Violation[]): FailedExpectation[] {
  const groups = new Map<string, FailedExpectation>();
  for (const violation of violations) {
    const key = `${violation.field}\u0000${violation.rule}`;
    let group = groups.get(key);
    if (!group) {
      group = { field: violation.field, rule: violation.rule, count: 0, sampleRecordIndexes: [], sampleValues: [] };
      groups.set(key, group);
    }
    group.count++;
    if (group.sampleRecordIndexes.length < SAMPLE_LIMIT) {
      group.sampleRecordIndexes.push(violation.recordIndex);
      group.sampleValues.push(violation.observedValue);
    }
  }
  return [...groups.values()];
}

/** Validate already-parsed lines against a dataset definition. */
export function validateLines(
  definition: DatasetDefinition,
  lines: JsonlLine[],
  ctx: RuleContext,
  expectations: FileExpectations = {},
): { violations: Violation[]; warnings: WarningResult[] } {
  const violations: Violation[] = [];
  if (lines.length < (expectations.minRows ?? 1)) {
    violations.push({ recordIndex: -1, line: 0, field: "(file)", rule: "row_count_min", observedValue: lines.length });
  }
  const requiredFields = expectations.requiredFields ?? [];
  lines.forEach((entry, recordIndex) => {
    violations.push(...checkRecord(definition, entry, recordIndex, ctx, requiredFields));
  });
  violations.push(...checkUnique(definition, lines));

  const warnings = checkWarnings(definition, lines.map((entry) => entry.record), ctx);
  return { violations, warnings };
}

export async function validateFile(file: string, options: ValidateOptions = {}): Promise<ValidationReport> {
  const definition = resolveDataset(file, options.dataset);
  const runAt = (options.now ?? (() => new Date()))();
  const content = await readJsonl(file);

  const { violations, warnings } = validateLines(
    definition,
    content.lines,
    { currentYear: runAt.getUTCFullYear() },
    { requiredFields: options.requiredFields, minRows: options.minRows },
  );
  const report: ValidationReport = {
    dataset: definition.kind,
    file,
    passed: violations.length === 0 && content.malformed.length === 0,
    totalRecords: content.lines.length,
    violations,
    malformedLines: content.malformed.map(toMalformedLine),
    failedExpectations: summarizeViolations(violations),
    warnings,
    runAt: runAt.toISOString(),
  };

  for (const warning of warnings.filter((w) => !w.passed)) {
    log.validate.warn({ dataset: report.dataset, expectation: warning.name, failed: warning.failed, total: warning.total }, "warning expectation below threshold");
  }
  log.validate.info(
    { dataset: report.dataset, file, passed: report.passed, records: report.totalRecords, violations: violations.length, malformed: content.malformed.length },
    report.passed ? "validation passed" : "validation failed",
  );
  return report;
}
