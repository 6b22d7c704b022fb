/**
 * datasets — Registry of the two crawled datasets and their file layout.
 *
 * Each dataset binds, in one place, its identifier and title fields, its
 * critical and warning rules, its backfill derivations and its file names.
 * Stages resolve a definition once and never branch on the kind again.
 */

import { basename, join } from "node:path";
import { AmbiguousSchemaError, UsageError } from "../errors.js";
import { DATASETS, isDatasetKind, type DatasetKind } from "./kinds.js";
import { populairesDataset } from "./populaires.js";
import type { DatasetDefinition } from "./rules.js";
import { seriesDataset } from "./series.js";

export { DATASETS, isDatasetKind, type DatasetKind };
export type { DatasetDefinition, DeriveContext, RecordRule, RuleContext, WarningRule } from "./rules.js";

export const DATASET_DEFINITIONS: Record<DatasetKind, DatasetDefinition> = {
  series: seriesDataset,
  populaires: populairesDataset,
};

// ─── Resolution ─────────────────────────────────────────────────

/** Parse a `--schema` / `--dataset` / `--kind` value. */
export function parseDatasetKind(value: string): DatasetKind {
  const kind = value.trim().toLowerCase();
  if (!isDatasetKind(kind)) {
    throw new UsageError(`unknown dataset '${value}' (expected ${DATASETS.join(" or ")})`);
  }
  return kind;
}

/**
 * Infer the dataset from a file name: "populaires" → populaires,
 * "series" → series. Both or neither is ambiguous.
 */
export function inferDatasetKind(filePath: string): DatasetKind {
  const name = basename(filePath).toLowerCase();
  const isPopulaires = name.includes("populaires");
  const isSeries = name.includes("series");
  if (isPopulaires && !isSeries) return "populaires";
  if (isSeries && !isPopulaires) return "series";
  throw new AmbiguousSchemaError(filePath);
}

/** An explicit kind always wins over inference. */
export function resolveDataset(filePath: string, explicit?: DatasetKind): DatasetDefinition {
  return DATASET_DEFINITIONS[explicit ?? inferDatasetKind(filePath)];
}

// ─── File Layout ────────────────────────────────────────────────

export interface DatasetFiles {
  raw: string;
  backfilled: string;
  report: string;
}

/** `x.jsonl` → `x.backfilled.jsonl`; other names get the suffix appended. */
export function backfilledPathFor(rawPath: string): string {
  return rawPath.endsWith(".jsonl")
    ? `${rawPath.slice(0, -".jsonl".length)}.backfilled.jsonl`
    : `${rawPath}.backfilled.jsonl`;
}

export function datasetFiles(dataDir: string, reportDir: string, kind: DatasetKind): DatasetFiles {
  const definition = DATASET_DEFINITIONS[kind];
  const raw = join(dataDir, definition.rawFileName);
  return {
    raw,
    backfilled: backfilledPathFor(raw),
    report: join(reportDir, definition.reportFileName),
  };
}
