/**
 * rules.ts — Building blocks shared by the dataset definitions.
 *
 * A dataset is checked in three layers:
 *   - `schema`: zod object for presence, type and domain of single fields
 *   - `recordRules`: cross-field checks on one record
 *   - `uniqueKeys`: cross-record uniqueness
 * All three are critical. `warningRules` carry a `mostly` ratio and never
 * fail a file.
 */

import { z } from "zod";
import type { JsonRecord } from "../jsonl.js";
import type { DatasetKind } from "./kinds.js";

// ─── Rule Types ─────────────────────────────────────────────────

export interface RuleContext {
  /** Upper bound for plausible publication years */
  currentYear: number;
}

export interface RecordRule {
  name: string;
  field: string;
  check(record: JsonRecord, ctx: RuleContext): boolean;
}

export interface WarningRule extends RecordRule {
  /** Minimum share of records that must pass */
  mostly: number;
}

export interface DeriveContext {
  now: Date;
}

export interface DatasetDefinition {
  kind: DatasetKind;
  identifierField: string;
  urlField: string;
  titleField: string;
  schemaVersion: string;
  defaultEnrichVersion: string;
  rawFileName: string;
  reportFileName: string;
  schema: z.ZodTypeAny;
  recordRules: RecordRule[];
  uniqueKeys: string[][];
  warningRules: WarningRule[];
  /** Dataset-specific backfill; mutates and returns the record. */
  derive(record: JsonRecord, ctx: DeriveContext): JsonRecord;
}

// ─── Zod Field Builders ─────────────────────────────────────────
// Messages double as rule names in violation reports.

export const nonBlank = () => z.string().regex(/\S/, "non_blank");

export const httpUrl = () => z.string().regex(/^https?:\/\//, "url_format");

/** ISO-8601 date with optional time and offset: `2026-03-15`, `2026-03-15T12:00:00+00:00` */
const ISO_8601 = /^\d{4}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01])(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

function isIsoTimestamp(value: string): boolean {
  return ISO_8601.test(value) && !Number.isNaN(Date.parse(value));
}

export const timestamp = () => z.string().refine(isIsoTimestamp, "timestamp");

export const boundedInt = (min: number, max: number) =>
  z.number().int("integer").min(min, "range").max(max, "range");

export const counter = () => z.number().int("integer").nonnegative("range").nullish();

// ─── Value Helpers ──────────────────────────────────────────────

export function isNonBlank(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "" && value.trim().toLowerCase() !== "nan";
}

/** Integer from a number or numeric string ("2014", "2014.0"); null otherwise. */
export function toInt(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
  }
  return null;
}

/** First run of digits in a text ("12 Volume(s)" → 12). */
export function firstInt(value: unknown): number | null {
  if (typeof value !== "string") return null;
  const match = /\d+/.exec(value);
  return match ? Number.parseInt(match[0], 10) : null;
}

export function collapseSpaces(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function stripAccents(value: string): string {
  return value.normalize("NFKD").replace(/\p{M}/gu, "");
}

/** Accent-free, upper-cased, single-spaced; null when blank. */
export function normText(value: unknown): string | null {
  if (!isNonBlank(value)) return null;
  return collapseSpaces(stripAccents(value)).toUpperCase();
}

/** `https://host/index.php/serie/Kingdom` → `Kingdom` */
export function slugFromUrl(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const match = /\/serie\/([^/?#]+)/.exec(value);
  return match ? match[1] : null;
}
