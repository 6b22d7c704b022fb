/**
 * series.ts — Series catalogue dataset (one record per manga series page).
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import type { JsonRecord } from "../jsonl.js";
import {
  collapseSpaces,
  counter,
  httpUrl,
  isNonBlank,
  nonBlank,
  normText,
  stripAccents,
  timestamp,
  toInt,
  firstInt,
  type DatasetDefinition,
  type DeriveContext,
  type RuleContext,
} from "./rules.js";

export const SERIES_SCHEMA_VERSION = "manganews.series.v1";
export const ENRICH_VERSIONS = ["enrich_jsonl.v1", "enrich_item:v2"] as const;
export const SERIES_STATUSES = ["ongoing", "completed", "hiatus", "cancelled"] as const;
export const MIN_ORIGIN_YEAR = 1950;

export type SeriesStatus = (typeof SERIES_STATUSES)[number];

const STATUS_ALIASES = new Map<string, SeriesStatus>([
  ["ongoing", "ongoing"],
  ["en cours", "ongoing"],
  ["completed", "completed"],
  ["termine", "completed"],
  ["terminee", "completed"],
  ["fini", "completed"],
  ["hiatus", "hiatus"],
  ["en pause", "hiatus"],
  ["cancelled", "cancelled"],
  ["abandonne", "cancelled"],
  ["arrete", "cancelled"],
]);

/** Map a site label ("Terminé", "En cours") to its status code; null when unknown. */
export function normalizeStatus(label: string): SeriesStatus | null {
  return STATUS_ALIASES.get(collapseSpaces(stripAccents(label)).toLowerCase()) ?? null;
}

/** "Japon - 2014" → { country: "Japon", year: 2014 } */
export function parseOrigin(value: unknown): { country: string | null; year: number | null } {
  if (!isNonBlank(value)) return { country: null, year: null };
  const text = collapseSpaces(value.replace(/[–—]/g, "-"));
  const [head] = text.split(/\s*-\s*/, 1);
  const year = /\b(?:19|20)\d{2}\b/.exec(text);
  return {
    country: head && !/^\d+$/.test(head) ? head : null,
    year: year ? Number(year[0]) : null,
  };
}

// ─── Critical Expectations ──────────────────────────────────────

const seriesSchema = z.object({
  serie_slug: nonBlank(),
  url: httpUrl(),
  title_page: nonBlank(),
  status: z.enum(SERIES_STATUSES),
  volumes_count: counter(),
  chapters_count: counter(),
  schema_version: z.literal(SERIES_SCHEMA_VERSION),
  enrich_version: z.enum(ENRICH_VERSIONS),
  scraped_at: timestamp(),
});

function ragConsistent(record: JsonRecord): boolean {
  return record.indexable_rag !== true
    || (isNonBlank(record.rag_text) && (toInt(record.rag_char_len) ?? 0) > 0);
}

function resumeConsistent(record: JsonRecord): boolean {
  return record.has_resume !== true || isNonBlank(record.resume);
}

function originYearPlausible(record: JsonRecord, ctx: RuleContext): boolean {
  if (record.origin_has_year !== true) return true;
  const year = toInt(record.origin_year);
  return year !== null && year >= MIN_ORIGIN_YEAR && year <= ctx.currentYear;
}

// ─── Backfill ───────────────────────────────────────────────────

function deriveSeries(record: JsonRecord, ctx: DeriveContext): JsonRecord {
  if (record.source_id == null && isNonBlank(record.url)) {
    record.source_id = createHash("sha1").update(record.url).digest("hex");
  }

  if (typeof record.status === "string") {
    const status = normalizeStatus(record.status);
    if (status) record.status = status;
  }

  if (record.volumes_count == null) {
    const volumes = firstInt(record.volumes_text);
    if (volumes !== null) record.volumes_count = volumes;
  }

  if (record.origin_country === undefined && record.origin_year === undefined && isNonBlank(record.origine)) {
    const origin = parseOrigin(record.origine);
    record.origin_country = origin.country;
    record.origin_year = origin.year;
  }
  if (record.origin_has_year === undefined) {
    record.origin_has_year = toInt(record.origin_year) !== null;
  }

  if (record.title_page_norm === undefined) {
    const norm = normText(record.title_page);
    if (norm) record.title_page_norm = norm;
  }
  if (record.type_norm === undefined) {
    const norm = normText(record.type);
    if (norm) record.type_norm = norm;
  }
  if (record.genres_norm === undefined && Array.isArray(record.genres)) {
    record.genres_norm = record.genres.map(normText).filter((genre): genre is string => genre !== null);
  }
  if (record.has_resume === undefined) {
    record.has_resume = isNonBlank(record.resume);
  }
  if (record.rag_char_len === undefined && typeof record.rag_text === "string") {
    // Code points, not UTF-16 units
    record.rag_char_len = [...record.rag_text].length;
  }

  // Quality flags are always recomputed from the fields above
  const ruleCtx = { currentYear: ctx.now.getUTCFullYear() };
  record.rag_is_consistent = ragConsistent(record);
  record.resume_is_consistent = resumeConsistent(record);
  record.origin_year_is_realistic = originYearPlausible(record, ruleCtx);
  record.genres_norm_is_list = Array.isArray(record.genres_norm);
  record.type_is_present = isNonBlank(record.type_norm) || isNonBlank(record.type);

  return record;
}

// ─── Definition ─────────────────────────────────────────────────

export const seriesDataset: DatasetDefinition = {
  kind: "series",
  identifierField: "serie_slug",
  urlField: "url",
  titleField: "title_page",
  schemaVersion: SERIES_SCHEMA_VERSION,
  defaultEnrichVersion: "enrich_jsonl.v1",
  rawFileName: "manganews_series.jsonl",
  reportFileName: "manganews_series_report.json",
  schema: seriesSchema,
  recordRules: [
    { name: "rag_consistent", field: "rag_text", check: ragConsistent },
    { name: "resume_consistent", field: "resume", check: resumeConsistent },
  ],
  uniqueKeys: [["url"]],
  warningRules: [
    { name: "origin_year_plausible", field: "origin_year", mostly: 0.99, check: originYearPlausible },
    { name: "genres_norm_is_list", field: "genres_norm", mostly: 0.99, check: (r) => Array.isArray(r.genres_norm) },
    { name: "type_norm_present", field: "type_norm", mostly: 0.99, check: (r) => isNonBlank(r.type_norm) },
  ],
  derive: deriveSeries,
};
