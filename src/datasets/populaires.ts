/**
 * populaires.ts — Popularity rankings dataset (one record per category rank).
 */

import { z } from "zod";
import type { JsonRecord } from "../jsonl.js";
import {
  boundedInt,
  firstInt,
  httpUrl,
  isNonBlank,
  nonBlank,
  timestamp,
  toInt,
  type DatasetDefinition,
} from "./rules.js";

export const POPULAIRES_SCHEMA_VERSION = "manganews.populaires.v1";
export const POPULAIRES_ENRICH_VERSION = "enrich_item:v2";
export const MAX_RANK = 500;

const VOLUMES_TEXT = /^\d+\s+Volume\(s\)$/;

// ─── Critical Expectations ──────────────────────────────────────

const populairesSchema = z.object({
  source: z.literal("manga_news"),
  collection: z.literal("populaires"),
  category: nonBlank(),
  rank_in_category: boundedInt(1, MAX_RANK),
  title: nonBlank(),
  serie_url: httpUrl(),
  serie_slug: nonBlank(),
  image_url: httpUrl(),
  volumes_text: z.string().regex(VOLUMES_TEXT, "volumes_text_format"),
  volumes_count: boundedInt(1, MAX_RANK),
  schema_version: z.literal(POPULAIRES_SCHEMA_VERSION),
  enrich_version: z.literal(POPULAIRES_ENRICH_VERSION),
  scraped_at: timestamp(),
});

function ragEmpty(record: JsonRecord): boolean {
  return record.indexable_rag !== true
    && (toInt(record.rag_char_len) ?? 0) === 0
    && (record.rag_text == null || record.rag_text === "");
}

// ─── Backfill ───────────────────────────────────────────────────

function derivePopulaires(record: JsonRecord): JsonRecord {
  if (record.source == null) record.source = "manga_news";
  if (record.collection == null) record.collection = "populaires";

  if (record.volumes_count == null) {
    const volumes = firstInt(record.volumes_text);
    if (volumes !== null) record.volumes_count = volumes;
  }
  if (record.volumes_text == null && typeof record.volumes_count === "number" && Number.isInteger(record.volumes_count)) {
    record.volumes_text = `${record.volumes_count} Volume(s)`;
  }

  if (record.indexable_rag === undefined) record.indexable_rag = false;
  record.rag_is_consistent = record.indexable_rag !== true
    || (isNonBlank(record.rag_text) && (toInt(record.rag_char_len) ?? 0) > 0);

  return record;
}

// ─── Definition ─────────────────────────────────────────────────

export const populairesDataset: DatasetDefinition = {
  kind: "populaires",
  identifierField: "serie_slug",
  urlField: "serie_url",
  titleField: "title",
  schemaVersion: POPULAIRES_SCHEMA_VERSION,
  defaultEnrichVersion: POPULAIRES_ENRICH_VERSION,
  rawFileName: "populaires.jsonl",
  reportFileName: "populaires_report.json",
  schema: populairesSchema,
  recordRules: [],
  uniqueKeys: [["serie_url"], ["category", "rank_in_category"]],
  warningRules: [
    {
      name: "volumes_text_matches_count",
      field: "volumes_text",
      mostly: 0.99,
      check: (r) => firstInt(r.volumes_text) === r.volumes_count,
    },
    { name: "rag_fields_empty", field: "rag_text", mostly: 0.99, check: ragEmpty },
  ],
  derive: derivePopulaires,
};
