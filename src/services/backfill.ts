/**
 * backfill.ts — Fill derivable fields in a raw JSONL file.
 *
 * Produces `<stem>.backfilled.jsonl` beside the input. Only missing values
 * are filled: a field already present is never overwritten, except the
 * schema version stamp and the quality flags, which are recomputed.
 * Output holds exactly the parsable input records, in input order, so
 * running backfill on its own output changes nothing.
 *
 * Titles are the one cross-record fill: a record without a title takes the
 * title of an earlier record (or a reference file record) with the same
 * identifier.
 */

import { resolve } from "node:path";
import {
  backfilledPathFor,
  resolveDataset,
  type DatasetDefinition,
  type DatasetKind,
  type DeriveContext,
} from "../datasets/index.js";
import { isNonBlank, slugFromUrl } from "../datasets/rules.js";
import { InputReadError } from "../errors.js";
import {
  fileExists,
  readJsonl,
  stableJsonStringify,
  toMalformedLine,
  writeJsonl,
  type JsonRecord,
  type MalformedLine,
} from "../jsonl.js";
import { log } from "../logger.js";

export interface BackfillOptions {
  dataset?: DatasetKind;
  /** Defaults to `<stem>.backfilled.jsonl` */
  outPath?: string;
  /** Earlier outputs consulted for missing titles; missing files are ignored */
  referencePaths?: string[];
  now?: () => Date;
}

export interface BackfillResult {
  dataset: DatasetKind;
  inputPath: string;
  outputPath: string;
  records: number;
  /** Records whose content changed */
  changed: number;
  titlesFilled: number;
  skippedLines: MalformedLine[];
}

// ─── Record Backfill ────────────────────────────────────────────

/** Fields every dataset carries regardless of kind. */
function applyCommon(record: JsonRecord, definition: DatasetDefinition, ctx: DeriveContext): void {
  if ("series_slug" in record) {
    if (!isNonBlank(record.serie_slug)) record.serie_slug = record.series_slug;
    delete record.series_slug;
  }
  if (!isNonBlank(record[definition.identifierField])) {
    const slug = slugFromUrl(record[definition.urlField]);
    if (slug) record[definition.identifierField] = slug;
  }

  record.schema_version = definition.schemaVersion;
  if (!isNonBlank(record.enrich_version)) record.enrich_version = definition.defaultEnrichVersion;
  if (!isNonBlank(record.scraped_at)) record.scraped_at = ctx.now.toISOString();
}

/**
 * Backfill one record in place. `titles` maps identifier → known title and
 * is updated with this record's title when it has one.
 * Returns true when the title was filled from `titles`.
 */
export function backfillRecord(
  record: JsonRecord,
  definition: DatasetDefinition,
  ctx: DeriveContext,
  titles: Map<string, string> = new Map(),
): boolean {
  applyCommon(record, definition, ctx);

  let titleFilled = false;
  const identifier = record[definition.identifierField];
  if (isNonBlank(identifier)) {
    const title = record[definition.titleField];
    if (isNonBlank(title)) {
      titles.set(identifier, title);
    } else {
      const known = titles.get(identifier);
      if (known !== undefined) {
        record[definition.titleField] = known;
        titleFilled = true;
      }
    }
  }

  definition.derive(record, ctx);
  return titleFilled;
}

async function loadReferenceTitles(paths: string[], definition: DatasetDefinition): Promise<Map<string, string>> {
  const titles = new Map<string, string>();
  for (const path of paths) {
    if (!(await fileExists(path))) continue;
    const { lines } = await readJsonl(path);
    for (const { record } of lines) {
      const identifier = record[definition.identifierField];
      const title = record[definition.titleField];
      if (isNonBlank(identifier) && isNonBlank(title)) titles.set(identifier, title);
    }
  }
  return titles;
}

// ─── File Backfill ──────────────────────────────────────────────

export async function backfillFile(inputPath: string, options: BackfillOptions = {}): Promise<BackfillResult> {
  const definition = resolveDataset(inputPath, options.dataset);
  const outputPath = options.outPath ?? backfilledPathFor(inputPath);
  if (resolve(outputPath) === resolve(inputPath)) {
    throw new InputReadError(inputPath, "backfill output would overwrite its input");
  }

  const content = await readJsonl(inputPath);
  for (const bad of content.malformed) {
    log.backfill.warn({ file: inputPath, line: bad.line, reason: bad.detail }, "skipping malformed line");
  }
  if (content.lines.length === 0 && content.malformed.length > 0) {
    throw new InputReadError(inputPath, "no parsable records");
  }

  // References are read before the output is replaced, so the previous
  // output can serve as a reference for this run.
  const titles = await loadReferenceTitles(options.referencePaths ?? [], definition);
  const ctx: DeriveContext = { now: (options.now ?? (() => new Date()))() };

  const records: JsonRecord[] = [];
  let changed = 0;
  let titlesFilled = 0;
  for (const { record } of content.lines) {
    const before = stableJsonStringify(record);
    if (backfillRecord(record, definition, ctx, titles)) titlesFilled++;
    if (stableJsonStringify(record) !== before) changed++;
    records.push(record);
  }

  await writeJsonl(outputPath, records);

  const result: BackfillResult = {
    dataset: definition.kind,
    inputPath,
    outputPath,
    records: records.length,
    changed,
    titlesFilled,
    skippedLines: content.malformed.map(toMalformedLine),
  };
  log.backfill.info(
    { dataset: result.dataset, file: inputPath, out: outputPath, records: result.records, changed, titlesFilled, skipped: content.malformed.length },
    "backfill complete",
  );
  return result;
}
