/**
 * backfill.test.ts — Field derivation, cross-record titles, idempotency.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { InputReadError } from "../src/errors.js";
import { backfillFile } from "../src/services/backfill.js";
import { validateFile } from "../src/services/validator.js";
import { FIXED_NOW, SITE, TempDirs, parseLines, writeLines } from "./helpers/fixtures.js";

const now = () => FIXED_NOW;

describe("backfillFile", () => {
  const temp = new TempDirs();

  afterEach(async () => {
    await temp.cleanup();
  });

  it("derives series fields from a raw crawl record", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [{
      series_slug: "Kingdom",
      url: `${SITE}/serie/Kingdom`,
      title_page: "Kingdom",
      status: "En cours",
      volumes_text: "68 tomes",
      origine: "Japon - 2006",
      type: "Seinen",
      genres: ["Action", "Histórique"],
      resume: "Chine antique, période des Royaumes combattants.",
      rag_text: "x".repeat(250),
      indexable_rag: true,
    }]);

    const result = await backfillFile(raw, { now });
    const [record] = parseLines(await readFile(result.outputPath, "utf8"));

    expect(result).toMatchObject({ dataset: "series", records: 1, changed: 1, titlesFilled: 0 });
    expect(result.outputPath).toBe(join(dir, "manganews_series.backfilled.jsonl"));
    expect(record).toMatchObject({
      serie_slug: "Kingdom",
      schema_version: "manganews.series.v1",
      enrich_version: "enrich_jsonl.v1",
      scraped_at: "2026-03-15T12:00:00.000Z",
      status: "ongoing",
      volumes_count: 68,
      origin_country: "Japon",
      origin_year: 2006,
      origin_has_year: true,
      title_page_norm: "KINGDOM",
      type_norm: "SEINEN",
      genres_norm: ["ACTION", "HISTORIQUE"],
      has_resume: true,
      rag_char_len: 250,
      rag_is_consistent: true,
      resume_is_consistent: true,
      origin_year_is_realistic: true,
      genres_norm_is_list: true,
      type_is_present: true,
    });
    expect(record).not.toHaveProperty("series_slug");
    expect(record.source_id).toMatch(/^[0-9a-f]{40}$/);
  });

  it("never overwrites values that are already present", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [{
      serie_slug: "Berserk",
      url: `${SITE}/serie/Berserk`,
      title_page: "Berserk",
      scraped_at: "2025-01-01T00:00:00Z",
      enrich_version: "enrich_item:v2",
      volumes_text: "41 tomes",
      volumes_count: 3,
    }]);

    const result = await backfillFile(raw, { now });
    const [record] = parseLines(await readFile(result.outputPath, "utf8"));

    expect(record.scraped_at).toBe("2025-01-01T00:00:00Z");
    expect(record.enrich_version).toBe("enrich_item:v2");
    expect(record.volumes_count).toBe(3);
  });

  it("does not invent a status", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [{ serie_slug: "Dorohedoro", url: `${SITE}/serie/Dorohedoro`, title_page: "Dorohedoro" }]);

    const result = await backfillFile(raw, { now });
    const [record] = parseLines(await readFile(result.outputPath, "utf8"));

    expect(record).not.toHaveProperty("status");
  });

  it("passes unknown status labels through unchanged", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [
      { serie_slug: "A", url: `${SITE}/serie/A`, title_page: "A", status: "constructor" },
      { serie_slug: "B", url: `${SITE}/serie/B`, title_page: "B", status: "__proto__" },
      { serie_slug: "C", url: `${SITE}/serie/C`, title_page: "C", status: "Inconnu" },
    ]);

    const result = await backfillFile(raw, { now });
    const records = parseLines(await readFile(result.outputPath, "utf8"));
    const report = await validateFile(result.outputPath, { now });

    expect(records.map((r) => r.status)).toEqual(["constructor", "__proto__", "Inconnu"]);
    expect(report.violations.map((v) => [v.field, v.rule, v.observedValue])).toEqual([
      ["status", "in_set", "constructor"],
      ["status", "in_set", "__proto__"],
      ["status", "in_set", "Inconnu"],
    ]);
  });

  it("counts RAG text length in code points", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [{ serie_slug: "A", url: `${SITE}/serie/A`, title_page: "A", rag_text: "漫画📚📚" }]);

    const result = await backfillFile(raw, { now });
    const [record] = parseLines(await readFile(result.outputPath, "utf8"));

    expect(record.rag_char_len).toBe(4);
  });

  it("treats a raw type as present when no normalized type is available", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [
      { serie_slug: "A", url: `${SITE}/serie/A`, title_page: "A", type: "Seinen", type_norm: null },
      { serie_slug: "B", url: `${SITE}/serie/B`, title_page: "B" },
    ]);

    const result = await backfillFile(raw, { now });
    const records = parseLines(await readFile(result.outputPath, "utf8"));

    expect(records.map((r) => [r.type_norm ?? null, r.type_is_present])).toEqual([
      [null, true],
      [null, false],
    ]);
  });

  it("is idempotent on its own output", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [
      { series_slug: "Kingdom", url: `${SITE}/serie/Kingdom`, title_page: "Kingdom", status: "Terminé", origine: "Japon - 2006" },
      { url: `${SITE}/serie/Monster`, title_page: "Monster", genres: ["Thriller"] },
    ]);

    const first = await backfillFile(raw, { now });
    const second = await backfillFile(first.outputPath, {
      dataset: "series",
      outPath: join(dir, "second.jsonl"),
      now,
    });

    expect(await readFile(second.outputPath, "utf8")).toBe(await readFile(first.outputPath, "utf8"));
    expect(second.changed).toBe(0);
  });

  it("fills a missing title from an earlier record with the same identifier", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [
      { serie_slug: "Berserk", url: `${SITE}/serie/Berserk`, title_page: "Berserk" },
      { serie_slug: "Berserk", url: `${SITE}/serie/Berserk` },
      { serie_slug: "Gantz", url: `${SITE}/serie/Gantz` },
    ]);

    const result = await backfillFile(raw, { now });
    const records = parseLines(await readFile(result.outputPath, "utf8"));

    expect(result.titlesFilled).toBe(1);
    expect(records.map((r) => r.title_page)).toEqual(["Berserk", "Berserk", undefined]);
  });

  it("fills a missing title from a reference file", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "populaires.jsonl");
    const reference = join(dir, "previous.backfilled.jsonl");
    await writeLines(reference, [{ serie_slug: "Vinland-Saga", title: "Vinland Saga" }]);
    await writeLines(raw, [{ category: "Seinen", rank_in_category: 3, serie_url: `${SITE}/serie/Vinland-Saga` }]);

    const result = await backfillFile(raw, { now, referencePaths: [reference, join(dir, "absent.jsonl")] });
    const [record] = parseLines(await readFile(result.outputPath, "utf8"));

    expect(result.titlesFilled).toBe(1);
    expect(record.serie_slug).toBe("Vinland-Saga");
    expect(record.title).toBe("Vinland Saga");
  });

  it("produces populaires records that pass validation", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "populaires.jsonl");
    await writeLines(raw, [{
      category: "Shonen",
      rank_in_category: 1,
      title: "One Piece",
      serie_url: `${SITE}/serie/One-Piece`,
      image_url: "https://www.manga-news.com/public/images/series/one-piece.jpg",
      volumes_text: "107 Volume(s)",
    }]);

    const result = await backfillFile(raw, { now });
    const [record] = parseLines(await readFile(result.outputPath, "utf8"));
    const report = await validateFile(result.outputPath, { now });

    expect(record).toMatchObject({
      serie_slug: "One-Piece",
      source: "manga_news",
      collection: "populaires",
      volumes_count: 107,
      schema_version: "manganews.populaires.v1",
      enrich_version: "enrich_item:v2",
      indexable_rag: false,
      rag_is_consistent: true,
    });
    expect(report.passed).toBe(true);
  });

  it("skips malformed lines and keeps every other record in order", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [
      { serie_slug: "A", url: `${SITE}/serie/A` },
      "{broken",
      { serie_slug: "B", url: `${SITE}/serie/B` },
    ]);

    const result = await backfillFile(raw, { now });
    const records = parseLines(await readFile(result.outputPath, "utf8"));

    expect(result.records).toBe(2);
    expect(result.skippedLines.map((s) => s.line)).toEqual([2]);
    expect(records.map((r) => r.serie_slug)).toEqual(["A", "B"]);
  });

  it("fails when no line parses", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, ["{broken", "also broken"]);

    await expect(backfillFile(raw, { now })).rejects.toThrow(InputReadError);
  });

  it("refuses to overwrite its input", async () => {
    const dir = await temp.make("backfill");
    const raw = join(dir, "manganews_series.jsonl");
    await writeLines(raw, [{ serie_slug: "A" }]);

    await expect(backfillFile(raw, { now, outPath: raw })).rejects.toThrow("backfill output would overwrite its input");
  });
});
