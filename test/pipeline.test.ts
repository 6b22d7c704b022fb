/**
 * pipeline.test.ts — End-to-end runs over temp directories with the
 * in-memory store standing in for PostgreSQL.
 */

import { access, readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { EXIT_CODES } from "../src/errors.js";
import { runPipeline } from "../src/services/pipeline.js";
import {
  FIXED_NOW,
  TempDirs,
  populaireRecord,
  seriesRecord,
  testConfig,
  writeLines,
} from "./helpers/fixtures.js";
import { MemoryImportStore } from "./helpers/memory-import-store.js";

const now = () => FIXED_NOW;

describe("runPipeline", () => {
  const temp = new TempDirs();

  afterEach(async () => {
    await temp.cleanup();
  });

  async function workspace(series = [seriesRecord("Kingdom"), seriesRecord("Berserk"), seriesRecord("Monster")]) {
    const root = await temp.make("pipeline");
    const dataDir = join(root, "data");
    const reportDir = join(root, "reports");
    await writeLines(join(dataDir, "manganews_series.jsonl"), series);
    await writeLines(join(dataDir, "populaires.jsonl"), [populaireRecord("One-Piece", 1), populaireRecord("Naruto", 2)]);
    const store = new MemoryImportStore();
    const openStore = vi.fn(async (_dsn: string, _batchSize: number) => store);
    return { dataDir, reportDir, store, openStore, config: testConfig(dataDir, reportDir) };
  }

  it("runs every stage and imports both datasets", async () => {
    const ws = await workspace();

    const result = await runPipeline({}, { config: ws.config, openStore: ws.openStore, now });

    expect(result.state).toBe("done");
    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(EXIT_CODES.ok);
    expect(result.transitions.map((t) => `${t.from}→${t.to}`)).toEqual([
      "start→backfilled",
      "backfilled→validated",
      "validated→imported",
      "imported→done",
    ]);
    expect(result.imports.map((i) => [i.dataset, i.rowsStaged, i.rowsPromoted, i.validated])).toEqual([
      ["series", 3, 3, true],
      ["populaires", 2, 2, true],
    ]);
    expect(ws.store.production.size).toBe(5);
    expect(ws.store.closeCount).toBe(2);
  });

  it("stops before the database when a dataset fails validation", async () => {
    const ws = await workspace([
      seriesRecord("Kingdom"),
      seriesRecord("Berserk", { status: undefined }),
      seriesRecord("Monster"),
    ]);

    const result = await runPipeline({}, { config: ws.config, openStore: ws.openStore, now });

    expect(result.state).toBe("failed");
    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(EXIT_CODES.validationFailed);
    expect(result.failure).toEqual({
      stage: "backfilled",
      error: "ValidationGateError",
      message: "validation failed for series",
    });
    expect(result.validations.map((v) => [v.dataset, v.passed, v.violations])).toEqual([
      ["series", false, 1],
      ["populaires", true, 0],
    ]);
    expect(ws.openStore).not.toHaveBeenCalled();

    const report: unknown = JSON.parse(await readFile(join(ws.reportDir, "manganews_series_report.json"), "utf8"));
    expect(report).toMatchObject({
      passed: false,
      violations: [{ recordIndex: 1, field: "status", rule: "required" }],
    });
  });

  it("ends in validated without a database when import is disabled", async () => {
    const ws = await workspace();
    const config = { ...ws.config, postgresDsn: "" };

    const result = await runPipeline({ import: false }, { config, openStore: ws.openStore, now });

    expect(result.state).toBe("validated");
    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(EXIT_CODES.ok);
    expect(result.imports).toEqual([]);
    expect(ws.openStore).not.toHaveBeenCalled();
  });

  it("validates and imports the raw files when backfill is disabled", async () => {
    const ws = await workspace();

    const result = await runPipeline({ backfill: false }, { config: ws.config, openStore: ws.openStore, now });

    expect(result.transitions[0]).toMatchObject({ from: "start", to: "validated" });
    expect(result.backfills).toEqual([]);
    expect(result.validations.map((v) => v.file)).toEqual([
      join(ws.dataDir, "manganews_series.jsonl"),
      join(ws.dataDir, "populaires.jsonl"),
    ]);
    expect(result.imports[0].file).toBe(join(ws.dataDir, "manganews_series.jsonl"));
    await expect(access(join(ws.dataDir, "manganews_series.backfilled.jsonl"))).rejects.toThrow();
  });

  it("records an unvalidated import when validation is skipped", async () => {
    const ws = await workspace([seriesRecord("Kingdom"), seriesRecord("Berserk", { status: undefined })]);

    const result = await runPipeline({ validate: false }, { config: ws.config, openStore: ws.openStore, now });

    expect(result.state).toBe("done");
    expect(result.transitions[1]).toMatchObject({ from: "backfilled", to: "validated", detail: "validation skipped" });
    expect(result.imports.every((i) => !i.validated)).toBe(true);
  });

  it("fails fast on a missing DSN", async () => {
    const ws = await workspace();

    const result = await runPipeline({}, { config: { ...ws.config, postgresDsn: "" }, openStore: ws.openStore, now });

    expect(result.exitCode).toBe(EXIT_CODES.configError);
    expect(result.failure?.stage).toBe("start");
    expect(result.backfills).toEqual([]);
  });

  it("fails with an input error when a raw file is missing", async () => {
    const root = await temp.make("pipeline");
    const config = testConfig(join(root, "data"), join(root, "reports"));

    const result = await runPipeline({ import: false }, { config, now });

    expect(result.exitCode).toBe(EXIT_CODES.inputError);
    expect(result.failure?.error).toBe("InputReadError");
  });

  it("writes a summary report whatever the outcome", async () => {
    const ws = await workspace([seriesRecord("Kingdom", { url: "not-a-url" })]);

    const result = await runPipeline({}, { config: ws.config, openStore: ws.openStore, now });
    const summary: unknown = JSON.parse(await readFile(join(ws.reportDir, "summary_report.json"), "utf8"));

    expect(result.summaryPath).toBe(join(ws.reportDir, "summary_report.json"));
    expect(summary).toMatchObject({
      state: "failed",
      success: false,
      exitCode: 1,
      startedAt: "2026-03-15T12:00:00.000Z",
      transitions: [
        { from: "start", to: "backfilled" },
        { from: "backfilled", to: "failed" },
      ],
    });
  });
});
