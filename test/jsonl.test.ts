import { readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { InputReadError, MalformedLineError } from "../src/errors.js";
import { fileExists, readJsonl, stableJsonStringify, writeJsonl } from "../src/jsonl.js";
import { TempDirs } from "./helpers/fixtures.js";

describe("jsonl", () => {
  const temp = new TempDirs();

  afterEach(async () => {
    await temp.cleanup();
  });

  it("keeps parsable lines and collects malformed ones with line numbers", async () => {
    const dir = await temp.make("jsonl");
    const path = join(dir, "mixed.jsonl");
    await writeFile(path, '{"a":1}\n\nnot json\n[1,2]\n{"b":2}\n');

    const content = await readJsonl(path);

    expect(content.lines).toEqual([
      { line: 1, record: { a: 1 } },
      { line: 5, record: { b: 2 } },
    ]);
    expect(content.malformed.map((m) => m.line)).toEqual([3, 4]);
    expect(content.malformed[1]).toBeInstanceOf(MalformedLineError);
    expect(content.malformed[1].detail).toBe("line is not a JSON object");
    expect(content.malformed[1].message).toBe(`${path}:4: line is not a JSON object`);
  });

  it("ignores a byte order mark and CRLF endings", async () => {
    const dir = await temp.make("jsonl");
    const path = join(dir, "bom.jsonl");
    await writeFile(path, '\uFEFF{"a":1}\r\n{"a":2}\r\n');

    const content = await readJsonl(path);

    expect(content.lines.map((l) => l.record)).toEqual([{ a: 1 }, { a: 2 }]);
    expect(content.malformed).toEqual([]);
  });

  it("reports a missing file as an input error", async () => {
    const dir = await temp.make("jsonl");
    const path = join(dir, "absent.jsonl");

    await expect(readJsonl(path)).rejects.toThrow(InputReadError);
    await expect(readJsonl(path)).rejects.toThrow(`file not found: ${path}`);
    expect(await fileExists(path)).toBe(false);
  });

  it("writes one record per line and leaves no temporary file", async () => {
    const dir = await temp.make("jsonl");
    const path = join(dir, "nested", "out.jsonl");

    await writeJsonl(path, [{ a: 1 }, { b: "x" }]);

    expect(await readFile(path, "utf8")).toBe('{"a":1}\n{"b":"x"}\n');
    expect(await readdir(join(dir, "nested"))).toEqual(["out.jsonl"]);
  });

  it("serializes with sorted keys at every depth", () => {
    expect(stableJsonStringify({ b: 1, a: { d: 1, c: [{ z: 1, y: 2 }] } })).toBe(
      '{"a":{"c":[{"y":2,"z":1}],"d":1},"b":1}',
    );
  });
});
