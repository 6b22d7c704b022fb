/**
 * jsonl.ts — JSON Lines reading and writing
 *
 * Reading is line-tolerant: a line that does not parse, or parses to
 * something other than an object, is collected as malformed and the rest
 * of the file still loads. Writing goes through a temporary sibling file
 * and a rename so a reader never sees a half-written file.
 */

import { access, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { InputReadError, MalformedLineError } from "./errors.js";

export type JsonRecord = Record<string, unknown>;

export interface JsonlLine {
  /** 1-based line number in the source file */
  line: number;
  record: JsonRecord;
}

/** Report form of a MalformedLineError */
export interface MalformedLine {
  line: number;
  message: string;
}

export interface JsonlContent {
  path: string;
  lines: JsonlLine[];
  malformed: MalformedLineError[];
}

export function toMalformedLine(error: MalformedLineError): MalformedLine {
  return { line: error.line, message: error.detail };
}

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}

// ─── Read ───────────────────────────────────────────────────────

export async function readJsonl(path: string): Promise<JsonlContent> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new InputReadError(path, isMissingFile(err) ? "file not found" : "cannot read file", { cause: err });
  }

  const lines: JsonlLine[] = [];
  const malformed: MalformedLineError[] = [];
  const rows = text.replace(/^\uFEFF/, "").split(/\r?\n/);

  rows.forEach((raw, index) => {
    const line = index + 1;
    if (raw.trim() === "") return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      malformed.push(new MalformedLineError(path, line, err instanceof Error ? err.message : String(err)));
      return;
    }
    if (!isJsonRecord(parsed)) {
      malformed.push(new MalformedLineError(path, line, "line is not a JSON object"));
      return;
    }
    lines.push({ line, record: parsed });
  });

  return { path, lines, malformed };
}

// ─── Write ──────────────────────────────────────────────────────

export async function writeJsonl(path: string, records: JsonRecord[]): Promise<void> {
  const body = records.map((record) => `${JSON.stringify(record)}\n`).join("");
  await writeFileAtomic(path, body);
}

export async function writeFileAtomic(path: string, body: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  await writeFile(tmp, body, "utf8");
  await rename(tmp, path);
}

// ─── Canonical JSON ─────────────────────────────────────────────

/** Recursively sort object keys so equal data serializes identically. */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => canonicalize(entry));
  }
  if (!isJsonRecord(value)) {
    return value;
  }
  const output: JsonRecord = {};
  for (const key of Object.keys(value).sort()) {
    output[key] = canonicalize(value[key]);
  }
  return output;
}

export function stableJsonStringify(value: unknown, indent?: number): string {
  return JSON.stringify(canonicalize(value), null, indent);
}
