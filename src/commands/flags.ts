/**
 * flags.ts — Minimal argv helpers shared by the commands.
 */

import { parseDatasetKind, type DatasetKind } from "../datasets/index.js";
import { UsageError } from "../errors.js";

export function parseFlag(args: string[], flag: string): string | undefined {
  const index = args.findIndex((value) => value === flag);
  if (index < 0) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

export function parseNonNegativeIntFlag(args: string[], flag: string): number | undefined {
  const raw = parseFlag(args, flag);
  if (raw == null) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`${flag} must be an integer >= 0`);
  }
  return Number.parseInt(raw, 10);
}

export function parseDatasetFlag(args: string[], flag: string): DatasetKind | undefined {
  const raw = parseFlag(args, flag);
  return raw == null ? undefined : parseDatasetKind(raw);
}

/** Reject flags a command does not know. Value-taking flags consume the next arg. */
export function assertKnownFlags(args: string[], valueFlags: string[], booleanFlags: string[]): void {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      i++;
      continue;
    }
    if (!booleanFlags.includes(arg)) {
      throw new UsageError(`unknown argument '${arg}'`);
    }
  }
}
