/**
 * errors.ts — Error taxonomy for the ETL stages.
 *
 * Every error a command can surface extends PipelineError, which carries the
 * process exit code for that failure class. Row- and line-level errors
 * (MalformedLineError, PartialRowError) are accumulated by their stage and
 * only logged; the rest abort the current run.
 */

import type { DatasetKind } from "./datasets/kinds.js";

export const EXIT_CODES = {
  ok: 0,
  validationFailed: 1,
  inputError: 2,
  importFailed: 3,
  configError: 4,
  usage: 64,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export abstract class PipelineError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** File missing, unreadable, or with nothing parsable in it. */
export class InputReadError extends PipelineError {
  override readonly name = "InputReadError";
  override readonly exitCode = EXIT_CODES.inputError;
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.path = path;
  }
}

export class MalformedLineError extends PipelineError {
  override readonly name = "MalformedLineError";
  override readonly exitCode = EXIT_CODES.inputError;
  readonly path: string;
  readonly line: number;
  readonly detail: string;

  constructor(path: string, line: number, detail: string) {
    super(`${path}:${line}: ${detail}`);
    this.path = path;
    this.line = line;
    this.detail = detail;
  }
}

export class AmbiguousSchemaError extends PipelineError {
  override readonly name = "AmbiguousSchemaError";
  override readonly exitCode = EXIT_CODES.inputError;
  readonly path: string;

  constructor(path: string) {
    super(`cannot infer dataset from '${path}'; pass --schema series|populaires`);
    this.path = path;
  }
}

export class ValidationGateError extends PipelineError {
  override readonly name = "ValidationGateError";
  override readonly exitCode = EXIT_CODES.validationFailed;
  readonly datasets: DatasetKind[];

  constructor(datasets: DatasetKind[], detail?: string) {
    super(`validation failed for ${datasets.join(", ")}${detail ? ` (${detail})` : ""}`);
    this.datasets = datasets;
  }
}

export class ConnectionError extends PipelineError {
  override readonly name = "ConnectionError";
  override readonly exitCode = EXIT_CODES.importFailed;
}

export class PartialRowError extends PipelineError {
  override readonly name = "PartialRowError";
  override readonly exitCode = EXIT_CODES.importFailed;
  readonly line: number;

  constructor(line: number, reason: string) {
    super(`line ${line}: ${reason}`);
    this.line = line;
  }
}

export class ConfigError extends PipelineError {
  override readonly name = "ConfigError";
  override readonly exitCode = EXIT_CODES.configError;
}

export class UsageError extends PipelineError {
  override readonly name = "UsageError";
  override readonly exitCode = EXIT_CODES.usage;
}

/**
 * Map any thrown value to an exit code. Unknown errors during an import are
 * database failures in practice, so they map to importFailed.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof PipelineError) return error.exitCode;
  return EXIT_CODES.importFailed;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
