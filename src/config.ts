/**
 * config.ts — Configuration resolution
 *
 * Single source of truth for configuration. Priority chain:
 *   1. Explicit override (command-line flag)  ← highest
 *   2. Environment variable
 *   3. Default                                ← lowest
 *
 * Rules:
 * - No `process.env` reads outside this file (except logger bootstrap)
 * - The DSN is handed to the importer as a value, never read from globals there
 */

import { resolveLevel, resolvePretty } from "./logger.js";
import { ConfigError } from "./errors.js";

// ─── Configuration Interface ────────────────────────────────────

export interface AppConfig {
  // ── System ──────────────────────────────────────────────────
  /** Node environment (production, development, test) */
  nodeEnv: string;
  isTest: boolean;
  isDev: boolean;

  // ── Files ───────────────────────────────────────────────────
  /** Directory holding raw and backfilled JSONL files */
  dataDir: string;
  /** Directory receiving validation and summary reports */
  reportDir: string;

  // ── Database ────────────────────────────────────────────────
  /** PostgreSQL connection string; empty when not configured */
  postgresDsn: string;
  /** Staging retention window in days */
  keepDays: number;
  /** Rows per staging INSERT */
  batchSize: number;

  // ── Logging ─────────────────────────────────────────────────
  logLevel: string;
  logPretty: boolean;
}

export type ConfigOverrides = Partial<Pick<AppConfig, "dataDir" | "reportDir" | "postgresDsn" | "keepDays" | "batchSize">>;

// ─── Resolution Helpers ─────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return Number.parseInt(raw.trim(), 10);
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve the complete configuration.
 *
 * @param overrides - values from command-line flags; undefined entries fall through
 * @param env - environment to read (tests pass their own)
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || "development";
  const isTest = nodeEnv === "test" || env.VITEST === "true";
  const isDev = nodeEnv !== "production" && !isTest;

  return {
    nodeEnv,
    isTest,
    isDev,
    dataDir: overrides.dataDir ?? (env.MANGA_DATA_DIR || "data/enriched"),
    reportDir: overrides.reportDir ?? (env.MANGA_REPORT_DIR || "reports/validation"),
    postgresDsn: (overrides.postgresDsn ?? env.POSTGRES_DSN ?? "").trim(),
    keepDays: overrides.keepDays ?? readInt(env, "MANGA_KEEP_DAYS", 30),
    batchSize: overrides.batchSize ?? (readInt(env, "MANGA_BATCH_SIZE", 500) || 500),
    logLevel: resolveLevel(env),
    logPretty: resolvePretty(env),
  };
}

/**
 * Return the DSN to import with: the explicit flag wins over configuration.
 * Fails fast when neither is present.
 */
export function requireDsn(config: AppConfig, explicit?: string): string {
  const dsn = explicit?.trim() || config.postgresDsn;
  if (!dsn) {
    throw new ConfigError("no database DSN: pass --dsn or set POSTGRES_DSN");
  }
  return dsn;
}
