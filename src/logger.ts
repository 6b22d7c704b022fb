/**
 * logger.ts — Structured logging for the manga-news ETL
 *
 * Built on pino.
 *
 * Configuration:
 *   MANGA_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   MANGA_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   MANGA_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.backfill.info({ file }, "backfill complete");
 *   log.import.error({ err }, "promotion failed");
 *
 * Subsystem loggers:
 *   log.cli, log.backfill, log.validate, log.import, log.pipeline, log.db
 */

import { pino, type Logger, type TransportSingleOptions } from "pino";

// ─── Configuration ──────────────────────────────────────────────

type LogEnv = Record<string, string | undefined>;

function isTestEnv(env: LogEnv): boolean {
  return env.NODE_ENV === "test" || env.VITEST === "true";
}

function isDevEnv(env: LogEnv): boolean {
  return env.NODE_ENV !== "production" && !isTestEnv(env);
}

/** Resolve log level from environment */
export function resolveLevel(env: LogEnv = process.env): string {
  if (env.MANGA_LOG_LEVEL) {
    return env.MANGA_LOG_LEVEL;
  }
  const debugEnv = (env.MANGA_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  // Silent in tests, debug in dev, info in prod
  if (isTestEnv(env)) return "silent";
  if (isDevEnv(env)) return "debug";
  return "info";
}

/** Whether log lines go through pino-pretty */
export function resolvePretty(env: LogEnv = process.env): boolean {
  if (isTestEnv(env)) return false;
  return env.MANGA_LOG_PRETTY === "true" || (env.MANGA_LOG_PRETTY !== "false" && isDevEnv(env));
}

function resolveTransport(): TransportSingleOptions | undefined {
  if (!resolvePretty()) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname,service",
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const transport = resolveTransport();

export const rootLogger: Logger = pino({
  level: resolveLevel(),
  ...(transport ? { transport } : {}),
  base: { service: "manga-news-etl" },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Connection strings carry credentials.
  redact: {
    paths: [
      "dsn", "*.dsn",
      "password", "*.password",
      "connectionString", "*.connectionString",
    ],
    censor: "[REDACTED]",
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

export const log = {
  /** Command-line entry points */
  cli: rootLogger.child({ subsystem: "cli" }),
  /** Backfill stage */
  backfill: rootLogger.child({ subsystem: "backfill" }),
  /** Schema validation */
  validate: rootLogger.child({ subsystem: "validate" }),
  /** Staging/promotion/retention */
  import: rootLogger.child({ subsystem: "import" }),
  /** Orchestrator state transitions */
  pipeline: rootLogger.child({ subsystem: "pipeline" }),
  /** Pool and transaction events */
  db: rootLogger.child({ subsystem: "db" }),
  root: rootLogger,
};

export type { Logger };
