#!/usr/bin/env node
/**
 * import.ts — Import a backfilled JSONL file into PostgreSQL.
 *
 * Usage:
 *   npm run import -- --help
 *
 * Reads .env for POSTGRES_DSN and MANGA_* settings.
 */

import "dotenv/config";
import { runImport } from "../src/commands/import.js";
import { exitCodeFor } from "../src/errors.js";
import { log } from "../src/logger.js";

runImport(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.cli.fatal({ err }, "unhandled failure");
    process.exitCode = exitCodeFor(err);
  },
);
