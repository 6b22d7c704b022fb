#!/usr/bin/env node
/**
 * validate.ts — Validate one JSONL file and write its report.
 *
 * Usage:
 *   npm run validate -- --help
 *
 * Reads .env for POSTGRES_DSN and MANGA_* settings.
 */

import "dotenv/config";
import { runValidate } from "../src/commands/validate.js";
import { exitCodeFor } from "../src/errors.js";
import { log } from "../src/logger.js";

runValidate(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.cli.fatal({ err }, "unhandled failure");
    process.exitCode = exitCodeFor(err);
  },
);
