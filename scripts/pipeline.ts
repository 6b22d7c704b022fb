#!/usr/bin/env node
/**
 * pipeline.ts — Run the full backfill → validate → import pipeline.
 *
 * Usage:
 *   npm run pipeline                       # backfill, validate, import
 *   npm run pipeline -- --skip-import      # stop after validation
 *   npm run pipeline -- --no-backfill      # validate and import the raw files
 *
 * Reads .env for POSTGRES_DSN and MANGA_* settings.
 */

import "dotenv/config";
import { runPipelineCommand } from "../src/commands/pipeline.js";
import { exitCodeFor } from "../src/errors.js";
import { log } from "../src/logger.js";

runPipelineCommand(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.cli.fatal({ err }, "unhandled failure");
    process.exitCode = exitCodeFor(err);
  },
);
