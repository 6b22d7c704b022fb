#!/usr/bin/env node
/** backfill.ts — Backfill derivable fields in a raw JSONL file. */

import "dotenv/config";
import { runBackfill } from "../src/commands/backfill.js";
import { exitCodeFor } from "../src/errors.js";
import { log } from "../src/logger.js";

runBackfill(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.cli.fatal({ err }, "unhandled failure");
    process.exitCode = exitCodeFor(err);
  },
);
