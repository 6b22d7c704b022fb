import { resolveConfig } from "../config.js";
import type { ExitCode } from "../errors.js";
import { runPipeline } from "../services/pipeline.js";
import { consoleOutput, runCommand, type CommandDeps } from "./context.js";
import { assertKnownFlags, hasFlag, parseFlag, parseNonNegativeIntFlag } from "./flags.js";

export const PIPELINE_USAGE = `Usage: manga-pipeline [--no-backfill] [--skip-validation] [--skip-import]
                      [--dsn <url>] [--keep-days <n>]
                      [--data-dir <dir>] [--report-dir <dir>]

Backfill, validate and import both datasets. Stops before the database
when any dataset fails validation. Writes summary_report.json to the
report directory.`;

export async function runPipelineCommand(args: string[], deps: CommandDeps = {}): Promise<ExitCode> {
  const output = deps.output ?? consoleOutput;
  return runCommand("pipeline", PIPELINE_USAGE, args, output, async () => {
    assertKnownFlags(
      args,
      ["--dsn", "--keep-days", "--data-dir", "--report-dir"],
      ["--no-backfill", "--skip-validation", "--skip-import"],
    );
    const config = resolveConfig(
      { dataDir: parseFlag(args, "--data-dir"), reportDir: parseFlag(args, "--report-dir") },
      deps.env,
    );

    const result = await runPipeline(
      {
        backfill: !hasFlag(args, "--no-backfill"),
        validate: !hasFlag(args, "--skip-validation"),
        import: !hasFlag(args, "--skip-import"),
        dsn: parseFlag(args, "--dsn"),
        keepDays: parseNonNegativeIntFlag(args, "--keep-days"),
      },
      { config, openStore: deps.openStore, now: deps.now },
    );

    for (const verdict of result.validations) {
      const mark = verdict.passed ? "✅" : "❌";
      output.out(`${mark} ${verdict.dataset}: ${verdict.totalRecords} records, ${verdict.violations} violation(s) → ${verdict.reportPath}`);
    }
    for (const run of result.imports) {
      output.out(`✅ ${run.dataset}: ${run.rowsStaged} staged, ${run.rowsPromoted} promoted, ${run.rowsPurged} purged`);
    }
    if (result.failure) {
      output.err(`❌ pipeline failed after ${result.failure.stage}: ${result.failure.message}`);
    } else {
      output.out(`✅ pipeline finished in state ${result.state}`);
    }
    output.out(`summary: ${result.summaryPath}`);
    return result.exitCode;
  });
}
