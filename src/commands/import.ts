import { resolveConfig } from "../config.js";
import { EXIT_CODES, UsageError, type ExitCode } from "../errors.js";
import { importDataset } from "../services/importer.js";
import { consoleOutput, runCommand, type CommandDeps } from "./context.js";
import { assertKnownFlags, hasFlag, parseDatasetFlag, parseFlag, parseNonNegativeIntFlag } from "./flags.js";

export const IMPORT_USAGE = `Usage: manga-import --dataset series|populaires [--file <path>] [--skip-gx]
                    [--keep-days <n>] [--dsn <url>] [--run-id <uuid>]
                    [--batch-size <n>] [--no-merge]
                    [--data-dir <dir>] [--report-dir <dir>]

Stage a backfilled file, promote it to production and purge old staging
rows. Unless --skip-gx is given, the dataset's default files are
backfilled and validated first and the import stops if they fail.
--no-merge stages the rows only: no promotion, no purge.`;

export async function runImport(args: string[], deps: CommandDeps = {}): Promise<ExitCode> {
  const output = deps.output ?? consoleOutput;
  return runCommand("import", IMPORT_USAGE, args, output, async () => {
    assertKnownFlags(
      args,
      ["--dataset", "--file", "--keep-days", "--dsn", "--run-id", "--batch-size", "--data-dir", "--report-dir"],
      ["--skip-gx", "--no-merge"],
    );
    const dataset = parseDatasetFlag(args, "--dataset");
    if (dataset === undefined) throw new UsageError("--dataset is required");

    const config = resolveConfig(
      { dataDir: parseFlag(args, "--data-dir"), reportDir: parseFlag(args, "--report-dir") },
      deps.env,
    );
    const result = await importDataset(
      {
        dataset,
        file: parseFlag(args, "--file"),
        dsn: parseFlag(args, "--dsn"),
        skipValidation: hasFlag(args, "--skip-gx"),
        keepDays: parseNonNegativeIntFlag(args, "--keep-days"),
        runId: parseFlag(args, "--run-id"),
        stageOnly: hasFlag(args, "--no-merge"),
        batchSize: parseNonNegativeIntFlag(args, "--batch-size"),
      },
      { config, openStore: deps.openStore, now: deps.now },
    );

    const mode = result.stageOnly ? " (stage only)" : "";
    output.out(`✅ ${result.dataset} run ${result.runId}: ${result.rowsStaged} staged, ${result.rowsPromoted} promoted, ${result.rowsPurged} purged, ${result.rowsSkipped} skipped${mode}`);
    if (result.purgeError !== undefined) {
      output.err(`⚠ staging purge failed: ${result.purgeError}`);
    }
    return EXIT_CODES.ok;
  });
}
