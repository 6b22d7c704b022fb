import { EXIT_CODES, type ExitCode, UsageError } from "../errors.js";
import { backfillFile } from "../services/backfill.js";
import { consoleOutput, runCommand, type CommandDeps } from "./context.js";
import { assertKnownFlags, parseDatasetFlag, parseFlag } from "./flags.js";

export const BACKFILL_USAGE = `Usage: manga-backfill --in <raw.jsonl> [--out <path>] [--kind series|populaires]
                      [--ref <previous.jsonl>]

Fill derivable fields and write <stem>.backfilled.jsonl (or --out).
The dataset is inferred from the file name unless --kind is given.
--ref names an earlier backfilled file to take missing titles from.`;

export async function runBackfill(args: string[], deps: CommandDeps = {}): Promise<ExitCode> {
  const output = deps.output ?? consoleOutput;
  return runCommand("backfill", BACKFILL_USAGE, args, output, async () => {
    assertKnownFlags(args, ["--in", "--out", "--kind", "--ref"], []);
    const input = parseFlag(args, "--in");
    if (input === undefined) throw new UsageError("--in is required");
    const ref = parseFlag(args, "--ref");

    const result = await backfillFile(input, {
      dataset: parseDatasetFlag(args, "--kind"),
      outPath: parseFlag(args, "--out"),
      referencePaths: ref === undefined ? [] : [ref],
      now: deps.now,
    });

    output.out(`✅ ${result.dataset}: ${result.records} records → ${result.outputPath}`);
    output.out(`   changed ${result.changed}, titles filled ${result.titlesFilled}, skipped lines ${result.skippedLines.length}`);
    return EXIT_CODES.ok;
  });
}
