import { resolveConfig } from "../config.js";
import { datasetFiles } from "../datasets/index.js";
import { EXIT_CODES, UsageError, type ExitCode } from "../errors.js";
import { formatReportSummary, writeValidationReport } from "../services/validation-report.js";
import { validateFile } from "../services/validator.js";
import { consoleOutput, runCommand, type CommandDeps } from "./context.js";
import { assertKnownFlags, parseDatasetFlag, parseFlag, parseNonNegativeIntFlag } from "./flags.js";

export const VALIDATE_USAGE = `Usage: manga-validate [--file <path>] [--schema series|populaires]
                      [--report-dir <dir>] [--report-name <file>] [--data-dir <dir>]
                      [--required-cols <a,b,...>] [--min-rows <n>]

Validate one JSONL file and write a JSON report. The dataset is inferred
from the file name unless --schema is given. Without --file, the
dataset's backfilled file in the data directory is validated.
--required-cols adds fields every record must carry (non-null);
--min-rows sets the minimum record count (default 1).`;

function parseListFlag(args: string[], flag: string): string[] | undefined {
  const raw = parseFlag(args, flag);
  if (raw === undefined) return undefined;
  return raw.split(",").map((item) => item.trim()).filter((item) => item !== "");
}

export async function runValidate(args: string[], deps: CommandDeps = {}): Promise<ExitCode> {
  const output = deps.output ?? consoleOutput;
  return runCommand("validate", VALIDATE_USAGE, args, output, async () => {
    assertKnownFlags(
      args,
      ["--file", "--schema", "--report-dir", "--report-name", "--data-dir", "--required-cols", "--min-rows"],
      [],
    );
    const dataset = parseDatasetFlag(args, "--schema");
    const config = resolveConfig(
      { reportDir: parseFlag(args, "--report-dir"), dataDir: parseFlag(args, "--data-dir") },
      deps.env,
    );

    let file = parseFlag(args, "--file");
    if (file === undefined) {
      if (dataset === undefined) throw new UsageError("--file or --schema is required");
      file = datasetFiles(config.dataDir, config.reportDir, dataset).backfilled;
    }

    const report = await validateFile(file, {
      dataset,
      now: deps.now,
      requiredFields: parseListFlag(args, "--required-cols"),
      minRows: parseNonNegativeIntFlag(args, "--min-rows"),
    });
    const reportPath = await writeValidationReport(report, config.reportDir, parseFlag(args, "--report-name"));

    for (const line of formatReportSummary(report)) output.out(line);
    output.out(`report: ${reportPath}`);
    return report.passed ? EXIT_CODES.ok : EXIT_CODES.validationFailed;
  });
}
