/**
 * context.ts — What every command receives, and the shared error boundary.
 */

import { EXIT_CODES, PipelineError, exitCodeFor, type ExitCode } from "../errors.js";
import { log } from "../logger.js";
import type { ImportStore } from "../stores/import-store.js";

export interface Output {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface CommandDeps {
  env?: Record<string, string | undefined>;
  openStore?: (dsn: string, batchSize: number) => Promise<ImportStore>;
  now?: () => Date;
  output?: Output;
}

/**
 * Run a command body, turning any thrown error into a printed message and
 * its exit code. `--help` short-circuits with the usage text.
 */
export async function runCommand(
  name: string,
  usage: string,
  args: string[],
  output: Output,
  body: () => Promise<ExitCode>,
): Promise<ExitCode> {
  if (args.includes("--help") || args.includes("-h")) {
    output.out(usage);
    return EXIT_CODES.ok;
  }
  try {
    return await body();
  } catch (err) {
    const code = exitCodeFor(err);
    if (err instanceof PipelineError) {
      log.cli.error({ command: name, error: err.name, exitCode: code }, err.message);
      output.err(`❌ ${name}: ${err.message}`);
    } else {
      log.cli.error({ err, command: name, exitCode: code }, "command failed");
      output.err(`❌ ${name}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (code === EXIT_CODES.usage) output.err(usage);
    return code;
  }
}
