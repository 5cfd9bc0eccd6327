import { parseCommand, USAGE } from './config.js';
import { convertFile } from './convertFile.js';
import { CliError, UsageError } from './errors.js';
import type { RecordListener } from './types.js';

/** Where the CLI writes its messages. */
export interface CliOutput {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

/**
 * Runs the CLI with the given arguments (node and script paths excluded).
 *
 * Failures the user can act on are reported on stderr and turned into the
 * exit code. Anything else is rethrown.
 * @returns The process exit code.
 */
export async function run(
  argv: string[],
  io: CliOutput = { stdout: process.stdout, stderr: process.stderr },
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const command = parseCommand(argv, env);
    if (command.kind === 'help') {
      io.stdout.write(USAGE);
      return 0;
    }

    const { config } = command;
    const onRecord: RecordListener | undefined = config.verbose
      ? (list, record, result) => {
          if (result.source === 'none') {
            io.stderr.write(`[SKIPPED] ${list}: ${record} (${result.reason})\n`);
          }
        }
      : undefined;

    const count = await convertFile(config, onRecord);
    io.stdout.write(
      `Successfully wrote ${count} unique emails to ${config.outputPath}\n`
    );
    return 0;
  } catch (error) {
    if (!(error instanceof CliError)) {
      throw error;
    }
    io.stderr.write(`Error: ${error.message}\n`);
    if (error instanceof UsageError) {
      io.stderr.write(`\n${USAGE}`);
    }
    return error.exitCode;
  }
}
