/**
 * Base class for failures the CLI reports to the user and exits on.
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Missing, unknown or malformed command-line arguments. */
export class UsageError extends CliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 2, options);
  }
}

export class InvalidDomainError extends CliError {
  constructor(readonly domain: string) {
    super(`Invalid domain format provided: ${domain}`);
  }
}

export class InputNotFoundError extends CliError {
  constructor(readonly path: string, reason = 'Input file not found') {
    super(`${reason}: ${path}`);
  }
}

export class InputReadFailedError extends CliError {
  constructor(readonly path: string, cause: unknown) {
    super(`Could not read input file ${path}: ${describe(cause)}`, 1, {
      cause,
    });
  }
}

export class OutputWriteFailedError extends CliError {
  constructor(readonly path: string, cause: unknown) {
    super(`Could not write output file ${path}: ${describe(cause)}`, 1, {
      cause,
    });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
