import { parseArgs } from 'util';
import { InvalidDomainError, UsageError } from './errors.js';
import type { OutputMode } from './types.js';

const DOMAIN_REGEX = /^[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const USAGE = `Usage: list-to-emails <input_file> <output_file> --domain <domain> [options]

Extracts email addresses from a text file of people, generating
firstname.lastname@<domain> where a record has none, and writes them to CSV.

Options:
  -d, --domain <domain>  Domain for generated addresses (default: $EMAIL_DOMAIN)
      --simple           Write a single Email column instead of List,Email
  -v, --verbose          Report records that produced no address
  -h, --help             Show this help
`;

export interface CliConfig {
  inputPath: string;
  outputPath: string;
  domain: string;
  mode: OutputMode;
  verbose: boolean;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'convert'; config: CliConfig };

/**
 * Resolves the command from the arguments (without the node and script
 * paths) and the environment.
 * @throws {UsageError} when arguments are missing or unknown.
 * @throws {InvalidDomainError} when the domain is not `name.tld` shaped.
 */
export function parseCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { kind: 'help' };
  }

  const [inputPath, outputPath, ...extra] = positionals;
  if (!inputPath || !outputPath) {
    throw new UsageError('Both <input_file> and <output_file> are required');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra[0]}`);
  }

  const domain = values.domain ?? env.EMAIL_DOMAIN;
  if (!domain) {
    throw new UsageError('--domain is required (or set EMAIL_DOMAIN)');
  }
  if (!DOMAIN_REGEX.test(domain)) {
    throw new InvalidDomainError(domain);
  }

  return {
    kind: 'convert',
    config: {
      inputPath,
      outputPath,
      domain,
      mode: values.simple ? 'simple' : 'list',
      verbose: values.verbose ?? false,
    },
  };
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        domain: { type: 'string', short: 'd' },
        simple: { type: 'boolean', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(
      error instanceof Error ? error.message : String(error),
      { cause: error }
    );
  }
}
