#!/usr/bin/env node
/**
 * @module Main
 * This is the main entry point for the list-to-emails CLI application.
 * It reads a text file of people grouped under list titles, resolves every
 * record to an email address, and writes the deduplicated table as CSV.
 */

import { run } from './lib/run.js';

/**
 * Loads `.env` outside production, then runs the CLI with the process
 * arguments and exits with its code.
 */
async function main(): Promise<void> {
  if (process.env.NODE_ENV !== 'production') {
    await import('dotenv/config');
  }

  // Handle arguments passed via `npm start --`
  const args = process.argv.slice(2);
  if (args[0] === '--') {
    args.shift();
  }

  process.exitCode = await run(args);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Unexpected error: ${message}\n`);
  process.exit(1);
});
