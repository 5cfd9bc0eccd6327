import * as fs from 'fs';
import * as path from 'path';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  InputNotFoundError,
  InputReadFailedError,
  OutputWriteFailedError,
} from './errors.js';
import { LineSplitter } from './LineSplitter.js';
import { ListScanner } from './ListScanner.js';
import type { CliConfig } from './config.js';
import type { RecordListener } from './types.js';

/**
 * Streams the input file through the line splitter and the list scanner,
 * then writes the resulting CSV. A failed read leaves the output untouched.
 * @returns The number of rows written, header excluded.
 */
export async function convertFile(
  config: Pick<CliConfig, 'inputPath' | 'outputPath' | 'domain' | 'mode'>,
  onRecord?: RecordListener
): Promise<number> {
  const inputPath = path.resolve(process.cwd(), config.inputPath);
  const outputPath = path.resolve(process.cwd(), config.outputPath);

  if (!fs.existsSync(inputPath)) {
    throw new InputNotFoundError(inputPath);
  }
  if (fs.statSync(inputPath).isDirectory()) {
    throw new InputNotFoundError(
      inputPath,
      'Path is a directory, not a file'
    );
  }

  const input = fs.createReadStream(inputPath);
  const scanner = new ListScanner({
    domain: config.domain,
    mode: config.mode,
    onRecord,
  });

  // Rows are held until the input has been read to the end
  const rows: string[] = [];
  const table = new Writable({
    objectMode: true,
    write(row: string, encoding, callback) {
      rows.push(row);
      callback();
    },
  });

  let inputError: unknown;
  input.on('error', (err) => {
    inputError = err;
  });

  try {
    await pipeline(input, new LineSplitter(), scanner, table);
  } catch (error) {
    if (error === inputError) {
      throw new InputReadFailedError(inputPath, error);
    }
    throw error;
  }

  try {
    await fs.promises.writeFile(outputPath, rows.join(''), 'utf8');
  } catch (error) {
    throw new OutputWriteFailedError(outputPath, error);
  }

  return scanner.count;
}
