import type { ClassifiedLine } from './types.js';

// A whole line of word characters (any script) and spaces ending in a colon
const TITLE_REGEX = /^([\p{L}\p{N}_ ]+):$/u;

/**
 * Splits a record line into its `;`-separated records, dropping empty ones.
 */
export function splitRecords(line: string): string[] {
  return line
    .split(';')
    .map((record) => record.trim())
    .filter(Boolean);
}

/**
 * Classifies one input line as blank, a list title, or a line of records.
 * Decided on the line alone, without lookahead.
 *
 * @example
 * classifyLine('  REITS:  '); // => { kind: 'title', title: 'REITS' }
 * classifyLine('Bob Jones;'); // => { kind: 'record', records: ['Bob Jones'] }
 */
export function classifyLine(line: string): ClassifiedLine {
  const stripped = line.trim();
  if (!stripped) {
    return { kind: 'blank' };
  }

  const titleMatch = TITLE_REGEX.exec(stripped);
  if (titleMatch) {
    return { kind: 'title', title: titleMatch[1].trim() };
  }

  const records = splitRecords(stripped);
  return records.length > 0 ? { kind: 'record', records } : { kind: 'blank' };
}
