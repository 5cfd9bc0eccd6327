import type { EmailCollector } from './EmailCollector.js';
import type { OutputMode } from './types.js';

export const CSV_LINE_ENDING = '\r\n';

/**
 * Quotes a field when it holds a comma, a quote or a line break.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Returns the rows of the output table, header first, each already joined
 * and terminated.
 */
export function toCsvRows(collector: EmailCollector, mode: OutputMode): string[] {
  const rows: string[][] =
    mode === 'simple'
      ? [['Email'], ...collector.toSortedEmails().map((email) => [email])]
      : [
          ['List', 'Email'],
          ...collector.toSortedPairs().map(({ list, email }) => [list, email]),
        ];

  return rows.map(
    (fields) => fields.map(escapeCsvField).join(',') + CSV_LINE_ENDING
  );
}

export function toCsv(collector: EmailCollector, mode: OutputMode): string {
  return toCsvRows(collector, mode).join('');
}
