import { EmailCollector } from './EmailCollector.js';
import { classifyLine } from './lineClassifier.js';
import { processRecord } from './recordProcessor.js';
import { DEFAULT_LIST_TITLE, type RecordListener } from './types.js';

/** Accumulator threaded through the line-by-line scan. */
export interface ScanState {
  /** Title of the most recent title line, or the default title. */
  readonly title: string;
  readonly collector: EmailCollector;
}

export interface ProcessOptions {
  /** Called for every record, including those that produce nothing. */
  onRecord?: RecordListener;
}

export function initialScanState(): ScanState {
  return { title: DEFAULT_LIST_TITLE, collector: new EmailCollector() };
}

/**
 * One step of the scan: a title line replaces the current title, a record
 * line adds an entry for every address its records resolve to.
 */
export function scanLine(
  state: ScanState,
  line: string,
  domain: string,
  onRecord?: RecordListener
): ScanState {
  const classified = classifyLine(line);

  switch (classified.kind) {
    case 'blank':
      return state;
    case 'title':
      return { ...state, title: classified.title };
    case 'record':
      for (const record of classified.records) {
        const result = processRecord(record, domain);
        for (const email of result.emails) {
          state.collector.add(state.title, email);
        }
        onRecord?.(state.title, record, result);
      }
      return state;
  }
}

/**
 * Converts a block of text into the deduplicated set of (list, email) pairs.
 *
 * @param text The whole input.
 * @param domain Used verbatim for generated addresses.
 */
export function processText(
  text: string,
  domain: string,
  options: ProcessOptions = {}
): EmailCollector {
  return text
    .split(/\r\n|\r|\n/)
    .reduce(
      (state, line) => scanLine(state, line, domain, options.onRecord),
      initialScanState()
    ).collector;
}
