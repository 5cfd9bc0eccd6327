/**
 * @module list-to-emails
 * This is the main library entry point.
 * It exports the text-to-email pipeline and its stream components.
 */

// --- Library Exports ---
export { processText, scanLine, initialScanState } from './lib/listScan.js';
export type { ProcessOptions, ScanState } from './lib/listScan.js';
export { processRecord } from './lib/recordProcessor.js';
export { classifyLine, splitRecords } from './lib/lineClassifier.js';
export {
  isValidEmail,
  extractValidEmails,
  findEmailCandidates,
} from './lib/validation.js';
export { cleanNamePart, tokenizeName, pickNameTokens } from './lib/names.js';
export { EmailCollector } from './lib/EmailCollector.js';
export { toCsv, toCsvRows, escapeCsvField } from './lib/csv.js';
export { LineSplitter } from './lib/LineSplitter.js';
export { ListScanner } from './lib/ListScanner.js';
export type { ListScannerOptions } from './lib/ListScanner.js';
export { DEFAULT_LIST_TITLE } from './lib/types.js';
export type {
  ClassifiedLine,
  OutputMode,
  OutputPair,
  RecordListener,
  RecordResult,
  SkipReason,
} from './lib/types.js';
