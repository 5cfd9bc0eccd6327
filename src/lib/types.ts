/** Title used for records that appear before any list title line. */
export const DEFAULT_LIST_TITLE = 'Unknown';

/**
 * Which table the CLI writes: `simple` is a single `Email` column,
 * `list` is `List,Email`.
 */
export type OutputMode = 'simple' | 'list';

/** The result of classifying one input line. */
export type ClassifiedLine =
  | { kind: 'blank' }
  | { kind: 'title'; title: string }
  | { kind: 'record'; records: string[] };

/** A validated email together with the list title it was found under. */
export interface OutputPair {
  list: string;
  email: string;
}

/** Why a record produced no address. */
export type SkipReason =
  | 'no-name-tokens'
  | 'empty-name-part'
  | 'invalid-generated-email';

/** What a single record produced. */
export type RecordResult =
  | { source: 'extracted'; emails: string[] }
  | { source: 'generated'; emails: [string] }
  | { source: 'none'; emails: []; reason: SkipReason };

/** Observer called once for every record the scan processes. */
export type RecordListener = (
  list: string,
  record: string,
  result: RecordResult
) => void;
