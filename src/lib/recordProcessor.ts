import {
  buildEmail,
  cleanNamePart,
  pickNameTokens,
  tokenizeName,
} from './names.js';
import type { RecordResult } from './types.js';
import {
  extractValidEmails,
  isValidEmail,
  stripEmailCandidates,
} from './validation.js';

/**
 * Resolves one record to zero or more validated addresses.
 *
 * Addresses already present in the record win: when at least one valid
 * address is found, all of them are returned and no address is generated.
 * Otherwise a `first.last@domain` address is built from the name tokens
 * left after email-shaped text and bracketed annotations are removed.
 *
 * A record that cannot be resolved is not an error; the result carries the
 * reason instead.
 */
export function processRecord(record: string, domain: string): RecordResult {
  const found = extractValidEmails(record);
  if (found.length > 0) {
    return { source: 'extracted', emails: found };
  }

  const names = pickNameTokens(tokenizeName(stripEmailCandidates(record)));
  if (!names) {
    return { source: 'none', emails: [], reason: 'no-name-tokens' };
  }

  const first = cleanNamePart(names.first);
  const last = cleanNamePart(names.last);
  if (!first || !last) {
    return { source: 'none', emails: [], reason: 'empty-name-part' };
  }

  const generated = buildEmail(first, last, domain);
  if (!isValidEmail(generated)) {
    return { source: 'none', emails: [], reason: 'invalid-generated-email' };
  }

  return { source: 'generated', emails: [generated] };
}
