// Matches (...), <...> and [...] annotations, shortest first
const ANNOTATION_REGEX = /\(.*?\)|<.*?>|\[.*?\]/g;
const TOKEN_SEPARATOR_REGEX = /[\s-]+/;
const DASH_ONLY_REGEX = /^[-–—]+$/;

/**
 * Lowercases a name part and drops every character outside `a`-`z`.
 * Accented letters are dropped, not transliterated.
 */
export function cleanNamePart(part: string): string {
  return part.toLowerCase().replace(/[^a-z]/g, '');
}

/**
 * Splits record text into name tokens on whitespace and hyphen runs.
 * Annotations in brackets are removed first.
 */
export function tokenizeName(text: string): string[] {
  return text
    .replace(ANNOTATION_REGEX, '')
    .split(TOKEN_SEPARATOR_REGEX)
    .filter((token) => token !== '' && !DASH_ONLY_REGEX.test(token));
}

/**
 * Picks the raw (first, last) name tokens.
 *
 * The first token is the given name and the last token the surname, unless
 * the first token holds a comma: then it is read as "Last, First". When
 * nothing follows the comma inside the token ("Smith," from "Smith, John"),
 * the given name is the next token.
 *
 * Returns `null` when fewer than two tokens are available.
 */
export function pickNameTokens(
  tokens: string[]
): { first: string; last: string } | null {
  if (tokens.length < 2) return null;

  const head = tokens[0];
  const commaIndex = head.indexOf(',');
  if (commaIndex === -1) {
    return { first: head, last: tokens[tokens.length - 1] };
  }

  const last = head.slice(0, commaIndex);
  const rest = head.slice(commaIndex + 1);
  return { first: rest.trim() ? rest : tokens[1], last };
}

/** Builds the `first.last@domain` address. The domain is used verbatim. */
export function buildEmail(first: string, last: string, domain: string): string {
  return `${first}.${last}@${domain}`;
}
