// Permissive pattern used to find candidates inside free text
const EMAIL_SCAN_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const STRICT_EMAIL_REGEX = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const TLD_SUFFIX_REGEX = /\.[a-zA-Z]{2,}$/;

/**
 * Strict syntactic check applied to every address before it may be output,
 * whether it was found in the text or generated from a name.
 */
export function isValidEmail(email: string): boolean {
  if (!email) return false;
  if (email.includes('..')) return false;
  if (email.startsWith('.') || email.endsWith('.')) return false;
  if (email.includes('@.') || email.includes('.@')) return false;
  if (!TLD_SUFFIX_REGEX.test(email)) return false;
  return STRICT_EMAIL_REGEX.test(email);
}

/**
 * Finds every email-shaped substring in the text, valid or not.
 */
export function findEmailCandidates(text: string): string[] {
  return Array.from(text.matchAll(EMAIL_SCAN_REGEX), (match) => match[0]);
}

/**
 * Returns the email-shaped substrings of `text` that pass {@link isValidEmail},
 * in order of first appearance and without repeats.
 *
 * @example
 * extractValidEmails('Ann <ann@co.com>, bad a..b@co.com');
 * // => ['ann@co.com']
 */
export function extractValidEmails(text: string): string[] {
  return [...new Set(findEmailCandidates(text).filter(isValidEmail))];
}

/** Removes every email-shaped substring from the text. */
export function stripEmailCandidates(text: string): string {
  return text.replace(EMAIL_SCAN_REGEX, '');
}
