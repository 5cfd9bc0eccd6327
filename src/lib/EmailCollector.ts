import type { OutputPair } from './types.js';

/**
 * An insertion-only set of (list, email) pairs.
 *
 * The same address may be held once per list title. Nothing is ever removed.
 */
export class EmailCollector {
  private pairs = new Map<string, OutputPair>();

  /** Number of distinct (list, email) pairs. */
  get size(): number {
    return this.pairs.size;
  }

  /**
   * Adds a pair.
   * @returns `true` if the pair was not already present.
   */
  add(list: string, email: string): boolean {
    // NUL cannot occur in a title or a validated email
    const key = `${list}\u0000${email}`;
    if (this.pairs.has(key)) {
      return false;
    }
    this.pairs.set(key, { list, email });
    return true;
  }

  /** Whether the address is already held under this list title. */
  has(list: string, email: string): boolean {
    return this.pairs.has(`${list}\u0000${email}`);
  }

  /** All pairs, ordered by list title and then by email. */
  toSortedPairs(): OutputPair[] {
    return [...this.pairs.values()].sort(
      (a, b) => compare(a.list, b.list) || compare(a.email, b.email)
    );
  }

  /** The distinct emails across every list, sorted. */
  toSortedEmails(): string[] {
    const emails = new Set<string>();
    for (const pair of this.pairs.values()) {
      emails.add(pair.email);
    }
    return [...emails].sort(compare);
  }
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
