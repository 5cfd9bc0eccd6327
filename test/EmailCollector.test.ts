import { describe, expect, it } from 'vitest';
import { EmailCollector } from '../src/lib/EmailCollector.js';

describe('EmailCollector', () => {
  it('should report whether a pair was new', () => {
    const collector = new EmailCollector();
    expect(collector.add('REITS', 'bob@co.com')).toBe(true);
    expect(collector.add('REITS', 'bob@co.com')).toBe(false);
    expect(collector.size).toBe(1);
    expect(collector.has('REITS', 'bob@co.com')).toBe(true);
  });

  it('should keep the same address under different lists', () => {
    const collector = new EmailCollector();
    collector.add('Banks', 'bob@co.com');
    collector.add('REITS', 'bob@co.com');
    expect(collector.size).toBe(2);
    expect(collector.toSortedEmails()).toEqual(['bob@co.com']);
  });

  it('should sort by list title, then by email', () => {
    const collector = new EmailCollector();
    collector.add('Unknown', 'ann@co.com');
    collector.add('REITS', 'zoe@co.com');
    collector.add('REITS', 'bob@co.com');
    collector.add('Banks', 'cat@co.com');

    expect(collector.toSortedPairs()).toEqual([
      { list: 'Banks', email: 'cat@co.com' },
      { list: 'REITS', email: 'bob@co.com' },
      { list: 'REITS', email: 'zoe@co.com' },
      { list: 'Unknown', email: 'ann@co.com' },
    ]);
  });

  it('should order by code unit, uppercase first', () => {
    const collector = new EmailCollector();
    collector.add('banks', 'a@co.com');
    collector.add('Zeta', 'a@co.com');
    expect(collector.toSortedPairs().map((pair) => pair.list)).toEqual([
      'Zeta',
      'banks',
    ]);
  });
});
