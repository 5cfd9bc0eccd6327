import { describe, expect, it } from 'vitest';
import { processRecord } from '../src/lib/recordProcessor.js';

const DOMAIN = 'example.com';

describe('processRecord', () => {
  it('should extract an address already present', () => {
    expect(processRecord('John Smith <john.smith@co.com>', DOMAIN)).toEqual({
      source: 'extracted',
      emails: ['john.smith@co.com'],
    });
  });

  it('should extract every valid address and generate none', () => {
    expect(processRecord('Ann Lee ann@co.com bob@co.com', DOMAIN)).toEqual({
      source: 'extracted',
      emails: ['ann@co.com', 'bob@co.com'],
    });
  });

  it('should generate first.last when no address is present', () => {
    expect(processRecord('Jane Doe', DOMAIN)).toEqual({
      source: 'generated',
      emails: ['jane.doe@example.com'],
    });
  });

  it('should swap "Last, First" records', () => {
    expect(processRecord('Smith, John', DOMAIN)).toEqual({
      source: 'generated',
      emails: ['john.smith@example.com'],
    });
  });

  it('should ignore annotations when generating', () => {
    expect(processRecord("Mary O'Neil (Partner)", DOMAIN)).toEqual({
      source: 'generated',
      emails: ['mary.oneil@example.com'],
    });
  });

  it('should not read an invalid address as name text', () => {
    expect(processRecord('Jane Doe <jane..doe@co.com>', DOMAIN)).toEqual({
      source: 'generated',
      emails: ['jane.doe@example.com'],
    });
  });

  it('should skip a single token', () => {
    expect(processRecord('X', DOMAIN)).toEqual({
      source: 'none',
      emails: [],
      reason: 'no-name-tokens',
    });
  });

  it('should skip an invalid address with no names around it', () => {
    expect(processRecord('a..b@example.com', DOMAIN)).toEqual({
      source: 'none',
      emails: [],
      reason: 'no-name-tokens',
    });
  });

  it('should skip names with no letters left after cleaning', () => {
    expect(processRecord('123 456', DOMAIN)).toEqual({
      source: 'none',
      emails: [],
      reason: 'empty-name-part',
    });
  });

  it('should skip a generated address that fails validation', () => {
    expect(processRecord('Jane Doe', 'localhost')).toEqual({
      source: 'none',
      emails: [],
      reason: 'invalid-generated-email',
    });
  });
});
