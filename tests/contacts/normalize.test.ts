import { describe, it, expect } from 'vitest';
import { formatMailbox, normalizeEmail, normalizePhone } from '../../src/contacts/normalize.js';

describe('normalizePhone', () => {
  it('should normalize US phone with parens and dashes', () => {
    expect(normalizePhone('(555) 123-4567')).toBe('+15551234567');
  });

  it('should normalize phone with dots', () => {
    expect(normalizePhone('555.123.4567')).toBe('+15551234567');
  });

  it('should keep already-E.164 phones unchanged', () => {
    expect(normalizePhone('+15551234567')).toBe('+15551234567');
  });

  it('should normalize UK phone number', () => {
    expect(normalizePhone('+44 20 7946 0958')).toBe('+442079460958');
  });

  it('should return stripped version for unparseable numbers', () => {
    expect(normalizePhone('ext 123')).toBe('ext123');
  });

  it('should handle empty string', () => {
    expect(normalizePhone('')).toBe('');
  });
});

describe('normalizeEmail', () => {
  it('should lowercase and trim', () => {
    expect(normalizeEmail('  John@Example.COM ')).toBe('john@example.com');
  });
});

describe('formatMailbox', () => {
  it('should put a plain name in front of the address', () => {
    expect(formatMailbox('jane@example.com', 'Jane Doe')).toBe('Jane Doe <jane@example.com>');
  });

  it('should return the bare address without a name', () => {
    expect(formatMailbox('jane@example.com')).toBe('jane@example.com');
    expect(formatMailbox('jane@example.com', '  ')).toBe('jane@example.com');
  });

  it('should quote names with special characters', () => {
    expect(formatMailbox('jane@example.com', 'Doe, Jane')).toBe('"Doe, Jane" <jane@example.com>');
    expect(formatMailbox('boss@example.com', 'The "Boss"')).toBe('"The \\"Boss\\"" <boss@example.com>');
  });

  it('should keep accented names unquoted', () => {
    expect(formatMailbox('zoe@example.com', 'Zoë Ångström')).toBe('Zoë Ångström <zoe@example.com>');
  });
});
