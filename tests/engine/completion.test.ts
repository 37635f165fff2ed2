import { describe, it, expect } from 'vitest';
import { rankEntries } from '../../src/engine/completion.js';
import { buildIndex, makeContact } from '../helpers.js';

describe('rankEntries', () => {
  const index = buildIndex([
    makeContact('Jane Doe', ['jane@example.com']),
    makeContact(undefined, ['janet@x.org']),
    makeContact('Alex Jansen', ['alex@example.com']),
    makeContact('Bob', ['bob@example.com']),
  ]);

  it('should rank prefixes first, then substrings, then by address', () => {
    const { ranked, truncated } = rankEntries(index.entries(), 'JAN');

    expect(truncated).toBe(false);
    expect(ranked.map(r => [r.entry.key, r.rank])).toEqual([
      ['jane@example.com', 0],
      ['janet@x.org', 0],
      ['alex@example.com', 1],
    ]);
  });

  it('should match every entry for an empty partial', () => {
    expect(rankEntries(index.entries(), '').ranked.map(r => r.entry.key)).toEqual([
      'alex@example.com',
      'bob@example.com',
      'jane@example.com',
      'janet@x.org',
    ]);
  });

  it('should respect the limit', () => {
    const { ranked, truncated } = rankEntries(index.entries(), '', 2);

    expect(ranked).toHaveLength(2);
    expect(truncated).toBe(true);
  });

  it('should match a contact by nickname', () => {
    const robert = makeContact('Robert Smith', ['rsmith@example.com'], {
      fields: [{ key: 'nickname', value: 'Bobby' }],
    });
    const entries = buildIndex([robert, makeContact('Ann Lee', ['ann@example.com'])]).entries();

    expect(rankEntries(entries, 'bob').ranked.map(r => [r.entry.key, r.rank])).toEqual([['rsmith@example.com', 0]]);
    expect(rankEntries(entries, 'BB').ranked.map(r => [r.entry.key, r.rank])).toEqual([['rsmith@example.com', 1]]);
  });
});
