import type { IndexEntry } from '../store/contact-index.js';
import { compareStrings } from '../store/contact-index.js';

export const MAX_COMPLETION_ITEMS = 100;

export interface RankedEntry {
  entry: IndexEntry;
  /** 0 for a prefix match, 1 for a substring match. */
  rank: number;
}

export interface Ranking {
  ranked: RankedEntry[];
  /** True when matches were dropped to respect the limit. */
  truncated: boolean;
}

/**
 * Rank index entries against the text being typed. An entry matches when its own address or
 * its contact's display name or a nickname starts with (rank 0) or contains (rank 1) the
 * partial text, compared case-insensitively. Ties fall back to address order.
 */
export function rankEntries(
  entries: readonly IndexEntry[],
  partial: string,
  limit: number = MAX_COMPLETION_ITEMS,
): Ranking {
  const needle = partial.toLowerCase();
  const matches: RankedEntry[] = [];

  for (const entry of entries) {
    const rank = rankEntry(entry, needle);
    if (rank !== undefined) matches.push({ entry, rank });
  }

  matches.sort((a, b) =>
    a.rank - b.rank
    || compareStrings(a.entry.key, b.entry.key)
    || compareStrings(a.entry.email.value, b.entry.email.value));

  return {
    ranked: matches.slice(0, limit),
    truncated: matches.length > limit,
  };
}

function rankEntry(entry: IndexEntry, needle: string): number | undefined {
  const fields = [entry.email.value.toLowerCase()];
  if (entry.contact.displayName) fields.push(entry.contact.displayName.toLowerCase());
  for (const field of entry.contact.fields) {
    if (field.key === 'nickname') fields.push(field.value.toLowerCase());
  }

  if (fields.some(f => f.startsWith(needle))) return 0;
  if (fields.some(f => f.includes(needle))) return 1;
  return undefined;
}
