import type { Contact, ContactEmail } from '../types/index.js';
import { normalizeEmail } from '../contacts/normalize.js';

export interface IndexEntry {
  /** Normalized (lower-case) address. */
  key: string;
  email: ContactEmail;
  contact: Contact;
}

export interface DisplacedEntry {
  address: string;
  discarded: Contact;
  winner: Contact;
}

/**
 * Immutable snapshot of the address book. A new generation is built wholesale on every
 * load and swapped in by IndexHolder; nothing mutates a published snapshot.
 */
export class ContactIndex {
  readonly generation: number;
  private readonly byAddress: ReadonlyMap<string, IndexEntry>;
  private sortedEntries?: IndexEntry[];

  constructor(generation: number, byAddress: ReadonlyMap<string, IndexEntry>) {
    this.generation = generation;
    this.byAddress = byAddress;
  }

  static empty(generation: number = 0): ContactIndex {
    return new ContactIndex(generation, new Map());
  }

  get size(): number {
    return this.byAddress.size;
  }

  lookup(address: string): IndexEntry | undefined {
    return this.byAddress.get(normalizeEmail(address));
  }

  has(address: string): boolean {
    return this.byAddress.has(normalizeEmail(address));
  }

  /** All entries, ordered by normalized address. */
  entries(): readonly IndexEntry[] {
    this.sortedEntries ??= [...this.byAddress.values()].sort((a, b) => compareStrings(a.key, b.key));
    return this.sortedEntries;
  }

  /** Distinct contacts that still own at least one address. */
  contacts(): Contact[] {
    const seen = new Set<string>();
    const result: Contact[] = [];
    for (const entry of this.entries()) {
      if (seen.has(entry.contact.id)) continue;
      seen.add(entry.contact.id);
      result.push(entry.contact);
    }
    return result;
  }

  /** Same data under another generation number. */
  withGeneration(generation: number): ContactIndex {
    return new ContactIndex(generation, this.byAddress);
  }
}

export class ContactIndexBuilder {
  private readonly byAddress = new Map<string, IndexEntry>();

  /**
   * Add a contact; later additions win an address over earlier ones.
   * Returns the definitions this contact displaced.
   */
  add(contact: Contact): DisplacedEntry[] {
    const displaced: DisplacedEntry[] = [];
    for (const email of contact.emails) {
      const key = normalizeEmail(email.value);
      const existing = this.byAddress.get(key);
      if (existing && existing.contact.id !== contact.id) {
        displaced.push({ address: email.value, discarded: existing.contact, winner: contact });
      }
      this.byAddress.set(key, { key, email, contact });
    }
    return displaced;
  }

  build(generation: number = 0): ContactIndex {
    return new ContactIndex(generation, new Map(this.byAddress));
  }
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
