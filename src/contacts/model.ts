import type { Contact, ContactEmail } from '../types/index.js';
import type { VCardRecord } from './vcard.js';
import { normalizeEmail } from './normalize.js';

/**
 * Build a Contact from a parsed card. Repeated addresses within the card are folded;
 * a card without any address yields undefined.
 */
export function contactFromRecord(record: VCardRecord, path: string): Contact | undefined {
  const seen = new Set<string>();
  const emails: ContactEmail[] = [];
  for (const email of record.emails) {
    const key = normalizeEmail(email.value);
    if (seen.has(key)) continue;
    seen.add(key);
    emails.push({
      value: email.value,
      type: email.type,
      primary: email.primary || undefined,
      line: email.line,
    });
  }
  if (emails.length === 0) return undefined;

  return {
    id: `${path}#${record.line}`,
    displayName: record.formattedName,
    emails,
    fields: record.fields,
    source: { path, line: record.line },
  };
}

/** A `Display Name address` line of a contact list file. */
export function contactFromListEntry(
  address: string,
  displayName: string | undefined,
  path: string,
  line: number,
): Contact {
  return {
    id: `${path}#${line}`,
    displayName: displayName || undefined,
    emails: [{ value: address, line }],
    fields: [],
    source: { path, line },
  };
}
