import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';

/** Normalize a phone number to E.164 format. Returns the stripped input if parsing fails. */
export function normalizePhone(raw: string, defaultCountry: CountryCode = 'US'): string {
  const parsed = parsePhoneNumberFromString(raw, defaultCountry);
  if (parsed && (parsed.isValid() || parsed.isPossible())) {
    return parsed.format('E.164');
  }
  const stripped = raw.replace(/[\s\-().]/g, '');
  return stripped || raw;
}

/** Addresses compare case-insensitively; this is the index key. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

const PLAIN_DISPLAY_NAME = /^[\p{L}\p{N} .'-]*$/u;

/** Render `Name <address>`, quoting the name when it has characters outside a plain phrase. */
export function formatMailbox(address: string, displayName?: string): string {
  const name = displayName?.trim();
  if (!name) return address;
  const phrase = PLAIN_DISPLAY_NAME.test(name) ? name : `"${name.replace(/(["\\])/g, '\\$1')}"`;
  return `${phrase} <${address}>`;
}
