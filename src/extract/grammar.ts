/** Characters allowed in the local part of an address. */
const LOCAL = "A-Za-z0-9._%+\\-";

/**
 * Conservative address shape: local part, "@", and a domain of at least two labels.
 * The lookbehind keeps a match from starting in the middle of a longer local part.
 */
export const ADDRESS_PATTERN = `(?<![${LOCAL}])[${LOCAL}]+@[A-Za-z0-9\\-]+(?:\\.[A-Za-z0-9\\-]+)+`;

const EXACT_ADDRESS = new RegExp(`^${ADDRESS_PATTERN}$`);

export function addressRegExp(): RegExp {
  return new RegExp(ADDRESS_PATTERN, 'g');
}

export function isAddress(value: string): boolean {
  return EXACT_ADDRESS.test(value);
}

/** Characters that make up an address while it is being typed. */
export function isAddressChar(c: string): boolean {
  return /^[A-Za-z0-9._%+@\-]$/.test(c);
}
