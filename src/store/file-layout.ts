import * as path from 'node:path';

/** Extension of the card files this server writes. */
export const CARD_EXTENSION = '.vcf';

const CARD_FILE = /\.(vcf|vcard)$/i;

export function isCardFile(filePath: string): boolean {
  return CARD_FILE.test(filePath);
}

export function contactPath(directory: string, id: string): string {
  return path.join(directory, `${id}${CARD_EXTENSION}`);
}

/** Dot-files and dot-directories are never part of the address book. */
export function isHiddenPath(relativePath: string): boolean {
  return relativePath.split(/[/\\]/).some(part => part.startsWith('.') && part !== '.' && part !== '..');
}
