import * as fs from 'node:fs/promises';
import type { Contact, ContactSources, LoadResult, LoadWarning } from '../types/index.js';
import { parseVCards, contactFromRecord, contactFromListEntry } from '../contacts/index.js';
import { ContactIndexBuilder, compareStrings, type DisplacedEntry } from '../store/contact-index.js';
import { errorCode, errorMessage, logger, resolvePath, VCardParseError } from '../utils/index.js';
import { readListFile, scanDirectory, type ContactSource } from './sources.js';

/**
 * Build a fresh index from the contacts directory and/or the contact list file.
 * Problems with individual sources become warnings; this never rejects for bad data.
 */
export async function loadContacts(sources: ContactSources): Promise<LoadResult> {
  const warnings: LoadWarning[] = [];
  const found: ContactSource[] = [];

  if (!sources.directory && !sources.listFile) {
    warnings.push({
      kind: 'missing-source',
      path: '',
      message: 'No contacts directory or contact list file configured',
    });
  }

  if (sources.directory) {
    const scanned = await scanDirectory(resolvePath(sources.directory));
    found.push(...scanned.sources);
    warnings.push(...scanned.warnings);
  }
  if (sources.listFile) {
    const listed = await readListFile(resolvePath(sources.listFile));
    found.push(...listed.sources);
    warnings.push(...listed.warnings);
  }

  const builder = new ContactIndexBuilder();
  let contactCount = 0;
  for (const source of orderSources(found)) {
    const contacts = source.kind === 'card-file'
      ? await readCardFile(source.path, warnings)
      : [contactFromListEntry(source.address, source.displayName, source.path, source.line)];

    for (const contact of contacts) {
      contactCount++;
      for (const displaced of builder.add(contact)) {
        warnings.push(duplicateWarning(displaced));
      }
    }
  }

  const index = builder.build();
  logger.info('Loaded', contactCount, 'contacts,', index.size, 'addresses,', warnings.length, 'warnings');
  for (const warning of warnings) logger.warn(warning.message);

  return { index, warnings };
}

/**
 * Deduplicate card files and sort every source by path so that "later wins" does not
 * depend on the order the filesystem returned entries in.
 */
export function orderSources(sources: ContactSource[]): ContactSource[] {
  const seenFiles = new Set<string>();
  const unique = sources.filter(source => {
    if (source.kind !== 'card-file') return true;
    if (seenFiles.has(source.path)) return false;
    seenFiles.add(source.path);
    return true;
  });
  return unique.sort((a, b) => compareStrings(a.path, b.path) || lineOf(a) - lineOf(b));
}

function lineOf(source: ContactSource): number {
  return source.kind === 'list-entry' ? source.line : -1;
}

async function readCardFile(filePath: string, warnings: LoadWarning[]): Promise<Contact[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    warnings.push(errorCode(err) === 'ENOENT'
      ? { kind: 'missing-source', path: filePath, message: `Contact file does not exist: ${filePath}` }
      : { kind: 'unreadable', path: filePath, message: `Cannot read ${filePath}: ${errorMessage(err)}` });
    return [];
  }

  try {
    const contacts: Contact[] = [];
    for (const record of parseVCards(content)) {
      const contact = contactFromRecord(record, filePath);
      if (contact) contacts.push(contact);
      else logger.debug('Skipping card without an email address:', `${filePath}:${record.line + 1}`);
    }
    return contacts;
  } catch (err) {
    if (!(err instanceof VCardParseError)) throw err;
    warnings.push({
      kind: 'parse-error',
      path: filePath,
      line: err.line,
      message: `Failed to parse ${filePath}: ${err.message}`,
    });
    return [];
  }
}

function duplicateWarning({ address, discarded, winner }: DisplacedEntry): LoadWarning {
  const line = lineOfAddress(discarded, address);
  return {
    kind: 'duplicate-address',
    path: discarded.source.path,
    line,
    address,
    message: `Duplicate address ${address}: ${describe(discarded.source.path, line)} is overridden by ${describe(winner.source.path, lineOfAddress(winner, address))}`,
  };
}

function lineOfAddress(contact: Contact, address: string): number | undefined {
  const lower = address.toLowerCase();
  return contact.emails.find(e => e.value.toLowerCase() === lower)?.line ?? contact.source.line;
}

function describe(filePath: string, line?: number): string {
  return line === undefined ? filePath : `${filePath}:${line + 1}`;
}
