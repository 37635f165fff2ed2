import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { LoadWarning } from '../types/index.js';
import { isAddress } from '../extract/grammar.js';
import { isCardFile } from '../store/file-layout.js';
import { errorCode, errorMessage, resolvePath } from '../utils/index.js';

export interface CardFileSource {
  kind: 'card-file';
  path: string;
}

/** A `Display Name address` line of the contact list file. */
export interface ListEntrySource {
  kind: 'list-entry';
  path: string;
  line: number;
  address: string;
  displayName?: string;
}

export type ContactSource = CardFileSource | ListEntrySource;

export interface Enumerated {
  sources: ContactSource[];
  warnings: LoadWarning[];
}

/** Recursively collect card files under `dir`, skipping dot-entries. */
export async function scanDirectory(dir: string): Promise<Enumerated> {
  const result: Enumerated = { sources: [], warnings: [] };

  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      result.warnings.push({ kind: 'missing-source', path: dir, message: `Contacts path is not a directory: ${dir}` });
      return result;
    }
  } catch (err) {
    result.warnings.push(sourceWarning(dir, 'Contacts directory', err));
    return result;
  }

  await walk(dir, result);
  return result;
}

async function walk(dir: string, result: Enumerated): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    result.warnings.push({ kind: 'unreadable', path: dir, message: `Cannot read directory ${dir}: ${errorMessage(err)}` });
    return;
  }

  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, result);
    } else if ((entry.isFile() || entry.isSymbolicLink()) && isCardFile(entry.name)) {
      result.sources.push({ kind: 'card-file', path: full });
    }
  }
}

/**
 * Read the contact list file. Each line names a card file (absolute, `~/`, or relative
 * to the list file) or is an inline `Display Name address` entry.
 */
export async function readListFile(listFile: string): Promise<Enumerated> {
  const result: Enumerated = { sources: [], warnings: [] };

  let content: string;
  try {
    content = await fs.readFile(listFile, 'utf-8');
  } catch (err) {
    result.warnings.push(sourceWarning(listFile, 'Contact list file', err));
    return result;
  }

  const base = path.dirname(listFile);
  content.split(/\r\n|\r|\n/).forEach((raw, line) => {
    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith('#')) return;

    const entry = parseListEntry(trimmed);
    if (entry && !isCardFile(trimmed)) {
      result.sources.push({ kind: 'list-entry', path: listFile, line, ...entry });
    } else {
      result.sources.push({ kind: 'card-file', path: resolvePath(trimmed, base) });
    }
  });
  return result;
}

function parseListEntry(line: string): { address: string; displayName?: string } | undefined {
  const parts = line.split(/\s+/);
  const address = parts[parts.length - 1].replace(/^<(.*)>$/, '$1');
  if (!isAddress(address)) return undefined;

  const name = parts.slice(0, -1).join(' ').replace(/^"(.*)"$/, '$1').trim();
  return name ? { address, displayName: name } : { address };
}

function sourceWarning(p: string, what: string, err: unknown): LoadWarning {
  const code = errorCode(err);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return { kind: 'missing-source', path: p, message: `${what} does not exist: ${p}` };
  }
  return { kind: 'unreadable', path: p, message: `Cannot read ${p}: ${errorMessage(err)}` };
}
