import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Contact } from '../src/types/contact.js';
import type { ContactSources } from '../src/types/load.js';
import { ContactIndex, ContactIndexBuilder } from '../src/store/contact-index.js';
import { IndexHolder } from '../src/store/index-holder.js';
import { VCardStore } from '../src/store/vcard-store.js';
import { DocumentStore } from '../src/documents/store.js';
import { ResolutionEngine } from '../src/engine/engine.js';
import { ALL_FEATURES, type Features } from '../src/engine/features.js';
import type { ServerContext } from '../src/lsp/context.js';

/** Create a temp directory for a test; `cleanup` removes it. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'addressbook-ls-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Write files relative to `dir`, creating parent directories. */
export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const full = path.join(dir, name);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, 'utf-8');
  }
}

/** A minimal vCard 3.0 with one line per property. */
export function card(name: string | undefined, emails: string[], extra: string[] = []): string {
  const lines = ['BEGIN:VCARD', 'VERSION:3.0'];
  if (name) lines.push(`FN:${name}`);
  for (const email of emails) lines.push(`EMAIL:${email}`);
  lines.push(...extra, 'END:VCARD');
  return `${lines.join('\r\n')}\r\n`;
}

/** Build a contact in memory; `source` defaults to a file named after the first address. */
export function makeContact(
  displayName: string | undefined,
  emails: string[],
  overrides: Partial<Contact> = {},
): Contact {
  const filePath = overrides.source?.path ?? `/contacts/${emails[0]}.vcf`;
  return {
    id: `${filePath}#0`,
    displayName,
    emails: emails.map((value, i) => ({ value, line: i + 3 })),
    fields: [],
    source: { path: filePath, line: 0 },
    ...overrides,
  };
}

export function buildIndex(contacts: Contact[]): ContactIndex {
  const builder = new ContactIndexBuilder();
  for (const contact of contacts) builder.add(contact);
  return builder.build();
}

/** An engine over an in-memory index, with no files involved. */
export function createEngine(contacts: Contact[], features: Features = ALL_FEATURES): {
  documents: DocumentStore;
  holder: IndexHolder;
  engine: ResolutionEngine;
} {
  const documents = new DocumentStore();
  const holder = new IndexHolder();
  holder.swap(buildIndex(contacts));
  return { documents, holder, engine: new ResolutionEngine(documents, holder, features) };
}

/**
 * A server context whose store reloads `contacts` from memory, unless `sources` name real
 * files, in which case the store reads them from disk.
 */
export function createServerContext(
  contacts: Contact[],
  features: Features = ALL_FEATURES,
  sources?: ContactSources,
): ServerContext {
  const { documents, holder, engine } = createEngine(contacts, features);
  const store = sources
    ? new VCardStore(sources, holder)
    : new VCardStore({}, holder, async () => ({ index: buildIndex(contacts), warnings: [] }));
  return { documents, engine, store };
}
