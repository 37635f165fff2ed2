import * as fs from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import type { ContactSources, LoadResult } from '../types/index.js';
import { serializeVCard } from '../contacts/vcard.js';
import { loadContacts } from '../loader/index.js';
import { ContactsDirectoryError, generateId, logger, resolvePath } from '../utils/index.js';
import { contactPath } from './file-layout.js';
import { IndexHolder, type ReloadOutcome } from './index-holder.js';

export interface NewContact {
  address: string;
  name?: string;
}

export interface CreatedContact {
  id: string;
  path: string;
  reload: ReloadOutcome;
}

/**
 * The vCard address book on disk: the configured directory and list file, and the index
 * snapshot built from them.
 */
export class VCardStore {
  readonly holder: IndexHolder;
  private readonly sources: ContactSources;
  private readonly load: (sources: ContactSources) => Promise<LoadResult>;

  constructor(
    sources: ContactSources,
    holder: IndexHolder = new IndexHolder(),
    load: (sources: ContactSources) => Promise<LoadResult> = loadContacts,
  ) {
    this.sources = {
      directory: sources.directory ? resolvePath(sources.directory) : undefined,
      listFile: sources.listFile ? resolvePath(sources.listFile) : undefined,
    };
    this.holder = holder;
    this.load = load;
  }

  get directory(): string | undefined {
    return this.sources.directory;
  }

  get listFile(): string | undefined {
    return this.sources.listFile;
  }

  /** Rebuild the index from disk and publish it. Queued behind any reload already running. */
  async reload(): Promise<ReloadOutcome> {
    const outcome = await this.holder.reload(() => this.load(this.sources));
    logger.debug('Index generation', outcome.generation, 'has', outcome.addresses, 'addresses');
    return outcome;
  }

  /** Write a new vCard for `address` into the contacts directory, then reload. */
  async createContact(contact: NewContact): Promise<CreatedContact> {
    const directory = this.sources.directory;
    if (!directory) {
      throw new ContactsDirectoryError('Cannot create a contact: no contacts directory is configured');
    }

    const id = generateId();
    const filePath = contactPath(directory, id);
    const name = contact.name?.trim();
    const vcard = serializeVCard({ uid: id, formattedName: name || undefined, emails: [contact.address] });

    await fs.mkdir(directory, { recursive: true });
    // Write beside the target and rename so a concurrent load never reads half a card.
    const tmpPath = `${filePath}.${randomBytes(6).toString('hex')}.tmp`;
    await fs.writeFile(tmpPath, vcard, 'utf-8');
    await fs.rename(tmpPath, filePath);
    logger.info('Created contact:', id, contact.address);

    const reload = await this.reload();
    return { id, path: filePath, reload };
  }
}
