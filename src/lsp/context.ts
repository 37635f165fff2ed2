import type { DocumentStore } from '../documents/index.js';
import type { ResolutionEngine } from '../engine/index.js';
import type { VCardStore } from '../store/index.js';

/** Everything a request handler needs, created once the client has sent its options. */
export interface ServerContext {
  documents: DocumentStore;
  engine: ResolutionEngine;
  store: VCardStore;
}

export const RELOAD_CONTACTS_COMMAND = 'addressbook.reloadContacts';
export const CREATE_CONTACT_COMMAND = 'addressbook.createContact';
