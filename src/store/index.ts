export { ContactIndex, ContactIndexBuilder, compareStrings } from './contact-index.js';
export type { IndexEntry, DisplacedEntry } from './contact-index.js';
export { IndexHolder } from './index-holder.js';
export type { ReloadOutcome } from './index-holder.js';
export { VCardStore } from './vcard-store.js';
export type { NewContact, CreatedContact } from './vcard-store.js';
export { ContactsWatcher } from './watcher.js';
export type { ContactsWatcherOptions } from './watcher.js';
export { contactPath, isCardFile } from './file-layout.js';
