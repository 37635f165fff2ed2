export { loadContacts, orderSources } from './load.js';
export { scanDirectory, readListFile } from './sources.js';
export type { ContactSource, CardFileSource, ListEntrySource } from './sources.js';
