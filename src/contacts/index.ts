export { parseVCards, serializeVCard } from './vcard.js';
export type { VCardRecord, VCardEmail, NewVCard } from './vcard.js';
export { normalizeEmail, normalizePhone, formatMailbox } from './normalize.js';
export { contactFromRecord, contactFromListEntry } from './model.js';
export { renderContact, renderUnknownAddress } from './render.js';
