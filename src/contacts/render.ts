import type { Contact, ContactField, ContactFieldKey } from '../types/index.js';

type SectionKey = Exclude<ContactFieldKey, 'nickname'>;

const SECTION_ORDER: readonly SectionKey[] = ['phone', 'organization', 'title', 'url', 'address', 'birthday', 'note'];

const SECTION_TITLES: Record<SectionKey, string> = {
  phone: 'Telephone',
  organization: 'Organization',
  title: 'Title',
  url: 'URL',
  address: 'Address',
  birthday: 'Birthday',
  note: 'Note',
};

/** Markdown summary of a contact, used for hover and completion documentation. */
export function renderContact(contact: Contact): string {
  const lines: string[] = [];
  if (contact.displayName) {
    lines.push(`# ${contact.displayName}`, '');
  }
  const nickname = contact.fields.find(f => f.key === 'nickname');
  if (nickname) {
    lines.push(`_${nickname.value}_`, '');
  }

  lines.push('Email:');
  for (const email of contact.emails) {
    lines.push(`- ${email.type ? `${email.type}: ` : ''}${email.value}`);
  }
  lines.push('');

  for (const key of SECTION_ORDER) {
    const fields = contact.fields.filter(f => f.key === key);
    if (fields.length === 0) continue;
    lines.push(`${SECTION_TITLES[key]}:`);
    for (const field of fields) lines.push(`- ${describeField(field)}`);
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

/** Hover text for an address that no contact claims. */
export function renderUnknownAddress(address: string, displayName?: string): string {
  const who = displayName ? `${displayName} <${address}>` : address;
  return `${who}\n\n_Not in contacts_`;
}

function describeField(field: ContactField): string {
  const value = field.value.replace(/\n/g, ' ');
  return field.type ? `${field.type}: ${value}` : value;
}
