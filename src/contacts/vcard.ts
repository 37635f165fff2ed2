import type { ContactField, ContactFieldKey } from '../types/index.js';
import { VCardParseError } from '../utils/index.js';
import { normalizePhone } from './normalize.js';

export interface VCardEmail {
  value: string;
  type?: string;
  primary: boolean;
  line: number;
}

/** One BEGIN:VCARD ... END:VCARD block, reduced to what the address book uses. */
export interface VCardRecord {
  /** 0-based line of BEGIN:VCARD. */
  line: number;
  uid?: string;
  formattedName?: string;
  emails: VCardEmail[];
  fields: ContactField[];
}

export interface NewVCard {
  uid: string;
  formattedName?: string;
  emails: string[];
}

/**
 * Parse every card in a .vcf file (vCard 2.1, 3.0 and 4.0 are read alike).
 * Throws VCardParseError on structural problems; unknown properties are ignored.
 */
export function parseVCards(text: string): VCardRecord[] {
  const records: VCardRecord[] = [];
  let current: VCardProperty[] | undefined;
  let begin = 0;

  for (const { text: line, line: lineNo } of unfoldLines(text)) {
    if (!line.trim()) continue;
    const prop = parseProperty(line, lineNo);

    if (prop.name === 'BEGIN' && prop.value.trim().toUpperCase() === 'VCARD') {
      if (current) throw new VCardParseError(lineNo, 'BEGIN:VCARD inside an unterminated card');
      current = [];
      begin = lineNo;
      continue;
    }
    if (prop.name === 'END' && prop.value.trim().toUpperCase() === 'VCARD') {
      if (!current) throw new VCardParseError(lineNo, 'END:VCARD without BEGIN:VCARD');
      records.push(toRecord(current, begin));
      current = undefined;
      continue;
    }
    if (!current) {
      throw new VCardParseError(lineNo, 'content outside of a BEGIN:VCARD/END:VCARD block');
    }
    current.push(prop);
  }

  if (current) throw new VCardParseError(begin, 'missing END:VCARD');
  return records;
}

/**
 * Serialize a new card to vCard 4.0 (RFC 6350).
 */
export function serializeVCard(card: NewVCard): string {
  const lines: string[] = [
    'BEGIN:VCARD',
    'VERSION:4.0',
    `UID:urn:uuid:${card.uid}`,
    `FN:${escapeVCardValue(card.formattedName ?? '')}`,
  ];
  for (const email of card.emails) {
    lines.push(`EMAIL:${escapeVCardValue(email)}`);
  }
  lines.push('END:VCARD');

  return `${foldLines(lines.join('\r\n'))}\r\n`;
}

// --- Helpers ---

interface VCardProperty {
  name: string;
  params: string[];
  value: string;
  line: number;
}

interface LogicalLine {
  text: string;
  line: number;
}

const SIMPLE_FIELDS: Record<string, ContactFieldKey> = {
  NICKNAME: 'nickname',
  TITLE: 'title',
  URL: 'url',
  NOTE: 'note',
  BDAY: 'birthday',
};

function toRecord(props: VCardProperty[], line: number): VCardRecord {
  const record: VCardRecord = { line, emails: [], fields: [] };
  let structuredName: string | undefined;

  for (const prop of props) {
    switch (prop.name) {
      case 'FN': {
        const value = unescapeVCardValue(prop.value).trim();
        if (value && record.formattedName === undefined) record.formattedName = value;
        break;
      }
      case 'N':
        structuredName ??= formatStructuredName(prop.value);
        break;
      case 'UID':
        record.uid = prop.value.trim().replace(/^urn:uuid:/i, '');
        break;
      case 'EMAIL': {
        const value = unescapeVCardValue(prop.value).trim().replace(/^mailto:/i, '');
        if (!value) break;
        record.emails.push({
          value,
          type: extractType(prop.params),
          primary: isPreferred(prop.params),
          line: prop.line,
        });
        break;
      }
      case 'TEL': {
        const raw = unescapeVCardValue(prop.value).trim().replace(/^tel:/i, '');
        if (raw) pushField(record, 'phone', normalizePhone(raw), extractType(prop.params));
        break;
      }
      case 'ORG':
      case 'ADR': {
        const value = splitComponents(prop.value, ';')
          .map(part => unescapeVCardValue(part).trim())
          .filter(Boolean)
          .join(', ');
        pushField(record, prop.name === 'ORG' ? 'organization' : 'address', value, extractType(prop.params));
        break;
      }
      default: {
        const key = SIMPLE_FIELDS[prop.name];
        if (key) pushField(record, key, unescapeVCardValue(prop.value).trim(), extractType(prop.params));
      }
    }
  }

  if (record.formattedName === undefined && structuredName) {
    record.formattedName = structuredName;
  }
  return record;
}

function pushField(record: VCardRecord, key: ContactFieldKey, value: string, type?: string): void {
  if (!value) return;
  record.fields.push(type ? { key, value, type } : { key, value });
}

/** N is family;given;additional;prefix;suffix. */
function formatStructuredName(value: string): string | undefined {
  const [family, given, additional, prefix, suffix] = splitComponents(value, ';')
    .map(part => unescapeVCardValue(part).trim());
  const name = [prefix, given, additional, family, suffix].filter(Boolean).join(' ');
  return name || undefined;
}

function parseProperty(line: string, lineNo: number): VCardProperty {
  const colonIdx = findValueSeparator(line);
  if (colonIdx < 0) {
    throw new VCardParseError(lineNo, `expected "NAME:value", got "${line.slice(0, 40)}"`);
  }
  const parts = line.substring(0, colonIdx).split(';');
  // Drop a group prefix such as "item1.EMAIL".
  const name = parts[0].split('.').pop()?.trim().toUpperCase() ?? '';
  if (!name) throw new VCardParseError(lineNo, 'property without a name');

  return {
    name,
    params: parts.slice(1),
    value: line.substring(colonIdx + 1),
    line: lineNo,
  };
}

/** Index of the first colon outside a quoted parameter value. */
function findValueSeparator(line: string): number {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (c === '"') quoted = !quoted;
    else if (c === ':' && !quoted) return i;
  }
  return -1;
}

const IGNORED_TYPES = new Set(['internet', 'pref', 'x400', 'voice']);

function extractType(params: string[]): string | undefined {
  for (const p of params) {
    const eq = p.indexOf('=');
    const values = eq < 0
      ? [p]
      : p.substring(0, eq).toUpperCase() === 'TYPE' ? p.substring(eq + 1).split(',') : [];
    for (const v of values) {
      const type = v.replace(/"/g, '').trim().toLowerCase();
      if (type && !IGNORED_TYPES.has(type)) return type;
    }
  }
  return undefined;
}

function isPreferred(params: string[]): boolean {
  return params.some(p => {
    const upper = p.toUpperCase();
    return upper === 'PREF' || upper.startsWith('PREF=') || (upper.startsWith('TYPE=') && upper.includes('PREF'));
  });
}

/** Split on a separator that is not escaped with a backslash. */
function splitComponents(value: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < value.length; i++) {
    const c = value[i];
    if (c === '\\' && i + 1 < value.length) {
      current += c + value[i + 1];
      i++;
    } else if (c === separator) {
      parts.push(current);
      current = '';
    } else {
      current += c;
    }
  }
  parts.push(current);
  return parts;
}

function escapeVCardValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\n/g, '\\n');
}

function unescapeVCardValue(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_, c: string) => (c === 'n' || c === 'N' ? '\n' : c));
}

/** RFC 6350 line folding: lines longer than 75 octets are folded with CRLF + space. */
function foldLines(text: string): string {
  return text.split('\r\n').map(line => {
    if (Buffer.byteLength(line, 'utf-8') <= 75) return line;
    const result: string[] = [];
    let remaining = line;
    let limit = 75;
    while (Buffer.byteLength(remaining, 'utf-8') > limit) {
      let cutPoint = Math.min(limit, remaining.length);
      while (cutPoint > 0 && Buffer.byteLength(remaining.substring(0, cutPoint), 'utf-8') > limit) {
        cutPoint--;
      }
      // Keep surrogate pairs on one line.
      if (cutPoint > 1 && isHighSurrogate(remaining.charCodeAt(cutPoint - 1))) cutPoint--;
      result.push(remaining.substring(0, cutPoint));
      remaining = remaining.substring(cutPoint);
      limit = 74; // continuation lines lose 1 byte to the leading space
    }
    if (remaining) result.push(remaining);
    return result.join('\r\n ');
  }).join('\r\n');
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Unfold continuation lines (lines starting with space or tab), keeping the first line number. */
function unfoldLines(text: string): LogicalLine[] {
  const raw = text.split(/\r\n|\r|\n/);
  const result: LogicalLine[] = [];
  raw.forEach((line, i) => {
    const last = result[result.length - 1];
    if ((line.startsWith(' ') || line.startsWith('\t')) && last) {
      last.text += line.substring(1);
    } else {
      result.push({ text: line, line: i });
    }
  });
  return result;
}
