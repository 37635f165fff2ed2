import type { Region } from '../types/index.js';
import type { LineIndex } from '../documents/line-index.js';

/** A region as string indices into the document text. */
export interface IndexRegion {
  start: number;
  end: number;
  region: Region;
}

export type DocumentShape = 'header' | 'free-text';

export interface ShapedDocument {
  shape: DocumentShape;
  regions: IndexRegion[];
}

/** Header fields whose values are mailbox lists. */
export const ADDRESS_HEADERS: ReadonlySet<string> = new Set([
  'from',
  'to',
  'cc',
  'bcc',
  'reply-to',
  'sender',
  'resent-from',
  'resent-to',
  'resent-cc',
  'resent-bcc',
]);

const HEADER_LINE = /^([A-Za-z][A-Za-z0-9-]*)[ \t]*:/;

interface HeaderField {
  name: string;
  valueStart: number;
  lastLine: number;
}

export function isAddressHeader(name: string): boolean {
  return ADDRESS_HEADERS.has(name.toLowerCase());
}

/**
 * Decide once per document whether it is a mail message with a header block or free text.
 * A header document starts with a run of `Name: value` lines (with folded continuations),
 * including at least one address header, ended by a blank line or the end of the text.
 */
export function detectShape(lines: LineIndex): ShapedDocument {
  const fields: HeaderField[] = [];
  let line = 0;

  for (; line < lines.lineCount; line++) {
    const content = lines.lineText(line);
    if (content.trim() === '') break;

    const last = fields[fields.length - 1];
    if (last && /^[ \t]/.test(content)) {
      last.lastLine = line;
      continue;
    }
    const match = HEADER_LINE.exec(content);
    if (!match) return freeText(lines);
    fields.push({ name: match[1], valueStart: lines.lineStart(line) + match[0].length, lastLine: line });
  }

  const addressFields = fields.filter(f => isAddressHeader(f.name));
  if (addressFields.length === 0) return freeText(lines);

  const regions = addressFields.map((f): IndexRegion => ({
    start: f.valueStart,
    end: lines.lineEnd(f.lastLine),
    region: { kind: 'header', header: f.name },
  }));
  // The body starts at the blank separator line; header lines are never rescanned as free text.
  if (line < lines.lineCount) {
    regions.push({ start: lines.lineStart(line), end: lines.text.length, region: { kind: 'free-text' } });
  }
  return { shape: 'header', regions };
}

function freeText(lines: LineIndex): ShapedDocument {
  return {
    shape: 'free-text',
    regions: [{ start: 0, end: lines.text.length, region: { kind: 'free-text' } }],
  };
}
