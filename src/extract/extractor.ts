import type { AddressToken, Region, RegionSpan } from '../types/index.js';
import { LineIndex } from '../documents/line-index.js';
import { addressRegExp, isAddressChar } from './grammar.js';
import { detectShape, type DocumentShape, type IndexRegion } from './regions.js';

export interface Extraction {
  shape: DocumentShape;
  /** Address-bearing regions in byte offsets, ordered by start. */
  regions: RegionSpan[];
  /** Tokens ordered by start; spans never overlap. */
  tokens: AddressToken[];
}

/** The run of address characters that ends at the cursor. */
export interface PartialToken {
  /** Byte offsets of the partial text. */
  start: number;
  end: number;
  text: string;
  /** True when the partial directly follows "<". */
  inAngleBrackets: boolean;
}

interface IndexToken {
  address: string;
  start: number;
  end: number;
  displayName?: string;
  region: Region;
}

export function analyze(text: string, lines: LineIndex = new LineIndex(text)): Extraction {
  const { shape, regions } = detectShape(lines);
  const tokens: AddressToken[] = [];

  for (const region of regions) {
    const found = region.region.kind === 'header'
      ? headerTokens(text, region)
      : freeTextTokens(text, region);
    for (const token of found) {
      tokens.push({ ...token, start: lines.indexToOffset(token.start), end: lines.indexToOffset(token.end) });
    }
  }

  return {
    shape,
    regions: regions.map(r => ({
      start: lines.indexToOffset(r.start),
      end: lines.indexToOffset(r.end),
      region: r.region,
    })),
    tokens,
  };
}

export function extractAddresses(text: string): AddressToken[] {
  return analyze(text).tokens;
}

export function tokenAt(text: string, offset: number): AddressToken | undefined {
  return findTokenAt(extractAddresses(text), offset);
}

/** Binary search for the token whose span contains `offset` (start inclusive, end exclusive). */
export function findTokenAt(tokens: readonly AddressToken[], offset: number): AddressToken | undefined {
  let lo = 0;
  let hi = tokens.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const token = tokens[mid];
    if (offset < token.start) hi = mid - 1;
    else if (offset >= token.end) lo = mid + 1;
    else return token;
  }
  return undefined;
}

export function regionAt(text: string, offset: number): RegionSpan | undefined {
  return findRegionAt(analyze(text).regions, offset);
}

/** The region containing `offset`; a cursor right at the end of a region still counts. */
export function findRegionAt(regions: readonly RegionSpan[], offset: number): RegionSpan | undefined {
  return regions.find(r => r.start <= offset && offset <= r.end);
}

export function partialAt(lines: LineIndex, offset: number): PartialToken {
  const text = lines.text;
  const end = lines.offsetToIndex(offset);
  let start = end;
  while (start > 0 && isAddressChar(text[start - 1])) start--;

  return {
    start: lines.indexToOffset(start),
    end: lines.indexToOffset(end),
    text: text.slice(start, end),
    inAngleBrackets: text[start - 1] === '<',
  };
}

function headerTokens(text: string, region: IndexRegion): IndexToken[] {
  const tokens: IndexToken[] = [];
  for (const segment of splitMailboxes(text, region.start, region.end)) {
    const value = text.slice(segment.start, segment.end);
    const re = addressRegExp();
    let match: RegExpExecArray | null;
    while ((match = re.exec(value)) !== null) {
      const at = match.index;
      const address = match[0];
      const token: IndexToken = {
        address,
        start: segment.start + at,
        end: segment.start + at + address.length,
        region: region.region,
      };
      if (value[at - 1] === '<' && value[at + address.length] === '>') {
        const displayName = cleanDisplayName(value.slice(0, at - 1));
        if (displayName) token.displayName = displayName;
      }
      tokens.push(token);
    }
  }
  return tokens;
}

function freeTextTokens(text: string, region: IndexRegion): IndexToken[] {
  const tokens: IndexToken[] = [];
  const value = text.slice(region.start, region.end);
  const re = addressRegExp();
  let match: RegExpExecArray | null;
  while ((match = re.exec(value)) !== null) {
    const start = region.start + match.index;
    const end = start + match[0].length;
    const token: IndexToken = { address: match[0], start, end, region: region.region };
    if (text[start - 1] === '<' && text[end] === '>') {
      const displayName = nameBefore(text, start - 1);
      if (displayName) token.displayName = displayName;
    }
    tokens.push(token);
  }
  return tokens;
}

/** Split a mailbox list at commas outside quoted strings and angle brackets. */
function splitMailboxes(text: string, start: number, end: number): Array<{ start: number; end: number }> {
  const segments: Array<{ start: number; end: number }> = [];
  let segmentStart = start;
  let quoted = false;
  let depth = 0;

  for (let i = start; i < end; i++) {
    const c = text[i];
    if (quoted) {
      if (c === '\\') i++;
      else if (c === '"') quoted = false;
    } else if (c === '"') {
      quoted = true;
    } else if (c === '<') {
      depth++;
    } else if (c === '>') {
      depth = Math.max(0, depth - 1);
    } else if (c === ',' && depth === 0) {
      segments.push({ start: segmentStart, end: i });
      segmentStart = i + 1;
    }
  }
  segments.push({ start: segmentStart, end });
  return segments;
}

function cleanDisplayName(raw: string): string | undefined {
  const folded = raw.replace(/\s+/g, ' ').trim();
  const quoted = /^"(.*)"$/.exec(folded);
  const name = quoted ? quoted[1].replace(/\\(.)/g, '$1').trim() : folded;
  return name || undefined;
}

const QUOTED_NAME = /"([^"\r\n]*)"[ \t]*$/;
const CAPITALIZED_NAME = /((?:\p{Lu}[\p{L}\p{N}.'-]*[ \t]+)*\p{Lu}[\p{L}\p{N}.'-]*)[ \t]*$/u;

/** Display name written on the same line in front of the "<" at `angle`, in free text. */
function nameBefore(text: string, angle: number): string | undefined {
  let lineStart = angle;
  while (lineStart > 0 && text[lineStart - 1] !== '\n' && text[lineStart - 1] !== '\r') lineStart--;
  const prefix = text.slice(lineStart, angle);

  const quoted = QUOTED_NAME.exec(prefix);
  if (quoted) return quoted[1].trim() || undefined;
  return CAPITALIZED_NAME.exec(prefix)?.[1];
}
