import type { Position } from '../types/index.js';

/**
 * Maps between LSP positions (line + UTF-16 code unit), string indices, and UTF-8 byte
 * offsets for one immutable text. Lines end at "\n", "\r\n" or "\r".
 */
export class LineIndex {
  readonly text: string;
  /** String index where each line starts. */
  private readonly starts: number[] = [0];
  /** String index where each line's content ends (before the terminator). */
  private readonly ends: number[] = [];
  /** Byte offset where each line starts. */
  private readonly byteStarts: number[] = [0];
  readonly byteLength: number;

  constructor(text: string) {
    this.text = text;
    let bytes = 0;
    let i = 0;
    while (i < text.length) {
      const c = text.charCodeAt(i);
      if (c === 0x0a || c === 0x0d) {
        const width = c === 0x0d && text.charCodeAt(i + 1) === 0x0a ? 2 : 1;
        this.ends.push(i);
        i += width;
        bytes += width;
        this.starts.push(i);
        this.byteStarts.push(bytes);
        continue;
      }
      const units = codePointUnits(text, i);
      bytes += utf8Width(text, i);
      i += units;
    }
    this.ends.push(text.length);
    this.byteLength = bytes;
  }

  get lineCount(): number {
    return this.starts.length;
  }

  lineStart(line: number): number {
    return this.starts[line];
  }

  /** String index where the line's content ends, before its terminator. */
  lineEnd(line: number): number {
    return this.ends[line];
  }

  /** Text of a line without its terminator. */
  lineText(line: number): string {
    return this.text.slice(this.starts[line], this.ends[line]);
  }

  /**
   * String index for a position. Lines past the end map to the end of the text, characters
   * past the end of a line clamp to the line end, and a character between the halves of a
   * surrogate pair moves back to the pair's start.
   */
  positionToIndex(position: Position): number {
    if (position.line < 0) return 0;
    if (position.line >= this.lineCount) return this.text.length;
    const start = this.starts[position.line];
    const end = this.ends[position.line];
    let index = start + Math.min(Math.max(position.character, 0), end - start);
    if (index > start && isLowSurrogate(this.text.charCodeAt(index)) && isHighSurrogate(this.text.charCodeAt(index - 1))) {
      index--;
    }
    return index;
  }

  indexToPosition(index: number): Position {
    const clamped = Math.min(Math.max(index, 0), this.text.length);
    const line = this.lineOfIndex(clamped);
    const start = this.starts[line];
    return { line, character: Math.min(clamped, this.ends[line]) - start };
  }

  positionToOffset(position: Position): number {
    return this.indexToOffset(this.positionToIndex(position));
  }

  offsetToPosition(offset: number): Position {
    return this.indexToPosition(this.offsetToIndex(offset));
  }

  indexToOffset(index: number): number {
    const clamped = Math.min(Math.max(index, 0), this.text.length);
    const line = this.lineOfIndex(clamped);
    return this.byteStarts[line] + utf8Length(this.text, this.starts[line], clamped);
  }

  /** String index for a byte offset; an offset inside a multi-byte sequence moves back to its start. */
  offsetToIndex(offset: number): number {
    if (offset <= 0) return 0;
    if (offset >= this.byteLength) return this.text.length;
    const line = upperBound(this.byteStarts, offset) - 1;
    let index = this.starts[line];
    let bytes = this.byteStarts[line];
    while (index < this.text.length) {
      const width = utf8Width(this.text, index);
      if (bytes + width > offset) break;
      bytes += width;
      index += codePointUnits(this.text, index);
    }
    return index;
  }

  private lineOfIndex(index: number): number {
    return upperBound(this.starts, index) - 1;
  }
}

/** First position in the sorted array whose value is greater than `value`. */
function upperBound(sorted: number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function codePointUnits(text: string, index: number): number {
  return isHighSurrogate(text.charCodeAt(index)) && isLowSurrogate(text.charCodeAt(index + 1)) ? 2 : 1;
}

/** Bytes of the code point at `index`; lone surrogates encode as U+FFFD. */
function utf8Width(text: string, index: number): number {
  const c = text.charCodeAt(index);
  if (c < 0x80) return 1;
  if (c < 0x800) return 2;
  if (codePointUnits(text, index) === 2) return 4;
  return 3;
}

export function utf8Length(text: string, from: number, to: number): number {
  let bytes = 0;
  let i = from;
  while (i < to) {
    bytes += utf8Width(text, i);
    i += codePointUnits(text, i);
  }
  return bytes;
}
