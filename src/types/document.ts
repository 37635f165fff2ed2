/** Line/character position; `character` counts UTF-16 code units. */
export interface Position {
  line: number;
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

/** Half-open span of UTF-8 byte offsets. */
export interface ByteSpan {
  start: number;
  end: number;
}

export type ContentChange =
  | { text: string }
  | { range: Range; text: string };

export function isRangeChange(change: ContentChange): change is { range: Range; text: string } {
  return 'range' in change;
}
