import type { Position } from '../types/index.js';
import { LineIndex } from './line-index.js';

/** One version of an open document. Never mutated; an edit produces a new snapshot. */
export class DocumentSnapshot {
  readonly uri: string;
  readonly version: number;
  readonly text: string;
  private lineIndex?: LineIndex;

  constructor(uri: string, version: number, text: string) {
    this.uri = uri;
    this.version = version;
    this.text = text;
  }

  get lines(): LineIndex {
    this.lineIndex ??= new LineIndex(this.text);
    return this.lineIndex;
  }

  positionToOffset(position: Position): number {
    return this.lines.positionToOffset(position);
  }

  offsetToPosition(offset: number): Position {
    return this.lines.offsetToPosition(offset);
  }
}
