import type { ContentChange, Position } from '../types/index.js';
import { isRangeChange } from '../types/index.js';
import { InvalidEditError, StaleVersionError, UnknownDocumentError, logger } from '../utils/index.js';
import { DocumentSnapshot } from './document.js';
import { LineIndex } from './line-index.js';

/**
 * Live text of every open document. Only document lifecycle events mutate it, and a
 * failed change leaves the stored snapshot untouched.
 */
export class DocumentStore {
  private readonly documents = new Map<string, DocumentSnapshot>();

  /** Insert a document, replacing any open document with the same uri. */
  open(uri: string, text: string, version: number): DocumentSnapshot {
    const snapshot = new DocumentSnapshot(uri, version, text);
    if (this.documents.has(uri)) logger.debug('Reopening document:', uri);
    this.documents.set(uri, snapshot);
    return snapshot;
  }

  change(uri: string, version: number, changes: ContentChange[]): DocumentSnapshot {
    const current = this.get(uri);
    if (version <= current.version) {
      throw new StaleVersionError(uri, version, current.version);
    }

    let text = current.text;
    for (const change of changes) {
      if (!isRangeChange(change)) {
        text = change.text;
        continue;
      }
      if (comparePositions(change.range.start, change.range.end) > 0) {
        throw new InvalidEditError(uri, 'range start is after range end');
      }
      const lines = new LineIndex(text);
      const start = lines.positionToIndex(change.range.start);
      const end = lines.positionToIndex(change.range.end);
      text = text.slice(0, start) + change.text + text.slice(end);
    }

    const next = new DocumentSnapshot(uri, version, text);
    this.documents.set(uri, next);
    return next;
  }

  close(uri: string): void {
    this.documents.delete(uri);
  }

  get(uri: string): DocumentSnapshot {
    const snapshot = this.documents.get(uri);
    if (!snapshot) throw new UnknownDocumentError(uri);
    return snapshot;
  }

  has(uri: string): boolean {
    return this.documents.has(uri);
  }

  uris(): string[] {
    return [...this.documents.keys()];
  }

  positionToOffset(uri: string, position: Position): number {
    return this.get(uri).positionToOffset(position);
  }

  offsetToPosition(uri: string, offset: number): Position {
    return this.get(uri).offsetToPosition(offset);
  }
}

export function comparePositions(a: Position, b: Position): number {
  return a.line - b.line || a.character - b.character;
}
