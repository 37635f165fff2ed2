import { describe, it, expect } from 'vitest';
import { DocumentStore } from '../../src/documents/store.js';
import { InvalidEditError, StaleVersionError, UnknownDocumentError } from '../../src/utils/errors.js';

const URI = 'file:///tmp/draft.eml';

describe('DocumentStore', () => {
  it('should open, replace and close documents', () => {
    const store = new DocumentStore();
    store.open(URI, 'first', 1);
    store.open(URI, 'second', 1);

    expect(store.get(URI).text).toBe('second');
    expect(store.uris()).toEqual([URI]);

    store.close(URI);
    expect(store.has(URI)).toBe(false);
    expect(() => store.close(URI)).not.toThrow();
  });

  it('should apply range edits in order', () => {
    const store = new DocumentStore();
    store.open(URI, 'To: jane\nBody', 1);

    const next = store.change(URI, 2, [
      { range: { start: { line: 0, character: 8 }, end: { line: 0, character: 8 } }, text: '@example.com' },
      { range: { start: { line: 1, character: 0 }, end: { line: 1, character: 4 } }, text: 'Hi' },
    ]);

    expect(next.text).toBe('To: jane@example.com\nHi');
    expect(next.version).toBe(2);
    expect(store.get(URI)).toBe(next);
  });

  it('should apply a full replacement', () => {
    const store = new DocumentStore();
    store.open(URI, 'old', 1);

    expect(store.change(URI, 5, [{ text: 'new' }]).text).toBe('new');
  });

  it('should reject a stale version and keep the text', () => {
    const store = new DocumentStore();
    store.open(URI, 'hello', 1);

    expect(() => store.change(URI, 1, [{ text: 'changed' }])).toThrow(StaleVersionError);
    expect(store.get(URI).text).toBe('hello');
    expect(store.get(URI).version).toBe(1);
  });

  it('should reject changes to a document that is not open', () => {
    const store = new DocumentStore();

    expect(() => store.change(URI, 2, [{ text: 'x' }])).toThrow(UnknownDocumentError);
    expect(() => store.get(URI)).toThrow(UnknownDocumentError);
  });

  it('should apply nothing when one edit of a batch is invalid', () => {
    const store = new DocumentStore();
    store.open(URI, 'hello world', 1);

    expect(() => store.change(URI, 2, [
      { range: { start: { line: 0, character: 0 }, end: { line: 0, character: 5 } }, text: 'HELLO' },
      { range: { start: { line: 0, character: 6 }, end: { line: 0, character: 2 } }, text: '' },
    ])).toThrow(InvalidEditError);
    expect(store.get(URI).text).toBe('hello world');
    expect(store.get(URI).version).toBe(1);
  });

  it('should convert positions of the current version', () => {
    const store = new DocumentStore();
    store.open(URI, 'ü\nx', 1);

    expect(store.positionToOffset(URI, { line: 1, character: 0 })).toBe(3);
    expect(store.offsetToPosition(URI, 2)).toEqual({ line: 0, character: 1 });
  });
});
