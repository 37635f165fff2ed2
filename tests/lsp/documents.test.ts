import { describe, it, expect } from 'vitest';
import { handleDidChange, handleDidClose, handleDidOpen, toContentChange } from '../../src/lsp/documents.js';
import { StaleVersionError } from '../../src/utils/errors.js';
import { createServerContext } from '../helpers.js';

const URI = 'file:///tmp/note.txt';

describe('toContentChange', () => {
  it('should keep the range of an incremental change', () => {
    const range = { start: { line: 0, character: 1 }, end: { line: 0, character: 2 } };

    expect(toContentChange({ range, text: 'x' })).toEqual({ range, text: 'x' });
  });

  it('should turn a whole-document change into a replacement', () => {
    expect(toContentChange({ text: 'all new' })).toEqual({ text: 'all new' });
  });
});

describe('document notifications', () => {
  it('should open, edit and close a document', () => {
    const ctx = createServerContext([]);

    handleDidOpen(ctx, { textDocument: { uri: URI, languageId: 'plaintext', version: 1, text: 'mail bob@x.org' } });
    handleDidChange(ctx, {
      textDocument: { uri: URI, version: 2 },
      contentChanges: [{ range: { start: { line: 0, character: 5 }, end: { line: 0, character: 8 } }, text: 'ann' }],
    });

    expect(ctx.documents.get(URI).text).toBe('mail ann@x.org');
    expect(ctx.documents.get(URI).version).toBe(2);

    handleDidClose(ctx, { textDocument: { uri: URI } });
    expect(ctx.documents.has(URI)).toBe(false);
  });

  it('should reject a change that does not advance the version', () => {
    const ctx = createServerContext([]);
    handleDidOpen(ctx, { textDocument: { uri: URI, languageId: 'plaintext', version: 3, text: 'hello' } });

    expect(() => handleDidChange(ctx, {
      textDocument: { uri: URI, version: 3 },
      contentChanges: [{ text: 'bye' }],
    })).toThrow(StaleVersionError);
    expect(ctx.documents.get(URI).text).toBe('hello');
  });
});
