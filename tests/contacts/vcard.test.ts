import { describe, it, expect } from 'vitest';
import { parseVCards, serializeVCard } from '../../src/contacts/vcard.js';
import { VCardParseError } from '../../src/utils/errors.js';

function lines(...parts: string[]): string {
  return parts.join('\r\n') + '\r\n';
}

describe('parseVCards', () => {
  it('should read names, typed emails and auxiliary fields', () => {
    const text = lines(
      'BEGIN:VCARD',
      'VERSION:3.0',
      'FN:Jane Doe',
      'N:Doe;Jane;;;',
      'NICKNAME:JD',
      'item1.EMAIL;TYPE=INTERNET,WORK:jane@example.com',
      'EMAIL;TYPE=home;PREF=1:mailto:jdoe@home.example.org',
      'TEL;TYPE=cell:(415) 555-1234',
      'ORG:Acme\\, Inc.;Research',
      'END:VCARD',
    );

    const [record] = parseVCards(text);

    expect(record.line).toBe(0);
    expect(record.formattedName).toBe('Jane Doe');
    expect(record.emails).toEqual([
      { value: 'jane@example.com', type: 'work', primary: false, line: 5 },
      { value: 'jdoe@home.example.org', type: 'home', primary: true, line: 6 },
    ]);
    expect(record.fields).toEqual([
      { key: 'nickname', value: 'JD' },
      { key: 'phone', value: '+14155551234', type: 'cell' },
      { key: 'organization', value: 'Acme, Inc., Research' },
    ]);
  });

  it('should read every card in a file with its starting line', () => {
    const text = lines(
      'BEGIN:VCARD',
      'FN:First',
      'EMAIL:first@example.com',
      'END:VCARD',
      '',
      'BEGIN:VCARD',
      'FN:Second',
      'END:VCARD',
    );

    const records = parseVCards(text);

    expect(records.map(r => [r.formattedName, r.line])).toEqual([['First', 0], ['Second', 5]]);
    expect(records[1].emails).toEqual([]);
  });

  it('should unfold continuation lines', () => {
    const text = lines('BEGIN:VCARD', 'EMAIL:a@example.com', 'NOTE:This is a long', '  note', 'END:VCARD');

    const [record] = parseVCards(text);

    expect(record.fields).toEqual([{ key: 'note', value: 'This is a long note' }]);
  });

  it('should fall back to the structured name when FN is missing', () => {
    const [record] = parseVCards(lines('BEGIN:VCARD', 'N:Doe;John;Q;Dr.;Jr.', 'END:VCARD'));

    expect(record.formattedName).toBe('Dr. John Q Doe Jr.');
  });

  it('should strip the urn:uuid prefix from UID', () => {
    const [record] = parseVCards(lines('BEGIN:VCARD', 'UID:urn:uuid:1234-abcd', 'END:VCARD'));

    expect(record.uid).toBe('1234-abcd');
  });

  it('should not split on a colon inside a quoted parameter', () => {
    const [record] = parseVCards(lines('BEGIN:VCARD', 'EMAIL;X-LABEL="a:b":x@example.com', 'END:VCARD'));

    expect(record.emails).toEqual([{ value: 'x@example.com', type: undefined, primary: false, line: 1 }]);
  });

  it('should accept LF line endings', () => {
    const [record] = parseVCards('BEGIN:VCARD\nFN:Lf\nEMAIL:lf@example.com\nEND:VCARD\n');

    expect(record.emails[0].line).toBe(2);
  });

  it('should reject a card without END:VCARD', () => {
    expect(() => parseVCards(lines('BEGIN:VCARD', 'FN:Open'))).toThrow('line 1: missing END:VCARD');
  });

  it('should reject content outside a card', () => {
    expect(() => parseVCards(lines('FN:Nobody'))).toThrow(VCardParseError);
  });

  it('should report the line of a property without a value separator', () => {
    try {
      parseVCards(lines('BEGIN:VCARD', 'GARBAGE', 'END:VCARD'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(VCardParseError);
      if (err instanceof VCardParseError) {
        expect(err.line).toBe(1);
        expect(err.message).toBe('line 2: expected "NAME:value", got "GARBAGE"');
      }
    }
  });

  it('should reject a nested BEGIN', () => {
    expect(() => parseVCards(lines('BEGIN:VCARD', 'BEGIN:VCARD', 'END:VCARD'))).toThrow(
      'line 2: BEGIN:VCARD inside an unterminated card',
    );
  });
});

describe('serializeVCard', () => {
  it('should write a vCard 4.0 with UID, FN and EMAIL', () => {
    const text = serializeVCard({ uid: '1234', formattedName: 'Jane Doe', emails: ['jane@example.com'] });

    expect(text).toBe(lines(
      'BEGIN:VCARD',
      'VERSION:4.0',
      'UID:urn:uuid:1234',
      'FN:Jane Doe',
      'EMAIL:jane@example.com',
      'END:VCARD',
    ));
  });

  it('should write an empty FN when there is no name', () => {
    const text = serializeVCard({ uid: '1234', emails: ['x@example.com'] });

    expect(text).toContain('\r\nFN:\r\n');
  });

  it('should escape values and read them back', () => {
    const text = serializeVCard({ uid: '1', formattedName: 'Doe, Jane; Esq.', emails: ['jane@example.com'] });

    expect(text).toContain('FN:Doe\\, Jane\\; Esq.');
    expect(parseVCards(text)[0].formattedName).toBe('Doe, Jane; Esq.');
  });

  it('should fold lines longer than 75 octets', () => {
    const name = 'a'.repeat(100);
    const text = serializeVCard({ uid: '1', formattedName: name, emails: ['a@example.com'] });

    const physical = text.split('\r\n');
    expect(physical).toContain(`FN:${'a'.repeat(72)}`);
    expect(physical).toContain(` ${'a'.repeat(28)}`);
    expect(parseVCards(text)[0].formattedName).toBe(name);
  });
});
