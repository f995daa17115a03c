import { describe, expect, it } from 'vitest';
import { encodeRecordLines, parseRecordLine, salvageRecordId, toPaperRecord } from '../src/pipeline/records.js';

describe('toPaperRecord', () => {
  it('trims the identifier and title', () => {
    expect(toPaperRecord({ id: ' 42 ', title: '  A Title ' })).toEqual({ ok: true, value: { id: '42', title: 'A Title' } });
  });

  it('accepts a numeric paper_id', () => {
    expect(toPaperRecord({ paper_id: 7, title: 'T' })).toEqual({ ok: true, value: { id: '7', title: 'T' } });
  });

  it('prefers id over paper_id', () => {
    expect(toPaperRecord({ id: 'a', paper_id: 'b', title: 'T' })).toEqual({ ok: true, value: { id: 'a', title: 'T' } });
  });

  it('rejects a record without an identifier', () => {
    expect(toPaperRecord({ title: 'T' })).toEqual({ ok: false, error: 'id: Required' });
  });

  it('rejects a blank title', () => {
    expect(toPaperRecord({ id: '1', title: '   ' })).toEqual({
      ok: false,
      error: 'title: String must contain at least 1 character(s)'
    });
  });
});

describe('record lines', () => {
  it('reports lines that are not JSON', () => {
    expect(parseRecordLine('not json').ok).toBe(false);
  });

  it('parses a valid line', () => {
    expect(parseRecordLine('{"id":"p1","title":"Alpha"}')).toEqual({ ok: true, value: { id: 'p1', title: 'Alpha' } });
  });

  it('salvages identifiers from invalid values', () => {
    expect(salvageRecordId({ paper_id: 9 })).toBe('9');
    expect(salvageRecordId({ id: '  ' })).toBeNull();
    expect(salvageRecordId([1])).toBeNull();
  });

  it('encodes records as JSON lines', () => {
    expect(
      encodeRecordLines([
        { id: '1', title: 'A' },
        { id: '2', title: 'B' }
      ])
    ).toBe('{"id":"1","title":"A"}\n{"id":"2","title":"B"}');
  });
});
