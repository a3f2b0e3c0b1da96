import { describe, it, expect } from 'vitest';
import { csvEscape, formatCsvRow, parseCsv } from '@/report/csv';
import { formatRecommendation, parseRecommendation } from '@/report/recommendation';
import { ReportFormatError } from '@shared/errors';

describe('csvEscape', () => {
  it('quotes only fields that need it', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape('two\nlines')).toBe('"two\nlines"');
  });
});

describe('parseCsv', () => {
  it('reads quoted fields, doubled quotes and embedded line breaks', () => {
    const text = `${formatCsvRow(['id', 'note'])}\n${formatCsvRow(['1', 'a, "b"\nc'])}\n`;

    expect(parseCsv(text)).toEqual([
      { line: 1, fields: ['id', 'note'] },
      { line: 2, fields: ['1', 'a, "b"\nc'] },
    ]);
  });

  it('accepts CRLF endings and skips blank lines', () => {
    expect(parseCsv('a,b\r\n\r\n1,2\r\n')).toEqual([
      { line: 1, fields: ['a', 'b'] },
      { line: 3, fields: ['1', '2'] },
    ]);
  });

  it('keeps empty trailing fields', () => {
    expect(parseCsv('a,,')).toEqual([{ line: 1, fields: ['a', '', ''] }]);
  });

  it('rejects an unterminated quote', () => {
    expect(() => parseCsv('a,"b\n')).toThrow(ReportFormatError);
    expect(() => parseCsv('a,"b\n')).toThrow('Line 1: unterminated quoted field');
  });

  it('rejects text after a closing quote', () => {
    expect(() => parseCsv('"a"b,c')).toThrow('Line 1: unexpected character after closing quote');
  });
});

describe('recommendation', () => {
  it('joins and splits disposition and reason', () => {
    const text = formatRecommendation({ disposition: 'REVIEW', reason: 'Snapshot 100 days old - check' });

    expect(text).toBe('REVIEW - Snapshot 100 days old - check');
    expect(parseRecommendation(text)).toEqual({
      disposition: 'REVIEW',
      reason: 'Snapshot 100 days old - check',
    });
  });

  it('accepts a bare disposition in any case', () => {
    expect(formatRecommendation({ disposition: 'KEEP', reason: '' })).toBe('KEEP');
    expect(parseRecommendation(' delete ')).toEqual({ disposition: 'DELETE', reason: '' });
  });

  it('rejects unknown dispositions', () => {
    expect(parseRecommendation('REMOVE - old')).toBeUndefined();
    expect(parseRecommendation('')).toBeUndefined();
  });
});
