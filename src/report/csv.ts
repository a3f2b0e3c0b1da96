/**
 * Minimal CSV codec for report files.
 *
 * Fields are quoted when they contain a comma, quote or line break; quotes are
 * doubled inside quoted fields.
 */

import { ReportFormatError } from '@shared/errors';

export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(csvEscape).join(',');
}

/**
 * One parsed row and the 1-based line it started on.
 */
export interface CsvRow {
  line: number;
  fields: string[];
}

/**
 * Parse CSV text. Accepts LF and CRLF line endings; blank lines are skipped.
 *
 * @throws {ReportFormatError} On an unterminated quoted field or stray text after a closing quote
 */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let fields: string[] = [];
  let field = '';
  let line = 1;
  let rowLine = 1;
  let quoted = false;
  let afterQuote = false;

  const endRow = (): void => {
    fields.push(field);
    if (fields.length > 1 || fields[0] !== '') {
      rows.push({ line: rowLine, fields });
    }
    fields = [];
    field = '';
    afterQuote = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
          afterQuote = true;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === ',') {
      fields.push(field);
      field = '';
      afterQuote = false;
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRow();
      line++;
      rowLine = line;
    } else if (afterQuote) {
      throw new ReportFormatError(`Line ${line}: unexpected character after closing quote`);
    } else if (ch === '"' && field === '') {
      quoted = true;
    } else {
      field += ch;
    }
  }

  if (quoted) {
    throw new ReportFormatError(`Line ${rowLine}: unterminated quoted field`);
  }
  if (field !== '' || fields.length > 0) {
    endRow();
  }
  return rows;
}
