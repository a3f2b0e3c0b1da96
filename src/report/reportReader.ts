/**
 * Reads report CSVs back into classified resources.
 *
 * Columns are looked up by header name, so reordered or extra columns are fine.
 */

import { readFile } from 'node:fs/promises';
import { ReportFormatError } from '@shared/errors';
import { RESOURCE_KINDS } from '@shared/types';
import type { ClassifiedResource, ResourceKind } from '@shared/types';
import { parseTimestamp } from '@shared/utils/age';
import { decodeTags } from '@shared/utils/tags';
import { parseCsv } from './csv';
import { parseNumber, recordFromCells, REPORT_LAYOUT } from './layout';
import { parseRecommendation } from './recommendation';

const REQUIRED_COLUMNS = ['Kind', 'Region', 'ResourceId', 'State', 'Recommendation'] as const;

function parseKind(value: string): ResourceKind | undefined {
  return RESOURCE_KINDS.find((kind) => kind === value.trim());
}

/**
 * Parse report CSV text.
 *
 * @param source - File name used in error messages
 * @throws {ReportFormatError} On a missing column or a malformed row (with its line number)
 */
export function readReport(text: string, source: string = 'report'): ClassifiedResource[] {
  const rows = parseCsv(text.replace(/^\uFEFF/, ''));
  if (rows.length === 0) {
    return [];
  }

  const [headerRow, ...dataRows] = rows;
  const index = new Map<string, number>();
  headerRow.fields.forEach((name, i) => index.set(name.trim(), i));

  for (const column of REQUIRED_COLUMNS) {
    if (!index.has(column)) {
      throw new ReportFormatError(`${source}: missing required column "${column}"`);
    }
  }

  const classified: ClassifiedResource[] = [];

  for (const row of dataRows) {
    const fail = (message: string): never => {
      throw new ReportFormatError(`${source} line ${row.line}: ${message}`);
    };

    if (row.fields.length !== headerRow.fields.length) {
      fail(`expected ${headerRow.fields.length} fields, found ${row.fields.length}`);
    }

    const cell = (header: string): string | undefined => {
      const position = index.get(header);
      return position === undefined ? undefined : row.fields[position];
    };

    const kindCell = cell('Kind') ?? '';
    const kind = parseKind(kindCell) ?? fail(`unknown resource kind "${kindCell}"`);

    const id = (cell('ResourceId') ?? '').trim();
    if (!id) {
      fail('empty ResourceId');
    }

    const recommendation =
      parseRecommendation(cell('Recommendation') ?? '') ??
      fail(`unrecognized recommendation "${cell('Recommendation') ?? ''}"`);

    const record =
      recordFromCells(
        kind,
        {
          region: (cell('Region') ?? '').trim(),
          id,
          label: cell('Name') ?? '',
          state: (cell('State') ?? '').trim().toLowerCase(),
          createdAt: parseTimestamp(cell('CreatedAt')),
          utilization: parseNumber(cell(REPORT_LAYOUT[kind].utilizationHeader)),
          tags: decodeTags(cell('Tags') ?? ''),
          associatedId: cell('AssociatedId') || undefined,
        },
        cell
      ) ?? fail(`invalid ${kind} columns`);

    classified.push({
      record,
      verdict: {
        ...recommendation,
        estimatedMonthlyCost: parseNumber(cell('EstMonthlyCost')),
      },
    });
  }

  return classified;
}

export async function readReportFile(file: string): Promise<ClassifiedResource[]> {
  const text = await readFile(file, 'utf8');
  return readReport(text, file);
}
