import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { FormatError, REVOLUT_REQUIRED_COLUMNS, type CsvRow } from '@ledgerline/types';

const RowsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text with a header row into column-keyed rows and check that
 * every column of a Revolut account export is present.
 */
export function parseStatementCsv(content: string): CsvRow[] {
  let header: string[] = [];
  const records: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    columns: (columns: string[]) => {
      header = columns;
      return columns;
    },
  });

  if (header.length > 0) {
    const missing = REVOLUT_REQUIRED_COLUMNS.filter((column) => !header.includes(column));
    if (missing.length > 0) {
      throw new FormatError('CSV header', header.join(','), `missing column ${missing.map((c) => `"${c}"`).join(', ')}`);
    }
  }

  const rows = RowsSchema.safeParse(records);
  if (!rows.success) {
    throw new FormatError('CSV rows', '', rows.error.issues[0]?.message);
  }
  return rows.data;
}

export async function readCsvRows(filePath: string): Promise<CsvRow[]> {
  const content = await readFile(filePath, 'utf-8');
  return parseStatementCsv(content);
}
