import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Transaction } from '@ledgerline/types';
import { exportCsv } from './csv-exporter.js';
import { exportJson } from './json-exporter.js';

export const JSON_EXPORT_FILE = 'transactions.json';
export const CSV_EXPORT_FILE = 'transactions.csv';

export interface WrittenExports {
  jsonPath: string;
  csvPath: string;
}

/**
 * Write both exports into `outDir`, creating it when needed. The JSON is
 * serialized (and validated) before anything is written.
 */
export async function writeLedgerExports(outDir: string, transactions: readonly Transaction[]): Promise<WrittenExports> {
  const json = exportJson(transactions);
  const csv = exportCsv(transactions);

  await mkdir(outDir, { recursive: true });
  const jsonPath = join(outDir, JSON_EXPORT_FILE);
  const csvPath = join(outDir, CSV_EXPORT_FILE);
  await writeFile(jsonPath, json, 'utf-8');
  await writeFile(csvPath, csv, 'utf-8');

  return { jsonPath, csvPath };
}
