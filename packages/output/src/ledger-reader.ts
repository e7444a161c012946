/**
 * Re-import of an earlier JSON ledger export.
 */

import { readFile } from 'fs/promises';
import {
  LedgerDocumentSchema,
  LedgerRecordSchema,
  isStatementParseError,
  type Transaction,
  type TransactionInit,
} from '@ledgerline/types';
import type { StatementLedger } from '@ledgerline/statement-parser';
import { fromLedgerRecord } from './ledger-record.js';

export interface SkippedRecord {
  /** Position of the record in the document */
  index: number;
  type: string;
  reason: string;
}

export interface LedgerReadResult {
  transactions: TransactionInit[];
  skipped: SkippedRecord[];
}

/**
 * Parse export JSON text. Records of unknown type are skipped and reported;
 * a record that does not have the export shape fails the whole document.
 */
export function readLedgerJson(content: string): LedgerReadResult {
  const document = LedgerDocumentSchema.parse(JSON.parse(content));
  const transactions: TransactionInit[] = [];
  const skipped: SkippedRecord[] = [];

  document.forEach((entry, index) => {
    const parsed = LedgerRecordSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue !== undefined ? issue.path.join('.') : '';
      throw new Error(`Ledger record ${index} is invalid: ${path} ${issue?.message ?? ''}`.trim());
    }

    let init: TransactionInit | null;
    try {
      init = fromLedgerRecord(parsed.data);
    } catch (error) {
      if (isStatementParseError(error)) {
        throw new Error(`Ledger record ${index} is invalid: ${error.message}`);
      }
      throw error;
    }
    if (init === null) {
      skipped.push({ index, type: parsed.data.type, reason: `Unknown transaction type "${parsed.data.type}"` });
      return;
    }
    transactions.push(init);
  });

  return { transactions, skipped };
}

export interface LedgerHistory {
  restored: Transaction[];
  skipped: SkippedRecord[];
}

/**
 * Load an earlier export into the ledger. A missing file is an empty history.
 */
export async function loadLedgerHistory(
  filePath: string,
  ledger: Pick<StatementLedger, 'restore'>
): Promise<LedgerHistory> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { restored: [], skipped: [] };
    }
    throw error;
  }

  const { transactions, skipped } = readLedgerJson(content);
  return {
    restored: transactions.map((init) => ledger.restore(init)),
    skipped,
  };
}
