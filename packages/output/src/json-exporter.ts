/**
 * JSON ledger export.
 */

import { validateAndThrow, type LedgerRecord, type Transaction } from '@ledgerline/types';
import { toLedgerRecord } from './ledger-record.js';

export const JSON_INDENT = 4;

/**
 * Convert transactions to export records and validate them against the
 * export schema. Throws when a record does not conform.
 */
export function toLedgerDocument(transactions: readonly Transaction[]): LedgerRecord[] {
  const records: unknown = transactions.map(toLedgerRecord);
  validateAndThrow(records);
  return records;
}

/**
 * Serialize the ledger to JSON text, in the order given.
 */
export function exportJson(transactions: readonly Transaction[]): string {
  return JSON.stringify(toLedgerDocument(transactions), null, JSON_INDENT);
}
