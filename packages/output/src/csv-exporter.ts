/**
 * CSV Exporter Module
 *
 * Semicolon-separated ledger export for spreadsheet import. Amounts use a
 * decimal comma and the file starts with a UTF-8 byte order mark.
 */

import { bookingDateToIso, formatDecimalComma, type Transaction } from '@ledgerline/types';

export const CSV_DELIMITER = ';';
export const CSV_LINE_END = '\r\n';
export const UTF8_BOM = '\uFEFF';

export const CSV_COLUMNS = [
  'Transaction ID',
  'Transaction account',
  'Date Booked',
  'Type',
  'Account From',
  'Account To',
  'Amount',
  'Currency',
  'Category',
  'Description',
  'Transaction data',
] as const;

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
export function escapeCsvValue(value: string | number | null | undefined, delimiter: string = CSV_DELIMITER): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);

  const needsQuoting = str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r');

  if (needsQuoting) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Kind name, with the service type appended for bank fees that carry one.
 */
export function exportTypeLabel(transaction: Transaction): string {
  if (transaction.kind !== 'BankPayedService') {
    return transaction.kind;
  }
  const serviceType = transaction.serviceType.replace(/\n/g, '');
  return serviceType !== '' ? `${transaction.kind} - ${serviceType}` : transaction.kind;
}

function buildDataRow(transaction: Transaction): Array<string | number | null> {
  return [
    transaction.transactionId,
    transaction.statementAccount,
    bookingDateToIso(transaction.dateBooked),
    exportTypeLabel(transaction),
    transaction.accountFrom,
    transaction.accountTo,
    formatDecimalComma(transaction.amount),
    transaction.currency,
    transaction.userCategory,
    transaction.userDescription,
    transaction.allTransactionLinesText,
  ];
}

function rowToCsvLine(row: ReadonlyArray<string | number | null>): string {
  return row.map((value) => escapeCsvValue(value)).join(CSV_DELIMITER);
}

/**
 * Export the ledger to CSV text, in the order given. Every row, the header
 * included, ends with CRLF.
 */
export function exportCsv(transactions: readonly Transaction[]): string {
  const lines = [rowToCsvLine(CSV_COLUMNS), ...transactions.map((t) => rowToCsvLine(buildDataRow(t)))];
  return UTF8_BOM + lines.map((line) => line + CSV_LINE_END).join('');
}
