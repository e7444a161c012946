import type { BankId, Transaction, TransactionKind } from './transaction.js';

export type StatementSource = 'pdf' | 'csv';

/**
 * Text content of a PDF statement: ordered pages of ordered lines.
 */
export type StatementPages = string[][];

/**
 * One CSV data row keyed by column header.
 */
export type CsvRow = Record<string, string>;

export interface ReconciliationWarning {
  type: 'reconciliation';
  message: string;
  expectedDelta: number;
  transactionSum: number;
  /** Sum of the transactions the parser did not find */
  missingAmount: number;
}

export interface MissingMarkerWarning {
  type: 'missing-marker';
  message: string;
  /** What was looked for: a balance label, a CSV row type, ... */
  marker: string;
}

export interface PolarityWarning {
  type: 'polarity';
  message: string;
  transactionId: number;
  kind: TransactionKind;
  amount: number;
}

export type StatementDiagnostic = ReconciliationWarning | MissingMarkerWarning | PolarityWarning;

export interface StatementAccount {
  filePath: string;
  source: StatementSource;
  bank: BankId | null;
  accountNumber: string;
  year: string | null;
  openingBalance: number | null;
  closingBalance: number | null;
  /** Raw page lines for PDF statements, empty for CSV */
  pages: StatementPages;
  /** Raw rows for CSV statements, empty for PDF */
  rows: CsvRow[];
  transactions: Transaction[];
  diagnostics: StatementDiagnostic[];
}
