import { extname } from 'path';
import { readPdfPages } from '@ledgerline/pdf-extract';
import {
  matchesPolarity,
  reconcileStatement,
  type CsvRow,
  type PolarityWarning,
  type StatementAccount,
  type StatementDiagnostic,
  type StatementPages,
  type Transaction,
} from '@ledgerline/types';
import { segmentPages } from '../engine/segmentation-engine.js';
import { readCsvRows } from '../csv/csv-reader.js';
import { extractCsvTransactions, readCsvStatementInfo } from '../csv/csv-statement.js';
import type { CardOwnerLookup } from '../kinds/types.js';
import { readStatementInfo } from './statement-info.js';

export interface StatementReaders {
  readPdfPages: (filePath: string) => Promise<StatementPages>;
  readCsvRows: (filePath: string) => Promise<CsvRow[]>;
}

export const defaultReaders: StatementReaders = { readPdfPages, readCsvRows };

export interface StatementParseOptions {
  /** Id source for new transactions */
  nextId: () => number;
  cardOwners?: CardOwnerLookup;
  /** Revolut account number without the currency suffix */
  revolutAccountPrefix?: string;
  revolutCardIdentifier?: string | null;
}

export interface LoadStatementOptions extends StatementParseOptions {
  readers?: StatementReaders;
}

export function polarityWarnings(transactions: readonly Transaction[]): PolarityWarning[] {
  return transactions
    .filter((t) => !matchesPolarity(t.kind, t.amount))
    .map((t): PolarityWarning => ({
      type: 'polarity',
      transactionId: t.transactionId,
      kind: t.kind,
      amount: t.amount,
      message: `${t.kind} ${t.transactionId} has amount ${t.amount} with the wrong sign`,
    }));
}

function finishDiagnostics(
  statement: Omit<StatementAccount, 'diagnostics'>,
  diagnostics: StatementDiagnostic[]
): StatementAccount {
  // An unrecognised document already carries the bank name warning
  if (statement.bank !== null && statement.transactions.length === 0) {
    diagnostics.push({ type: 'missing-marker', marker: 'transactions', message: 'Statement yields no transactions' });
  }
  return {
    ...statement,
    diagnostics: [...diagnostics, ...polarityWarnings(statement.transactions), ...reconcileStatement(statement)],
  };
}

export function parsePdfStatement(
  filePath: string,
  pages: StatementPages,
  options: StatementParseOptions
): StatementAccount {
  const info = readStatementInfo(pages);
  const diagnostics: StatementDiagnostic[] = [];
  let transactions: Transaction[] = [];

  if (info.bank === null) {
    diagnostics.push({ type: 'missing-marker', marker: 'bank name', message: 'Issuing bank not recognised' });
  } else {
    if (info.accountNumber === '') {
      diagnostics.push({ type: 'missing-marker', marker: 'account number', message: 'Statement account number not found' });
    }
    transactions = segmentPages(pages, {
      bank: info.bank,
      year: info.year,
      statementAccount: info.accountNumber,
      parentStatement: filePath,
      nextId: options.nextId,
      cardOwners: options.cardOwners,
    });
  }

  return finishDiagnostics(
    {
      filePath,
      source: 'pdf',
      bank: info.bank,
      accountNumber: info.accountNumber,
      year: info.year,
      openingBalance: info.openingBalance,
      closingBalance: info.closingBalance,
      pages,
      rows: [],
      transactions,
    },
    diagnostics
  );
}

export function parseCsvStatement(filePath: string, rows: CsvRow[], options: StatementParseOptions): StatementAccount {
  const csvOptions = {
    revolutAccountPrefix: options.revolutAccountPrefix ?? '',
    revolutCardIdentifier: options.revolutCardIdentifier ?? null,
  };
  const info = readCsvStatementInfo(filePath, rows, csvOptions);
  const { transactions, diagnostics } = extractCsvTransactions(filePath, rows, info, {
    ...csvOptions,
    nextId: options.nextId,
    cardOwners: options.cardOwners,
  });

  return finishDiagnostics(
    {
      filePath,
      source: 'csv',
      bank: 'revolut',
      accountNumber: info.accountNumber,
      year: info.year,
      openingBalance: info.openingBalance,
      closingBalance: info.closingBalance,
      pages: [],
      rows,
      transactions,
    },
    diagnostics
  );
}

/**
 * Read and parse one statement file. The source is chosen by extension.
 * Format errors in the file propagate to the caller.
 */
export async function loadStatement(filePath: string, options: LoadStatementOptions): Promise<StatementAccount> {
  const readers = options.readers ?? defaultReaders;
  const extension = extname(filePath).toLowerCase();

  if (extension === '.pdf') {
    return parsePdfStatement(filePath, await readers.readPdfPages(filePath), options);
  }
  if (extension === '.csv') {
    return parseCsvStatement(filePath, await readers.readCsvRows(filePath), options);
  }
  throw new Error(`Unsupported statement file type "${extension}": ${filePath}`);
}
