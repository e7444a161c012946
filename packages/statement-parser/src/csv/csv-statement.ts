/**
 * Revolut account CSV exports: statement metadata and the mapping of
 * completed rows to transactions.
 */

import { basename } from 'path';
import {
  DEFAULT_CURRENCY,
  REVOLUT_COMPLETED_STATE,
  REVOLUT_CURRENCIES,
  REVOLUT_FEE_SERVICE_TYPE,
  RevolutRowSchema,
  FormatError,
  baseDefaults,
  convertRevolutTimestamp,
  parseDotDecimalAmount,
  roundToTwoDecimals,
  withTransactionId,
  type CsvRow,
  type MissingMarkerWarning,
  type RevolutRow,
  type Transaction,
  type TransactionInit,
  type TransactionKind,
} from '@ledgerline/types';
import { unknownCardOwners } from '../kinds/fields.js';
import type { CardOwnerLookup } from '../kinds/types.js';

type CsvKind = Extract<
  TransactionKind,
  'OutgoingPayment' | 'IncomingPayment' | 'CardPaymentDebit' | 'CardPaymentIncoming' | 'BankPayedService' | 'CardAtmCashOut'
>;

/**
 * Row type and amount sign to kind, first match wins. Zero counts as
 * non-negative.
 */
export const CSV_KIND_RULES: ReadonlyArray<{ kind: CsvKind; types: readonly string[]; negative: boolean }> = [
  { kind: 'OutgoingPayment', types: ['transfer', 'exchange'], negative: true },
  { kind: 'IncomingPayment', types: ['transfer', 'exchange', 'topup'], negative: false },
  { kind: 'CardPaymentDebit', types: ['card_payment'], negative: true },
  { kind: 'CardPaymentIncoming', types: ['card_payment'], negative: false },
  { kind: 'BankPayedService', types: ['fee'], negative: true },
  { kind: 'CardAtmCashOut', types: ['atm'], negative: true },
];

export function resolveCsvKind(type: string, amount: number): CsvKind | null {
  const lowered = type.toLowerCase();
  const negative = amount < 0;
  const rule = CSV_KIND_RULES.find((r) => r.types.includes(lowered) && r.negative === negative);
  return rule !== undefined ? rule.kind : null;
}

export function isCompletedRow(row: CsvRow): boolean {
  return (row['State'] ?? '').toLowerCase() === REVOLUT_COMPLETED_STATE;
}

export interface CsvStatementInfo {
  accountNumber: string;
  currency: string;
  year: string | null;
  openingBalance: number | null;
  closingBalance: number | null;
}

export interface CsvStatementOptions {
  /** Account number the currency code is appended to */
  revolutAccountPrefix: string;
  /** Last four digits of the Revolut card, when known */
  revolutCardIdentifier: string | null;
}

export interface CsvExtractionOptions extends CsvStatementOptions {
  nextId: () => number;
  cardOwners?: CardOwnerLookup;
}

function toRevolutRow(row: CsvRow, index: number): RevolutRow {
  const result = RevolutRowSchema.safeParse(row);
  if (!result.success) {
    throw new FormatError(`CSV row ${index + 1}`, JSON.stringify(row), result.error.issues[0]?.message);
  }
  return result.data;
}

/**
 * Currency of the export: a currency code in the file name, otherwise the
 * currency of the first row.
 */
export function resolveCsvCurrency(filePath: string, rows: readonly CsvRow[]): string {
  const name = basename(filePath).toUpperCase();
  const fromName = REVOLUT_CURRENCIES.find((currency) => name.includes(currency));
  if (fromName !== undefined) {
    return fromName;
  }
  const fromRow = rows[0]?.['Currency'];
  return fromRow !== undefined && fromRow !== '' ? fromRow : DEFAULT_CURRENCY;
}

export function readCsvStatementInfo(
  filePath: string,
  rows: readonly CsvRow[],
  options: CsvStatementOptions
): CsvStatementInfo {
  const currency = resolveCsvCurrency(filePath, rows);
  const completed = rows.filter(isCompletedRow).map(toRevolutRow);
  const first = completed[0];
  const last = completed[completed.length - 1];

  // Balance is after the row's amount and fee were applied
  const openingBalance =
    first !== undefined
      ? roundToTwoDecimals(
          parseDotDecimalAmount(first.Balance) - parseDotDecimalAmount(first.Amount) + parseDotDecimalAmount(first.Fee)
        )
      : null;
  const closingBalance = last !== undefined ? parseDotDecimalAmount(last.Balance) : null;
  const year = first !== undefined ? convertRevolutTimestamp(first['Completed Date']).slice(-4) : null;

  return {
    accountNumber: options.revolutAccountPrefix + currency,
    currency,
    year,
    openingBalance,
    closingBalance,
  };
}

function buildPrimary(
  kind: CsvKind,
  row: RevolutRow,
  amount: number,
  info: CsvStatementInfo,
  filePath: string,
  options: CsvExtractionOptions
): TransactionInit {
  const base = {
    ...baseDefaults(info.accountNumber, filePath, info.year),
    amount,
    currency: row.Currency,
    dateBooked: convertRevolutTimestamp(row['Completed Date']),
    allTransactionLinesText: row.Description,
  };
  const cardIdentifier = options.revolutCardIdentifier;
  const cardOwner = (options.cardOwners ?? unknownCardOwners)(cardIdentifier);
  // Only card kinds read the started date; rows without one fall back to completion
  const startedDate = (): string =>
    row['Started Date'].trim() === '' ? base.dateBooked : convertRevolutTimestamp(row['Started Date']);

  switch (kind) {
    case 'OutgoingPayment':
      return { ...base, kind, accountFrom: info.accountNumber };
    case 'IncomingPayment':
      return { ...base, kind, accountTo: info.accountNumber };
    case 'BankPayedService':
      return { ...base, kind, accountFrom: info.accountNumber, serviceType: '' };
    case 'CardPaymentDebit':
      return {
        ...base,
        kind,
        accountFrom: info.accountNumber,
        paymentDate: startedDate(),
        cardIdentifier,
        vendorText: row.Description,
        cardOwner,
      };
    case 'CardPaymentIncoming':
      return {
        ...base,
        kind,
        accountTo: info.accountNumber,
        paymentDate: startedDate(),
        cardIdentifier,
        vendorText: row.Description,
        cardOwner,
      };
    case 'CardAtmCashOut':
      return {
        ...base,
        kind,
        accountFrom: info.accountNumber,
        paymentDate: startedDate(),
        cardIdentifier,
        vendorText: row.Description,
        cardOwner,
        ourBankAtm: false,
        cashOutDate: startedDate(),
      };
  }
}

export interface CsvExtractionResult {
  transactions: Transaction[];
  diagnostics: MissingMarkerWarning[];
}

/**
 * Map completed rows to transactions. Each matched row yields its primary
 * transaction and, when it carries a fee, a bank service transaction for it.
 */
export function extractCsvTransactions(
  filePath: string,
  rows: readonly CsvRow[],
  info: CsvStatementInfo,
  options: CsvExtractionOptions
): CsvExtractionResult {
  const transactions: Transaction[] = [];
  const diagnostics: MissingMarkerWarning[] = [];

  rows.forEach((raw, index) => {
    if (!isCompletedRow(raw)) return;

    const row = toRevolutRow(raw, index);
    const amount = parseDotDecimalAmount(row.Amount);
    const fee = parseDotDecimalAmount(row.Fee);
    const kind = resolveCsvKind(row.Type, amount);

    if (kind === null) {
      diagnostics.push({
        type: 'missing-marker',
        marker: row.Type,
        message: `Row ${index + 1} (${row.Type}, ${row.Amount}) matches no transaction kind`,
      });
      return;
    }

    transactions.push(withTransactionId(buildPrimary(kind, row, amount, info, filePath, options), options.nextId()));

    if (fee !== 0) {
      const feeInit: TransactionInit = {
        ...baseDefaults(info.accountNumber, filePath, info.year),
        kind: 'BankPayedService',
        accountFrom: info.accountNumber,
        amount: roundToTwoDecimals(-fee),
        currency: row.Currency,
        dateBooked: convertRevolutTimestamp(row['Completed Date']),
        allTransactionLinesText: row.Description,
        serviceType: REVOLUT_FEE_SERVICE_TYPE,
      };
      transactions.push(withTransactionId(feeInit, options.nextId()));
    }
  });

  return { transactions, diagnostics };
}
