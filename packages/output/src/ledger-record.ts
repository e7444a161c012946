/**
 * Mapping between in-memory transactions and the snake_case records of the
 * JSON ledger export.
 */

import {
  UNKNOWN_CARD_OWNER,
  isTransactionKind,
  normalizeBookingDate,
  type LedgerRecord,
  type Transaction,
  type TransactionBaseInit,
  type TransactionInit,
  type TransactionKind,
} from '@ledgerline/types';

/**
 * Type names older exports wrote for kinds that have since been renamed.
 */
export const LEGACY_KIND_ALIASES: Readonly<Record<string, TransactionKind>> = {
  IncomingElectronicBankingTransfer: 'ElectronicBankingTransfer',
};

export function resolveRecordKind(type: string): TransactionKind | null {
  if (isTransactionKind(type)) {
    return type;
  }
  return LEGACY_KIND_ALIASES[type] ?? null;
}

export function toLedgerRecord(transaction: Transaction): LedgerRecord {
  const record: LedgerRecord = {
    type: transaction.kind,
    statement_account: transaction.statementAccount,
    parent_statement: transaction.parentStatement,
    transaction_id: transaction.transactionId,
    year: transaction.year,
    account_from: transaction.accountFrom,
    amount: transaction.amount,
    date_booked: transaction.dateBooked,
    account_to: transaction.accountTo,
    currency: transaction.currency,
    account_from_name: transaction.accountFromName,
    sender_note: transaction.senderNote,
    variable_symbol: transaction.variableSymbol,
    constant_symbol: transaction.constantSymbol,
    specific_symbol: transaction.specificSymbol,
    all_transaction_lines_text: transaction.allTransactionLinesText,
    user_description: transaction.userDescription,
    user_category: transaction.userCategory,
  };

  switch (transaction.kind) {
    case 'CardPaymentDebit':
    case 'CardPaymentIncoming':
      return {
        ...record,
        payment_date: transaction.paymentDate,
        card_identifier: transaction.cardIdentifier,
        vendor_text: transaction.vendorText,
        card_owner: transaction.cardOwner,
      };
    case 'CardAtmCashOut':
      return {
        ...record,
        payment_date: transaction.paymentDate,
        card_identifier: transaction.cardIdentifier,
        vendor_text: transaction.vendorText,
        card_owner: transaction.cardOwner,
        our_bank_atm: transaction.ourBankAtm,
        cash_out_date: transaction.cashOutDate,
      };
    case 'CardAtmDeposit':
      return { ...record, deposit_date: transaction.depositDate };
    case 'BankPayedService':
      return { ...record, service_type: transaction.serviceType };
    default:
      return record;
  }
}

/**
 * Rebuild a transaction from an export record. Returns null when the record's
 * type names no known kind. The record's id is not kept; the ledger assigns a
 * new one.
 */
export function fromLedgerRecord(record: LedgerRecord): TransactionInit | null {
  const kind = resolveRecordKind(record.type);
  if (kind === null) {
    return null;
  }

  // Older exports did not zero-pad the booking date
  const dateBooked = normalizeBookingDate(record.date_booked);
  const base: TransactionBaseInit = {
    statementAccount: record.statement_account,
    parentStatement: record.parent_statement,
    year: record.year === null ? null : String(record.year),
    accountFrom: record.account_from,
    accountTo: record.account_to,
    amount: record.amount,
    currency: record.currency,
    dateBooked,
    accountFromName: record.account_from_name,
    senderNote: record.sender_note,
    variableSymbol: record.variable_symbol,
    constantSymbol: record.constant_symbol,
    specificSymbol: record.specific_symbol,
    allTransactionLinesText: record.all_transaction_lines_text,
    userDescription: record.user_description,
    userCategory: record.user_category,
  };

  const card = {
    paymentDate: record.payment_date ?? null,
    cardIdentifier: record.card_identifier ?? null,
    vendorText: record.vendor_text ?? null,
    cardOwner: record.card_owner ?? UNKNOWN_CARD_OWNER,
  };

  switch (kind) {
    case 'CardPaymentDebit':
      return { ...base, ...card, kind };
    case 'CardPaymentIncoming':
      return { ...base, ...card, kind };
    case 'CardAtmCashOut':
      return {
        ...base,
        ...card,
        kind,
        ourBankAtm: record.our_bank_atm ?? false,
        cashOutDate: record.cash_out_date ?? dateBooked,
      };
    case 'CardAtmDeposit':
      return { ...base, kind, depositDate: record.deposit_date ?? dateBooked };
    case 'BankPayedService':
      return { ...base, kind, serviceType: record.service_type ?? '' };
    case 'IncomingPayment':
    case 'OutgoingPayment':
    case 'OutgoingPaymentPeriodic':
    case 'InterestPositive':
    case 'TaxInterest':
    case 'ElectronicBankingTransfer':
    case 'DirectDebit':
      return { ...base, kind };
  }
}
