/**
 * Unified transaction model shared by every statement source.
 *
 * A transaction is a tagged union over {@link TransactionKind}. The "is-a"
 * lineage between kinds is kept as data in {@link KIND_PARENT} so callers can
 * ask "is this any kind of outgoing payment" without a class hierarchy.
 */

import { DEFAULT_CURRENCY } from '../utils/constants.js';

export type BankId = 'csob' | 'cs' | 'revolut';

export const BANK_IDS: readonly BankId[] = ['csob', 'cs', 'revolut'];

export const TRANSACTION_KINDS = [
  'IncomingPayment',
  'OutgoingPayment',
  'OutgoingPaymentPeriodic',
  'CardPaymentDebit',
  'CardPaymentIncoming',
  'CardAtmCashOut',
  'CardAtmDeposit',
  'BankPayedService',
  'InterestPositive',
  'TaxInterest',
  'ElectronicBankingTransfer',
  'DirectDebit',
] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

export function isTransactionKind(value: string): value is TransactionKind {
  return TRANSACTION_KINDS.some((kind) => kind === value);
}

/**
 * Parent of each kind in the lineage. Root kinds map to null.
 */
export const KIND_PARENT: Readonly<Record<TransactionKind, TransactionKind | null>> = {
  IncomingPayment: null,
  OutgoingPayment: null,
  BankPayedService: null,
  OutgoingPaymentPeriodic: 'OutgoingPayment',
  CardPaymentDebit: 'OutgoingPayment',
  CardPaymentIncoming: 'CardPaymentDebit',
  CardAtmCashOut: 'CardPaymentDebit',
  CardAtmDeposit: 'IncomingPayment',
  InterestPositive: 'IncomingPayment',
  TaxInterest: 'OutgoingPayment',
  ElectronicBankingTransfer: 'IncomingPayment',
  DirectDebit: 'OutgoingPayment',
};

/**
 * True when `kind` equals `ancestor` or descends from it.
 */
export function isKindOf(kind: TransactionKind, ancestor: TransactionKind): boolean {
  let current: TransactionKind | null = kind;
  while (current !== null) {
    if (current === ancestor) {
      return true;
    }
    current = KIND_PARENT[current];
  }
  return false;
}

export type AmountPolarity = 'positive' | 'negative' | 'either';

/**
 * Expected sign of the amount. Refunds sit under the card debit lineage but
 * credit the account, and electronic banking transfers go both ways.
 */
export function expectedPolarity(kind: TransactionKind): AmountPolarity {
  if (kind === 'ElectronicBankingTransfer') {
    return 'either';
  }
  if (kind === 'CardPaymentIncoming') {
    return 'positive';
  }
  if (kind === 'BankPayedService' || isKindOf(kind, 'OutgoingPayment')) {
    return 'negative';
  }
  return 'positive';
}

export function matchesPolarity(kind: TransactionKind, amount: number): boolean {
  const polarity = expectedPolarity(kind);
  if (polarity === 'either') {
    return true;
  }
  return polarity === 'negative' ? amount <= 0 : amount >= 0;
}

export interface TransactionBase {
  /** Ledger-wide id, reassigned once when the ledger is renumbered */
  transactionId: number;
  readonly statementAccount: string;
  /** Path of the source file, null for transactions without one */
  readonly parentStatement: string | null;
  readonly year: string | null;
  readonly accountFrom: string | null;
  readonly accountTo: string | null;
  readonly amount: number;
  readonly currency: string;
  /** dd.mm.yyyy */
  readonly dateBooked: string;
  readonly accountFromName: string | null;
  readonly senderNote: string | null;
  readonly variableSymbol: number | null;
  readonly constantSymbol: number | null;
  readonly specificSymbol: number | null;
  /** Continuation lines of the statement entry, each trimmed and newline-terminated */
  allTransactionLinesText: string;
  userDescription: string;
  userCategory: string;
}

export interface CardFields {
  readonly paymentDate: string | null;
  /** Last four digits of the card number */
  readonly cardIdentifier: string | null;
  readonly vendorText: string | null;
  readonly cardOwner: string;
}

export interface IncomingPayment extends TransactionBase {
  readonly kind: 'IncomingPayment';
}

export interface OutgoingPayment extends TransactionBase {
  readonly kind: 'OutgoingPayment';
}

export interface OutgoingPaymentPeriodic extends TransactionBase {
  readonly kind: 'OutgoingPaymentPeriodic';
}

export interface CardPaymentDebit extends TransactionBase, CardFields {
  readonly kind: 'CardPaymentDebit';
}

export interface CardPaymentIncoming extends TransactionBase, CardFields {
  readonly kind: 'CardPaymentIncoming';
}

export interface CardAtmCashOut extends TransactionBase, CardFields {
  readonly kind: 'CardAtmCashOut';
  readonly ourBankAtm: boolean;
  readonly cashOutDate: string;
}

export interface CardAtmDeposit extends TransactionBase {
  readonly kind: 'CardAtmDeposit';
  readonly depositDate: string;
}

export interface BankPayedService extends TransactionBase {
  readonly kind: 'BankPayedService';
  readonly serviceType: string;
}

export interface InterestPositive extends TransactionBase {
  readonly kind: 'InterestPositive';
}

export interface TaxInterest extends TransactionBase {
  readonly kind: 'TaxInterest';
}

export interface ElectronicBankingTransfer extends TransactionBase {
  readonly kind: 'ElectronicBankingTransfer';
}

export interface DirectDebit extends TransactionBase {
  readonly kind: 'DirectDebit';
}

export type Transaction =
  | IncomingPayment
  | OutgoingPayment
  | OutgoingPaymentPeriodic
  | CardPaymentDebit
  | CardPaymentIncoming
  | CardAtmCashOut
  | CardAtmDeposit
  | BankPayedService
  | InterestPositive
  | TaxInterest
  | ElectronicBankingTransfer
  | DirectDebit;

export type TransactionOfKind<K extends TransactionKind> = Extract<Transaction, { kind: K }>;

export type CardTransaction = CardPaymentDebit | CardPaymentIncoming | CardAtmCashOut;

export function isCardTransaction(transaction: Transaction): transaction is CardTransaction {
  return (
    transaction.kind === 'CardPaymentDebit' ||
    transaction.kind === 'CardPaymentIncoming' ||
    transaction.kind === 'CardAtmCashOut'
  );
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A transaction before the ledger has assigned its id.
 */
export type TransactionInit = DistributiveOmit<Transaction, 'transactionId'>;

/**
 * Common fields with their defaults, for building a {@link TransactionInit}.
 */
export type TransactionBaseInit = Omit<TransactionBase, 'transactionId'>;

export function baseDefaults(
  statementAccount: string,
  parentStatement: string | null,
  year: string | null
): TransactionBaseInit {
  return {
    statementAccount,
    parentStatement,
    year,
    accountFrom: null,
    accountTo: null,
    amount: 0,
    currency: DEFAULT_CURRENCY,
    dateBooked: '',
    accountFromName: null,
    senderNote: null,
    variableSymbol: null,
    constantSymbol: null,
    specificSymbol: null,
    allTransactionLinesText: '',
    userDescription: '',
    userCategory: '',
  };
}

/**
 * Attach a ledger id to a transaction under construction.
 */
export function withTransactionId(init: TransactionInit, transactionId: number): Transaction {
  return { ...init, transactionId };
}
