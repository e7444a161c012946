export {
  BANK_IDS,
  TRANSACTION_KINDS,
  KIND_PARENT,
  isTransactionKind,
  isKindOf,
  expectedPolarity,
  matchesPolarity,
  isCardTransaction,
  baseDefaults,
  withTransactionId,
} from './transaction.js';

export type {
  BankId,
  TransactionKind,
  AmountPolarity,
  TransactionBase,
  CardFields,
  IncomingPayment,
  OutgoingPayment,
  OutgoingPaymentPeriodic,
  CardPaymentDebit,
  CardPaymentIncoming,
  CardAtmCashOut,
  CardAtmDeposit,
  BankPayedService,
  InterestPositive,
  TaxInterest,
  ElectronicBankingTransfer,
  DirectDebit,
  Transaction,
  TransactionOfKind,
  CardTransaction,
  TransactionInit,
  TransactionBaseInit,
} from './transaction.js';

export type {
  StatementSource,
  StatementPages,
  CsvRow,
  ReconciliationWarning,
  MissingMarkerWarning,
  PolarityWarning,
  StatementDiagnostic,
  StatementAccount,
} from './statement.js';
