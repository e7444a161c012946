/**
 * Field positions of every (bank, kind) statement layout, as line offsets
 * from the marker line.
 */

/** Where the amount line is found */
export type AmountSource =
  /** First signed amount line at or after the marker line */
  | { from: 'scan' }
  /** Fixed offset from the marker line */
  | { from: 'offset'; offset: number }
  /** Fixed offset from the counterparty account line found by scanning */
  | { from: 'account'; offset: number };

/** Where the counterparty account is found */
export type CounterpartySource =
  /** Fixed offset, moved one line down when that line contains `shiftWhen` */
  | { from: 'offset'; offset: number; shiftWhen?: string }
  /** First line carrying an account number with bank code */
  | { from: 'account' }
  /** The transaction moves money within the statement account */
  | { from: 'statement' }
  | { from: 'none' };

export interface TransferLayout {
  counterparty: CounterpartySource;
  amount: AmountSource;
}

export interface CsCardLayout {
  variableSymbol: number;
  constantSymbol: number;
  specificSymbol: number;
  /** "XXXXXXXXXXXX1234 ... d.tran.dd.mm.yyyy" */
  cardLine: number;
  vendor: number;
  /** Shift applied to all offsets above when the line after the marker contains this text */
  shiftWhen?: string;
}

export interface CsobCardLayout {
  amount: AmountSource;
  variableSymbol: number;
  constantSymbol: number;
  specificSymbol: number;
  /** The card identifier is the last four characters of this line */
  cardIdentifier: number;
  /** Vendor text is these lines concatenated */
  vendor: readonly number[];
  /** The payment date is the last token of this line */
  paymentDate: number;
}

export interface CsDepositLayout {
  variableSymbol: number;
  constantSymbol: number;
}

const SCAN: AmountSource = { from: 'scan' };
const BEFORE_ACCOUNT: AmountSource = { from: 'account', offset: -2 };

export const TRANSFER_LAYOUTS = {
  cs: {
    IncomingPayment: { counterparty: { from: 'offset', offset: 1 }, amount: SCAN },
    OutgoingPayment: { counterparty: { from: 'offset', offset: 1, shiftWhen: 'okamžitá' }, amount: SCAN },
    OutgoingPaymentPeriodic: { counterparty: { from: 'account' }, amount: SCAN },
    DirectDebit: { counterparty: { from: 'account' }, amount: SCAN },
    InterestPositive: { counterparty: { from: 'statement' }, amount: SCAN },
    TaxInterest: { counterparty: { from: 'none' }, amount: SCAN },
  },
  csob: {
    IncomingPayment: { counterparty: { from: 'account' }, amount: BEFORE_ACCOUNT },
    OutgoingPayment: { counterparty: { from: 'account' }, amount: BEFORE_ACCOUNT },
    OutgoingPaymentPeriodic: { counterparty: { from: 'account' }, amount: BEFORE_ACCOUNT },
    DirectDebit: { counterparty: { from: 'account' }, amount: BEFORE_ACCOUNT },
    InterestPositive: { counterparty: { from: 'statement' }, amount: { from: 'offset', offset: 2 } },
    ElectronicBankingTransfer: { counterparty: { from: 'account' }, amount: BEFORE_ACCOUNT },
  },
} as const satisfies Record<'cs' | 'csob', Record<string, TransferLayout>>;

export const CS_CARD_LAYOUTS = {
  CardPaymentDebit: { variableSymbol: 1, constantSymbol: 3, specificSymbol: 4, cardLine: 5, vendor: 6 },
  CardPaymentIncoming: { variableSymbol: 1, constantSymbol: 4, specificSymbol: 5, cardLine: 6, vendor: 7 },
  CardAtmCashOut: {
    variableSymbol: 1,
    constantSymbol: 3,
    specificSymbol: 4,
    cardLine: 5,
    vendor: 6,
    shiftWhen: 'jiné banky v ČR',
  },
} as const satisfies Record<string, CsCardLayout>;

export const CSOB_CARD_LAYOUTS = {
  CardPaymentDebit: {
    amount: SCAN,
    variableSymbol: 4,
    constantSymbol: 5,
    specificSymbol: 6,
    cardIdentifier: 6,
    vendor: [7, 9],
    paymentDate: 8,
  },
  CardPaymentIncoming: {
    amount: { from: 'offset', offset: 2 },
    variableSymbol: 4,
    constantSymbol: 5,
    specificSymbol: 6,
    cardIdentifier: 6,
    vendor: [7, 9],
    paymentDate: 8,
  },
} as const satisfies Record<string, CsobCardLayout>;

export const CS_DEPOSIT_LAYOUT: CsDepositLayout = { variableSymbol: 1, constantSymbol: 3 };

/**
 * ČS bank service descriptions on the line after the marker, each with the
 * subtypes looked for on the line after that.
 */
export const CS_SERVICE_TYPES: ReadonlyArray<{ name: string; subtypes: readonly string[] }> = [
  { name: 'Cena za výběr hotovosti z bankomatu', subtypes: ['jiné banky v ČR'] },
  { name: 'Cena za vedení účtu', subtypes: [] },
  { name: 'Poplatek', subtypes: ['platební karta'] },
];

/**
 * ČSOB bank service descriptions, read from the marker line itself.
 */
export const CSOB_SERVICE_TYPES: ReadonlyArray<{ name: string; subtypes: readonly string[] }> = [
  { name: 'Poplatek', subtypes: ['platební karta'] },
];
