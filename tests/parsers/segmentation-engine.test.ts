import { describe, it, expect } from 'vitest';
import {
  SegmentationEngine,
  segmentPages,
  createCardOwnerLookup,
  SequentialIdAllocator,
  type SegmentationOptions,
} from '@ledgerline/statement-parser';
import { OffsetOutOfRangeError, FormatError } from '@ledgerline/types';

const STATEMENT_ACCOUNT = '123456789/0800';

function csOptions(): SegmentationOptions {
  const ids = new SequentialIdAllocator();
  return {
    bank: 'cs',
    year: '2023',
    statementAccount: STATEMENT_ACCOUNT,
    parentStatement: 'statements/cs-2023-05.pdf',
    nextId: () => ids.next(),
    cardOwners: createCardOwnerLookup({ '4321': 'Jana' }),
  };
}

const CARD_PAYMENT_PAGE = [
  '05.03.2023',
  'Platba kartou',
  '1234',
  '-250,00',
  '0308',
  '0',
  'XXXXXXXXXXXX4321 ALBERT d.tran.04.03.2023',
  'ALBERT PRAHA',
  'Konečný zůstatek:',
  '9 750,00',
];

describe('SegmentationEngine', () => {
  it('should produce one fully populated card payment from a ČS card entry', () => {
    const transactions = segmentPages([CARD_PAYMENT_PAGE], csOptions());

    expect(transactions).toHaveLength(1);
    expect(transactions[0]).toEqual({
      kind: 'CardPaymentDebit',
      transactionId: 1,
      statementAccount: STATEMENT_ACCOUNT,
      parentStatement: 'statements/cs-2023-05.pdf',
      year: '2023',
      accountFrom: STATEMENT_ACCOUNT,
      accountTo: null,
      amount: -250,
      currency: 'CZK',
      dateBooked: '05.03.2023',
      accountFromName: null,
      senderNote: null,
      variableSymbol: 1234,
      constantSymbol: 308,
      specificSymbol: 0,
      allTransactionLinesText: '1234\n-250,00\n0308\n0\nXXXXXXXXXXXX4321 ALBERT d.tran.04.03.2023\nALBERT PRAHA\n',
      userDescription: '',
      userCategory: '',
      paymentDate: '04.03.2023',
      cardIdentifier: '4321',
      vendorText: 'ALBERT PRAHA',
      cardOwner: 'Jana',
    });
  });

  it('should stop collecting body lines at a section-end line', () => {
    const engine = new SegmentationEngine(csOptions());
    engine.processPage(CARD_PAYMENT_PAGE);

    expect(engine.currentState).toEqual({ mode: 'idle' });
    expect(engine.results[0]?.allTransactionLinesText.endsWith('ALBERT PRAHA\n')).toBe(true);
  });

  it('should keep the open transaction across a page break', () => {
    const firstPage = ['10.05.2023', 'Kreditní úrok', '+12,34'];
    const secondPage = ['úrok za květen', '', 'Výpis z účtu', 'not collected'];

    const engine = new SegmentationEngine(csOptions());
    engine.processPage(firstPage);
    expect(engine.currentState.mode).toBe('accumulating');
    engine.processPage(secondPage);

    expect(engine.currentState.mode).toBe('idle');
    expect(engine.results[0]?.allTransactionLinesText).toBe('+12,34\núrok za květen\n');
  });

  it('should ignore lines while idle', () => {
    const engine = new SegmentationEngine(csOptions());
    engine.processPage(['Výpis z účtu', 'Some header', 'Datum']);

    expect(engine.results).toHaveLength(0);
    expect(engine.currentState).toEqual({ mode: 'idle' });
  });

  it('should start a new transaction on every marker line', () => {
    const page = [
      '10.05.2023',
      'Kreditní úrok',
      '+12,34',
      '10.05.2023',
      'Daň z úroku',
      '-1,85',
    ];

    const transactions = segmentPages([page], csOptions());

    expect(transactions.map((t) => [t.kind, t.transactionId, t.amount])).toEqual([
      ['InterestPositive', 1, 12.34],
      ['TaxInterest', 2, -1.85],
    ]);
    expect(transactions[0]?.allTransactionLinesText).toBe('+12,34\n10.05.2023\n');
  });

  it('should fail when a field offset points past the page', () => {
    const truncated = CARD_PAYMENT_PAGE.slice(0, 6);
    expect(() => segmentPages([truncated], csOptions())).toThrow(OffsetOutOfRangeError);
  });

  it('should fail on a non-numeric symbol', () => {
    const page = [...CARD_PAYMENT_PAGE];
    page[2] = 'VS 1234';
    expect(() => segmentPages([page], csOptions())).toThrow(FormatError);
  });
});
