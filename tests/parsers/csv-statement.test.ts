import { describe, it, expect } from 'vitest';
import {
  createCardOwnerLookup,
  extractCsvTransactions,
  parseStatementCsv,
  readCsvStatementInfo,
  resolveCsvCurrency,
  resolveCsvKind,
} from '@ledgerline/statement-parser';
import { FormatError } from '@ledgerline/types';

const HEADER = 'Type,Product,Started Date,Completed Date,Description,Amount,Fee,Currency,State,Balance';

const CSV_CONTENT = [
  HEADER,
  'TOPUP,Current,2023-05-01 08:00:00,2023-05-01 08:00:05,Top-up,1000.00,0.00,CZK,COMPLETED,1000.00',
  'CARD_PAYMENT,Current,2023-05-02 12:00:00,2023-05-03 09:00:00,Albert,-120.00,1.50,CZK,COMPLETED,878.50',
  'CARD_PAYMENT,Current,2023-05-04 12:00:00,,Pending shop,-10.00,0.00,CZK,REVERTED,',
  'CASHBACK,Current,2023-05-05 10:00:00,2023-05-05 10:00:00,Cashback,5.00,0.00,CZK,COMPLETED,883.50',
].join('\n');

const FILE_PATH = 'statements/revolut-czk.csv';
const OPTIONS = { revolutAccountPrefix: 'CZ000REVOLUT', revolutCardIdentifier: '9876' };

describe('parseStatementCsv', () => {
  it('should key rows by header', () => {
    const rows = parseStatementCsv(`\uFEFF${CSV_CONTENT}\n`);

    expect(rows).toHaveLength(4);
    expect(rows[0]).toMatchObject({ Type: 'TOPUP', Amount: '1000.00', State: 'COMPLETED' });
  });

  it('should reject an export without the required columns', () => {
    expect(() => parseStatementCsv('Type,Amount\nTOPUP,1.00')).toThrow(FormatError);
    expect(() => parseStatementCsv('Type,Amount\nTOPUP,1.00')).toThrow(/missing column "Started Date"/);
  });
});

describe('resolveCsvKind', () => {
  it('should choose the kind by row type and amount sign', () => {
    expect(resolveCsvKind('EXCHANGE', -5)).toBe('OutgoingPayment');
    expect(resolveCsvKind('exchange', 5)).toBe('IncomingPayment');
    expect(resolveCsvKind('TOPUP', 0)).toBe('IncomingPayment');
    expect(resolveCsvKind('CARD_PAYMENT', 12)).toBe('CardPaymentIncoming');
    expect(resolveCsvKind('ATM', -100)).toBe('CardAtmCashOut');
  });

  it('should return null for combinations without a kind', () => {
    expect(resolveCsvKind('ATM', 100)).toBeNull();
    expect(resolveCsvKind('FEE', 0)).toBeNull();
    expect(resolveCsvKind('CASHBACK', 5)).toBeNull();
  });
});

describe('resolveCsvCurrency', () => {
  it('should prefer a currency named in the file name', () => {
    expect(resolveCsvCurrency('exports/account-eur.csv', [{ Currency: 'USD' }])).toBe('EUR');
  });

  it('should fall back to the first row, then to CZK', () => {
    expect(resolveCsvCurrency('exports/account.csv', [{ Currency: 'USD' }])).toBe('USD');
    expect(resolveCsvCurrency('exports/account.csv', [])).toBe('CZK');
  });
});

describe('Revolut CSV statements', () => {
  const rows = parseStatementCsv(CSV_CONTENT);

  it('should derive the statement info from completed rows', () => {
    expect(readCsvStatementInfo(FILE_PATH, rows, OPTIONS)).toEqual({
      accountNumber: 'CZ000REVOLUTCZK',
      currency: 'CZK',
      year: '2023',
      openingBalance: 0,
      closingBalance: 883.5,
    });
  });

  it('should count the fee of the first row into the opening balance', () => {
    const feeFirst = parseStatementCsv(
      [HEADER, 'TRANSFER,Current,2023-05-01 08:00:00,2023-05-01 08:00:00,Rent,-100.00,2.00,CZK,COMPLETED,398.00'].join('\n')
    );

    expect(readCsvStatementInfo(FILE_PATH, feeFirst, OPTIONS).openingBalance).toBe(500);
  });

  it('should map rows to transactions and split off the fee', () => {
    let id = 0;
    const info = readCsvStatementInfo(FILE_PATH, rows, OPTIONS);
    const { transactions, diagnostics } = extractCsvTransactions(FILE_PATH, rows, info, {
      ...OPTIONS,
      nextId: () => ++id,
      cardOwners: createCardOwnerLookup({ '9876': 'Jana' }),
    });

    expect(transactions).toHaveLength(3);
    expect(transactions[0]).toMatchObject({
      kind: 'IncomingPayment',
      transactionId: 1,
      accountTo: 'CZ000REVOLUTCZK',
      amount: 1000,
      dateBooked: '01.05.2023',
    });
    expect(transactions[1]).toMatchObject({
      kind: 'CardPaymentDebit',
      transactionId: 2,
      accountFrom: 'CZ000REVOLUTCZK',
      amount: -120,
      dateBooked: '03.05.2023',
      paymentDate: '02.05.2023',
      cardIdentifier: '9876',
      cardOwner: 'Jana',
      vendorText: 'Albert',
      allTransactionLinesText: 'Albert',
    });
    expect(transactions[2]).toMatchObject({
      kind: 'BankPayedService',
      transactionId: 3,
      amount: -1.5,
      serviceType: 'transaction fee',
      dateBooked: '03.05.2023',
      parentStatement: FILE_PATH,
    });
    expect(diagnostics).toEqual([
      { type: 'missing-marker', marker: 'CASHBACK', message: 'Row 4 (CASHBACK, 5.00) matches no transaction kind' },
    ]);
  });

  it('should accept completed rows without a started date', () => {
    const undated = parseStatementCsv(
      [
        HEADER,
        'TOPUP,Current,,2023-05-01 08:00:05,Top-up,1000.00,0.00,CZK,COMPLETED,1000.00',
        'CARD_PAYMENT,Current,,2023-05-03 09:00:00,Albert,-120.00,0.00,CZK,COMPLETED,880.00',
      ].join('\n')
    );
    let id = 0;
    const info = readCsvStatementInfo(FILE_PATH, undated, OPTIONS);
    const { transactions } = extractCsvTransactions(FILE_PATH, undated, info, { ...OPTIONS, nextId: () => ++id });

    expect(transactions).toHaveLength(2);
    expect(transactions[0]).toMatchObject({ kind: 'IncomingPayment', amount: 1000, dateBooked: '01.05.2023' });
    expect(transactions[1]).toMatchObject({ kind: 'CardPaymentDebit', dateBooked: '03.05.2023', paymentDate: '03.05.2023' });
  });

  it('should produce nothing for reverted rows', () => {
    const reverted = parseStatementCsv(
      [HEADER, 'CARD_PAYMENT,Current,2023-05-04 12:00:00,,Pending shop,-10.00,0.00,CZK,REVERTED,'].join('\n')
    );
    const info = readCsvStatementInfo(FILE_PATH, reverted, OPTIONS);
    const result = extractCsvTransactions(FILE_PATH, reverted, info, { ...OPTIONS, nextId: () => 1 });

    expect(result.transactions).toEqual([]);
    expect(info.openingBalance).toBeNull();
    expect(info.year).toBeNull();
  });
});
