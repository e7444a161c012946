import { describe, it, expect } from 'vitest';
import { segmentPages, createCardOwnerLookup, type SegmentationOptions } from '@ledgerline/statement-parser';
import type { Transaction } from '@ledgerline/types';

const STATEMENT_ACCOUNT = '123456789/0800';

function parseCs(lines: string[]): Transaction {
  let id = 0;
  const options: SegmentationOptions = {
    bank: 'cs',
    year: '2023',
    statementAccount: STATEMENT_ACCOUNT,
    parentStatement: null,
    nextId: () => ++id,
    cardOwners: createCardOwnerLookup({ '4321': 'Jana' }),
  };
  const transactions = segmentPages([lines], options);
  expect(transactions).toHaveLength(1);
  const [transaction] = transactions;
  if (transaction === undefined) {
    throw new Error('no transaction');
  }
  return transaction;
}

describe('ČS statement layouts', () => {
  it('should read an incoming payment', () => {
    const t = parseCs(['03.05.2023', 'Příchozí úhrada', '987654321/0100', 'Výplata', '+30 000,00']);

    expect(t).toMatchObject({
      kind: 'IncomingPayment',
      accountFrom: '987654321/0100',
      accountTo: STATEMENT_ACCOUNT,
      amount: 30000,
      dateBooked: '03.05.2023',
    });
  });

  it('should read a foreign incoming payment', () => {
    const t = parseCs(['03.05.2023', 'Zahraniční příchozí úhrada', 'DE00123456780000', '+1 000,00']);

    expect(t).toMatchObject({ kind: 'IncomingPayment', accountFrom: 'DE00123456780000', amount: 1000 });
  });

  it('should skip the instant payment line of an outgoing payment', () => {
    const t = parseCs(['04.05.2023', 'Tuzemská odchozí úhrada', 'okamžitá', '111111111/0300', '-1 500,00']);

    expect(t).toMatchObject({
      kind: 'OutgoingPayment',
      accountFrom: STATEMENT_ACCOUNT,
      accountTo: '111111111/0300',
      amount: -1500,
    });
  });

  it('should read the counterparty of a standard outgoing payment from the next line', () => {
    const t = parseCs(['04.05.2023', 'Tuzemská odchozí úhrada', '111111111/0300', '-800,00']);

    expect(t).toMatchObject({ kind: 'OutgoingPayment', accountTo: '111111111/0300', amount: -800 });
  });

  it('should scan for the account of a standing order', () => {
    const t = parseCs(['01.05.2023', 'Trvalý příkaz', 'Nájem', '333333333/2010', '-12 000,00']);

    expect(t).toMatchObject({ kind: 'OutgoingPaymentPeriodic', accountTo: '333333333/2010', amount: -12000 });
  });

  it('should scan for the account of a direct debit', () => {
    const t = parseCs(['10.05.2023', 'Inkaso', 'O2 Czech', '222222222/0100', '-599,00']);

    expect(t).toMatchObject({
      kind: 'DirectDebit',
      accountFrom: STATEMENT_ACCOUNT,
      accountTo: '222222222/0100',
      amount: -599,
    });
  });

  it('should read a card refund as an incoming card payment', () => {
    const t = parseCs([
      '15.05.2023',
      'Vratka platby kartou',
      '0',
      '+250,00',
      'refund',
      '0308',
      '0',
      'XXXXXXXXXXXX4321 d.tran.14.05.2023',
      'ALBERT PRAHA',
    ]);

    expect(t).toMatchObject({
      kind: 'CardPaymentIncoming',
      accountTo: STATEMENT_ACCOUNT,
      amount: 250,
      variableSymbol: 0,
      constantSymbol: 308,
      specificSymbol: 0,
      cardIdentifier: '4321',
      paymentDate: '14.05.2023',
      vendorText: 'ALBERT PRAHA',
      cardOwner: 'Jana',
    });
  });

  it('should read a withdrawal from our own ATM', () => {
    const t = parseCs([
      '06.05.2023',
      'Výběr hotovosti z bankomatu',
      '0',
      '-2 000,00',
      '0',
      '0',
      'XXXXXXXXXXXX9999 d.tran.05.05.2023',
      'ATM CS PRAHA',
    ]);

    expect(t).toMatchObject({
      kind: 'CardAtmCashOut',
      amount: -2000,
      ourBankAtm: true,
      cashOutDate: '05.05.2023',
      paymentDate: null,
      cardIdentifier: '9999',
      vendorText: 'ATM CS PRAHA',
      cardOwner: 'Unknown card',
    });
  });

  it('should shift the fields of a withdrawal from another bank ATM', () => {
    const t = parseCs([
      '06.05.2023',
      'Výběr hotovosti z bankomatu',
      'jiné banky v ČR',
      '0',
      '-2 000,00',
      '0',
      '0',
      'XXXXXXXXXXXX4321 d.tran.05.05.2023',
      'ATM KB PRAHA',
    ]);

    expect(t).toMatchObject({
      kind: 'CardAtmCashOut',
      amount: -2000,
      ourBankAtm: false,
      cashOutDate: '05.05.2023',
      cardIdentifier: '4321',
      vendorText: 'ATM KB PRAHA',
    });
  });

  it('should read an ATM deposit', () => {
    const t = parseCs(['12.05.2023', 'Vklad hotovosti přes bankomat', '0', '+5 000,00', '0']);

    expect(t).toMatchObject({
      kind: 'CardAtmDeposit',
      accountFrom: STATEMENT_ACCOUNT,
      accountTo: STATEMENT_ACCOUNT,
      amount: 5000,
      depositDate: '12.05.2023',
    });
  });

  it('should name the service and subtype of a bank fee', () => {
    const t = parseCs([
      '30.05.2023',
      'Ceny za služby',
      'Cena za výběr hotovosti z bankomatu',
      'jiné banky v ČR',
      '-40,00',
    ]);

    expect(t).toMatchObject({
      kind: 'BankPayedService',
      accountFrom: STATEMENT_ACCOUNT,
      amount: -40,
      serviceType: 'Cena za výběr hotovosti z bankomatu - jiné banky v ČR',
    });
  });

  it('should leave the service type empty for an unknown fee', () => {
    const t = parseCs(['30.05.2023', 'Ceny za služby', 'Jiná cena', '-10,00']);

    expect(t).toMatchObject({ kind: 'BankPayedService', serviceType: '' });
  });

  it('should book interest to and from the statement account', () => {
    const t = parseCs(['31.05.2023', 'Kreditní úrok', '+12,34']);

    expect(t).toMatchObject({
      kind: 'InterestPositive',
      accountFrom: STATEMENT_ACCOUNT,
      accountTo: STATEMENT_ACCOUNT,
      amount: 12.34,
    });
  });

  it('should read interest tax', () => {
    const t = parseCs(['31.05.2023', 'Daň z úroku', '-1,85']);

    expect(t).toMatchObject({ kind: 'TaxInterest', accountFrom: STATEMENT_ACCOUNT, accountTo: null, amount: -1.85 });
  });

  it('should prefer a date printed on the marker line', () => {
    const t = parseCs(['header', '07.05.2023 Kreditní úrok', '+1,00']);

    expect(t.dateBooked).toBe('07.05.2023');
  });

  it('should pad a single-digit booking date', () => {
    const t = parseCs(['7.5.2023', 'Kreditní úrok', '+1,00']);

    expect(t.dateBooked).toBe('07.05.2023');
  });
});
