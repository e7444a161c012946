import { describe, it, expect } from 'vitest';
import { exportJson, toLedgerDocument, toLedgerRecord } from '@ledgerline/output';
import { sampleTransactions } from '../fixtures/transactions.js';

describe('toLedgerRecord', () => {
  it('should write the common fields in export order', () => {
    const [incoming] = sampleTransactions();
    if (incoming === undefined) throw new Error('fixture');

    expect(Object.keys(toLedgerRecord(incoming))).toEqual([
      'type',
      'statement_account',
      'parent_statement',
      'transaction_id',
      'year',
      'account_from',
      'amount',
      'date_booked',
      'account_to',
      'currency',
      'account_from_name',
      'sender_note',
      'variable_symbol',
      'constant_symbol',
      'specific_symbol',
      'all_transaction_lines_text',
      'user_description',
      'user_category',
    ]);
  });

  it('should add the card and ATM fields to a cash withdrawal', () => {
    const atm = sampleTransactions()[2];
    if (atm === undefined) throw new Error('fixture');

    expect(toLedgerRecord(atm)).toMatchObject({
      type: 'CardAtmCashOut',
      transaction_id: 3,
      payment_date: null,
      card_identifier: '4321',
      vendor_text: 'ATM KB PRAHA',
      card_owner: 'Jana',
      our_bank_atm: false,
      cash_out_date: '05.05.2023',
    });
  });

  it('should add the service type to a bank fee', () => {
    const fee = sampleTransactions()[4];
    if (fee === undefined) throw new Error('fixture');

    expect(toLedgerRecord(fee).service_type).toBe('Cena za výběr hotovosti z bankomatu - jiné banky v ČR');
  });
});

describe('exportJson', () => {
  it('should indent with four spaces', () => {
    const json = exportJson(sampleTransactions().slice(0, 1));

    expect(json.startsWith('[\n    {\n        "type": "IncomingPayment",\n')).toBe(true);
  });

  it('should keep non-ASCII text unescaped', () => {
    const json = exportJson(sampleTransactions().slice(0, 1));

    expect(json).toContain('"all_transaction_lines_text": "Výplata\\n"');
  });

  it('should write an empty ledger as an empty array', () => {
    expect(exportJson([])).toBe('[]');
  });

  it('should refuse a transaction without a booking date', () => {
    const [incoming] = sampleTransactions();
    if (incoming === undefined) throw new Error('fixture');

    expect(() => toLedgerDocument([{ ...incoming, dateBooked: '' }])).toThrow(
      'Schema validation failed:\n  /0/date_booked:'
    );
  });
});
