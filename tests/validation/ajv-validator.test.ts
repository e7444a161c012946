import { describe, it, expect } from 'vitest';
import { validateLedgerExport, validateAndThrow, formatValidationErrors } from '@ledgerline/types';

function createRecord(): Record<string, unknown> {
  return {
    type: 'CardPaymentDebit',
    statement_account: '123456789/0800',
    parent_statement: 'statements/cs-2023-05.pdf',
    transaction_id: 1,
    year: '2023',
    account_from: '123456789/0800',
    amount: -250,
    date_booked: '05.03.2023',
    account_to: null,
    currency: 'CZK',
    account_from_name: null,
    sender_note: null,
    variable_symbol: 1234,
    constant_symbol: 308,
    specific_symbol: 0,
    all_transaction_lines_text: 'ALBERT PRAHA\n',
    user_description: '',
    user_category: '',
    payment_date: '04.03.2023',
    card_identifier: '4321',
    vendor_text: 'ALBERT PRAHA',
    card_owner: 'Jana',
  };
}

describe('validateLedgerExport', () => {
  it('should accept a valid export', () => {
    expect(validateLedgerExport([createRecord()])).toEqual({ valid: true, errors: [] });
  });

  it('should accept an empty export', () => {
    expect(validateLedgerExport([]).valid).toBe(true);
  });

  it('should reject a record without an amount', () => {
    const record = createRecord();
    delete record['amount'];
    const result = validateLedgerExport([record]);

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      path: '/0',
      keyword: 'required',
      message: "must have required property 'amount'",
    });
  });

  it('should reject a booking date that is not dd.mm.yyyy', () => {
    const result = validateLedgerExport([{ ...createRecord(), date_booked: '2023-03-05' }]);

    expect(result.errors.map((e) => [e.path, e.keyword])).toEqual([['/0/date_booked', 'pattern']]);
  });

  it('should reject unknown types and properties', () => {
    const result = validateLedgerExport([{ ...createRecord(), type: 'Refund', note: 'x' }]);

    expect(result.errors.map((e) => e.keyword).sort()).toEqual(['additionalProperties', 'enum']);
  });
});

describe('validateAndThrow', () => {
  it('should throw with the failing paths', () => {
    const record = createRecord();
    delete record['amount'];

    expect(() => validateAndThrow([record])).toThrow(
      "Schema validation failed:\n  /0: must have required property 'amount'"
    );
  });

  it('should not throw for a valid export', () => {
    expect(() => validateAndThrow([createRecord()])).not.toThrow();
  });
});

describe('formatValidationErrors', () => {
  it('should prefix each error with its keyword', () => {
    const { errors } = validateLedgerExport({});

    expect(formatValidationErrors(errors)).toEqual(['[type] /: must be array']);
  });
});
