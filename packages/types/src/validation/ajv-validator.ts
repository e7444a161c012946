/**
 * AJV-based JSON Schema validation of the ledger export document.
 */

import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { LedgerRecord } from '../schemas/ledger-record.js';

const Ajv = AjvModule.default;

const nullableString = { anyOf: [{ type: 'string' }, { type: 'null' }] };
const nullableSymbol = { anyOf: [{ type: 'integer', minimum: 0 }, { type: 'null' }] };

const SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'https://example.local/schemas/ledger-export.schema.json',
  title: 'Transaction ledger export',
  type: 'array',
  items: { $ref: '#/definitions/record' },
  definitions: {
    record: {
      type: 'object',
      additionalProperties: false,
      required: [
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
      ],
      properties: {
        type: {
          enum: [
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
          ],
        },
        statement_account: { type: 'string' },
        parent_statement: nullableString,
        transaction_id: { type: 'integer', minimum: 1 },
        year: nullableString,
        account_from: nullableString,
        amount: { type: 'number' },
        date_booked: { type: 'string', pattern: '^\\d{2}\\.\\d{2}\\.\\d{4}$' },
        account_to: nullableString,
        currency: { type: 'string', minLength: 1 },
        account_from_name: nullableString,
        sender_note: nullableString,
        variable_symbol: nullableSymbol,
        constant_symbol: nullableSymbol,
        specific_symbol: nullableSymbol,
        all_transaction_lines_text: { type: 'string' },
        user_description: { type: 'string' },
        user_category: { type: 'string' },
        payment_date: nullableString,
        card_identifier: nullableString,
        vendor_text: nullableString,
        card_owner: { type: 'string' },
        our_bank_atm: { type: 'boolean' },
        cash_out_date: { type: 'string' },
        deposit_date: { type: 'string' },
        service_type: { type: 'string' },
      },
    },
  },
};

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: ValidateFunction | null = null;

function getValidator(): ValidateFunction {
  if (compiledValidator === null) {
    const ajv = new Ajv({ allErrors: true, verbose: true });
    compiledValidator = ajv.compile(SCHEMA);
  }
  return compiledValidator;
}

export function validateLedgerExport(output: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(output);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors: ErrorObject[] = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function validateAndThrow(output: unknown): asserts output is LedgerRecord[] {
  const result = validateLedgerExport(output);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Schema validation failed:\n${errorMessages}`);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `[${e.keyword}] ${e.path}: ${e.message}`);
}
