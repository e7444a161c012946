import { z } from 'zod';

const nullableString = z.string().nullable();
const nullableSymbol = z.number().int().nonnegative().nullable();

/**
 * One transaction as written to the JSON ledger export. Field names are the
 * snake_case export names; kind-specific fields are present only on the kinds
 * that carry them.
 */
export const LedgerRecordSchema = z.object({
  type: z.string().min(1),
  statement_account: z.string(),
  parent_statement: nullableString,
  transaction_id: z.number().int().positive(),
  // Older exports wrote the year as a number
  year: z.union([z.string(), z.number().int()]).nullable(),
  account_from: nullableString,
  amount: z.number(),
  date_booked: z.string().regex(/^\d{1,2}\.\s*\d{1,2}\.\s*\d{4}$/, 'Date must be in dd.mm.yyyy format'),
  account_to: nullableString,
  currency: z.string().min(1),
  account_from_name: nullableString,
  sender_note: nullableString,
  variable_symbol: nullableSymbol,
  constant_symbol: nullableSymbol,
  specific_symbol: nullableSymbol,
  all_transaction_lines_text: z.string(),
  user_description: z.string(),
  user_category: z.string(),
  payment_date: nullableString.optional(),
  card_identifier: nullableString.optional(),
  vendor_text: nullableString.optional(),
  card_owner: z.string().optional(),
  our_bank_atm: z.boolean().optional(),
  cash_out_date: z.string().optional(),
  deposit_date: z.string().optional(),
  service_type: z.string().optional(),
});
export type LedgerRecord = z.infer<typeof LedgerRecordSchema>;

export const LedgerDocumentSchema = z.array(z.unknown());

/**
 * Columns a Revolut account CSV export must carry. Extra columns (Product,
 * ...) are kept as they are.
 */
export const REVOLUT_REQUIRED_COLUMNS = [
  'Type',
  'Started Date',
  'Completed Date',
  'Description',
  'Amount',
  'Fee',
  'Currency',
  'State',
  'Balance',
] as const;

export const RevolutRowSchema = z
  .object({
    Type: z.string(),
    'Started Date': z.string(),
    'Completed Date': z.string(),
    Description: z.string(),
    Amount: z.string(),
    Fee: z.string(),
    Currency: z.string(),
    State: z.string(),
    Balance: z.string(),
  })
  .passthrough();
export type RevolutRow = z.infer<typeof RevolutRowSchema>;

export const CardOwnersSchema = z.record(z.string().regex(/^\d{4}$/, 'Card identifier must be 4 digits'), z.string().min(1));
export type CardOwners = z.infer<typeof CardOwnersSchema>;
