import { FormatError } from './errors.js';

const NUMERIC_PATTERN = /^[+-]?\d+(\.\d+)?$/;

/**
 * Parse a Czech-formatted statement amount such as "+30 000,00" or
 * "-1 234,56". Thousand separators may be plain, non-breaking or narrow
 * non-breaking spaces.
 */
export function parseAmount(amountText: string): number {
  const cleaned = amountText.replace(/\s/g, '').replace(',', '.');

  if (!NUMERIC_PATTERN.test(cleaned)) {
    throw new FormatError('amount', amountText);
  }

  return roundToTwoDecimals(parseFloat(cleaned));
}

/**
 * Parse an English-formatted amount as printed in Revolut PDF summaries,
 * e.g. "1,234.56 CZK".
 */
export function parseDotDecimalAmount(amountText: string): number {
  const cleaned = amountText.replace(/[A-Z]{3}/g, '').replace(/[,\s]/g, '');

  if (!NUMERIC_PATTERN.test(cleaned)) {
    throw new FormatError('amount', amountText);
  }

  return roundToTwoDecimals(parseFloat(cleaned));
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

/**
 * Render an amount the way Czech spreadsheets expect it: two decimals with a
 * decimal comma and no grouping.
 */
export function formatDecimalComma(amount: number): string {
  return amount.toFixed(2).replace('.', ',');
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}
