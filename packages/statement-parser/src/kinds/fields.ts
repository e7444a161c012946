/**
 * Field readers shared by the extraction rules. Every read goes through
 * {@link lineAt}, so a layout that points past the page fails loudly instead
 * of producing an empty field.
 */

import {
  FormatError,
  OffsetOutOfRangeError,
  baseDefaults,
  extractEmbeddedDate,
  findAccountNumberLine,
  findAmountLine,
  normalizeBookingDate,
  parseAmount,
  UNKNOWN_CARD_OWNER,
  type TransactionBaseInit,
} from '@ledgerline/types';
import type { AmountSource, CounterpartySource, TransferLayout } from './layouts.js';
import type { CardOwnerLookup, ExtractionContext } from './types.js';

const SYMBOL_PATTERN = /^\d+$/;

export function lineAt(ctx: ExtractionContext, offset: number, what: string): string {
  const index = ctx.lineIndex + offset;
  const line = index >= 0 ? ctx.lines[index] : undefined;
  if (line === undefined) {
    throw new OffsetOutOfRangeError(what, index, ctx.lines.length);
  }
  return line;
}

/**
 * Booking date of the entry: a date printed on the marker line, otherwise the
 * line before it. ČSOB prints that line without the year.
 */
export function readBookingDate(ctx: ExtractionContext): string {
  const embedded = extractEmbeddedDate(lineAt(ctx, 0, 'marker'));
  if (embedded !== null) {
    return normalizeBookingDate(embedded);
  }

  const previous = lineAt(ctx, -1, 'booking date').trim();
  if (ctx.bank === 'csob') {
    return normalizeBookingDate(previous + (ctx.year ?? ''));
  }
  return normalizeBookingDate(previous);
}

export function readAmountAt(ctx: ExtractionContext, offset: number): number {
  return parseAmount(lineAt(ctx, offset, 'amount').trim());
}

export function scanAmount(ctx: ExtractionContext): number {
  const match = findAmountLine(ctx.lines, ctx.lineIndex);
  if (match === null) {
    throw new OffsetOutOfRangeError('amount', ctx.lines.length, ctx.lines.length);
  }
  return parseAmount(match.line.trim());
}

/**
 * Counterparty account line found by scanning from the marker, with its
 * offset from the marker line.
 */
export function scanAccount(ctx: ExtractionContext): { account: string; offset: number } {
  const match = findAccountNumberLine(ctx.lines, ctx.lineIndex);
  if (match === null) {
    throw new OffsetOutOfRangeError('account number', ctx.lines.length, ctx.lines.length);
  }
  return { account: match.line, offset: match.relativeIndex };
}

export function readSymbol(ctx: ExtractionContext, offset: number, field: string): number {
  const text = lineAt(ctx, offset, field).trim();
  if (!SYMBOL_PATTERN.test(text)) {
    throw new FormatError(field, text);
  }
  return parseInt(text, 10);
}

export function readTrimmed(ctx: ExtractionContext, offset: number, what: string): string {
  return lineAt(ctx, offset, what).trim();
}

/**
 * Resolve the amount and the counterparty account of a transfer-like entry.
 */
export function readTransfer(
  ctx: ExtractionContext,
  layout: TransferLayout
): { counterparty: string | null; amount: number } {
  const { counterparty, accountOffset } = readCounterparty(ctx, layout.counterparty);
  const amount = readAmount(ctx, layout.amount, accountOffset);
  return { counterparty, amount };
}

function readCounterparty(
  ctx: ExtractionContext,
  source: CounterpartySource
): { counterparty: string | null; accountOffset: number | null } {
  switch (source.from) {
    case 'offset': {
      const shift =
        source.shiftWhen !== undefined && lineAt(ctx, source.offset, 'counterparty').includes(source.shiftWhen)
          ? 1
          : 0;
      return { counterparty: readTrimmed(ctx, source.offset + shift, 'counterparty'), accountOffset: null };
    }
    case 'account': {
      const { account, offset } = scanAccount(ctx);
      return { counterparty: account, accountOffset: offset };
    }
    case 'statement':
      return { counterparty: ctx.statementAccount, accountOffset: null };
    case 'none':
      return { counterparty: null, accountOffset: null };
  }
}

function readAmount(ctx: ExtractionContext, source: AmountSource, accountOffset: number | null): number {
  switch (source.from) {
    case 'scan':
      return scanAmount(ctx);
    case 'offset':
      return readAmountAt(ctx, source.offset);
    case 'account': {
      const base = accountOffset ?? scanAccount(ctx).offset;
      return readAmountAt(ctx, base + source.offset);
    }
  }
}

/**
 * Split a ČS card line ("XXXXXXXXXXXX1234 ... d.tran.05.03.2023") into the
 * card identifier and the card transaction date.
 */
export function parseCsCardLine(line: string): { cardIdentifier: string; transactionDate: string } {
  const tokens = line.trim().split(' ');
  const first = tokens[0] ?? '';
  const last = tokens[tokens.length - 1] ?? '';
  return {
    cardIdentifier: first.replace(/X/g, '').slice(-4),
    transactionDate: last.replace('d.tran.', ''),
  };
}

export function lastToken(line: string): string {
  const tokens = line.trim().split(' ');
  return tokens[tokens.length - 1] ?? '';
}

/**
 * Common fields of a PDF transaction: owning statement and booking date.
 */
export function pdfBase(ctx: ExtractionContext): TransactionBaseInit {
  return {
    ...baseDefaults(ctx.statementAccount, ctx.parentStatement, ctx.year),
    dateBooked: readBookingDate(ctx),
  };
}

export function createCardOwnerLookup(owners: Readonly<Record<string, string>>): CardOwnerLookup {
  return (cardIdentifier) => {
    if (cardIdentifier === null) {
      return UNKNOWN_CARD_OWNER;
    }
    return owners[cardIdentifier] ?? UNKNOWN_CARD_OWNER;
  };
}

export const unknownCardOwners: CardOwnerLookup = () => UNKNOWN_CARD_OWNER;
