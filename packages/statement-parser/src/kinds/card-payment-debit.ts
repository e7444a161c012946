import { CS_CARD_LAYOUTS, CSOB_CARD_LAYOUTS, type CsCardLayout, type CsobCardLayout } from './layouts.js';
import {
  lastToken,
  lineAt,
  parseCsCardLine,
  pdfBase,
  readAmountAt,
  readSymbol,
  readTrimmed,
  scanAmount,
} from './fields.js';
import type { ExtractionContext, KindDefinition } from './types.js';

/**
 * Card fields read from a ČS card entry. `shift` moves every offset down by
 * one when the layout's `shiftWhen` text follows the marker line.
 */
export function readCsCard(ctx: ExtractionContext, layout: CsCardLayout) {
  const shift =
    layout.shiftWhen !== undefined && lineAt(ctx, 1, 'card entry').includes(layout.shiftWhen) ? 1 : 0;
  const variableSymbol = readSymbol(ctx, layout.variableSymbol + shift, 'variable symbol');
  const amount = scanAmount(ctx);
  const constantSymbol = readSymbol(ctx, layout.constantSymbol + shift, 'constant symbol');
  const specificSymbol = readSymbol(ctx, layout.specificSymbol + shift, 'specific symbol');
  const { cardIdentifier, transactionDate } = parseCsCardLine(lineAt(ctx, layout.cardLine + shift, 'card line'));
  const vendorText = readTrimmed(ctx, layout.vendor + shift, 'vendor text');

  return {
    fields: {
      amount,
      variableSymbol,
      constantSymbol,
      specificSymbol,
      cardIdentifier,
      vendorText,
      cardOwner: ctx.cardOwners(cardIdentifier),
    },
    transactionDate,
    shifted: shift === 1,
  };
}

export function readCsobCard(ctx: ExtractionContext, layout: CsobCardLayout) {
  const amount = layout.amount.from === 'offset' ? readAmountAt(ctx, layout.amount.offset) : scanAmount(ctx);
  const variableSymbol = readSymbol(ctx, layout.variableSymbol, 'variable symbol');
  const constantSymbol = readSymbol(ctx, layout.constantSymbol, 'constant symbol');
  const specificSymbol = readSymbol(ctx, layout.specificSymbol, 'specific symbol');
  const cardIdentifier = readTrimmed(ctx, layout.cardIdentifier, 'card identifier').slice(-4);
  const paymentDate = lastToken(lineAt(ctx, layout.paymentDate, 'payment date'));
  const vendorText = layout.vendor.map((offset) => readTrimmed(ctx, offset, 'vendor text')).join('');

  return {
    amount,
    variableSymbol,
    constantSymbol,
    specificSymbol,
    cardIdentifier,
    paymentDate,
    vendorText,
    cardOwner: ctx.cardOwners(cardIdentifier),
  };
}

export const cardPaymentDebit: KindDefinition<'CardPaymentDebit'> = {
  kind: 'CardPaymentDebit',
  banks: {
    cs: {
      markers: ['Platba kartou'],
      extract: (ctx) => {
        const base = pdfBase(ctx);
        const card = readCsCard(ctx, CS_CARD_LAYOUTS.CardPaymentDebit);
        return {
          ...base,
          ...card.fields,
          kind: 'CardPaymentDebit',
          accountFrom: ctx.statementAccount,
          paymentDate: card.transactionDate,
        };
      },
    },
    csob: {
      markers: ['Transakce platební kartou'],
      extract: (ctx) => {
        const base = pdfBase(ctx);
        const card = readCsobCard(ctx, CSOB_CARD_LAYOUTS.CardPaymentDebit);
        return { ...base, ...card, kind: 'CardPaymentDebit', accountFrom: ctx.statementAccount };
      },
    },
  },
};
