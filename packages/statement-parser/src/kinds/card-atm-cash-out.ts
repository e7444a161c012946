import { CS_CARD_LAYOUTS } from './layouts.js';
import { pdfBase } from './fields.js';
import { readCsCard } from './card-payment-debit.js';
import type { KindDefinition } from './types.js';

/**
 * ATM withdrawals. ČS inserts a "jiné banky v ČR" line after the marker for
 * other banks' ATMs, which moves the remaining fields one line down.
 */
export const cardAtmCashOut: KindDefinition<'CardAtmCashOut'> = {
  kind: 'CardAtmCashOut',
  banks: {
    cs: {
      markers: ['Výběr hotovosti z bankomatu'],
      extract: (ctx) => {
        const base = pdfBase(ctx);
        const card = readCsCard(ctx, CS_CARD_LAYOUTS.CardAtmCashOut);
        return {
          ...base,
          ...card.fields,
          kind: 'CardAtmCashOut',
          accountFrom: ctx.statementAccount,
          paymentDate: null,
          ourBankAtm: !card.shifted,
          cashOutDate: card.transactionDate,
        };
      },
    },
  },
};
