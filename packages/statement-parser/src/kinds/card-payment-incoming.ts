import { CS_CARD_LAYOUTS, CSOB_CARD_LAYOUTS } from './layouts.js';
import { pdfBase } from './fields.js';
import { readCsCard, readCsobCard } from './card-payment-debit.js';
import type { KindDefinition } from './types.js';

// Card refunds and other card credits
export const cardPaymentIncoming: KindDefinition<'CardPaymentIncoming'> = {
  kind: 'CardPaymentIncoming',
  banks: {
    cs: {
      markers: ['Vratka platby kartou'],
      extract: (ctx) => {
        const base = pdfBase(ctx);
        const card = readCsCard(ctx, CS_CARD_LAYOUTS.CardPaymentIncoming);
        return {
          ...base,
          ...card.fields,
          kind: 'CardPaymentIncoming',
          accountTo: ctx.statementAccount,
          paymentDate: card.transactionDate,
        };
      },
    },
    csob: {
      markers: ['Příchozí úhrada kartou'],
      extract: (ctx) => {
        const base = pdfBase(ctx);
        const card = readCsobCard(ctx, CSOB_CARD_LAYOUTS.CardPaymentIncoming);
        return { ...base, ...card, kind: 'CardPaymentIncoming', accountTo: ctx.statementAccount };
      },
    },
  },
};
