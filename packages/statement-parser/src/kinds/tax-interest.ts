import { TRANSFER_LAYOUTS } from './layouts.js';
import { pdfBase, readTransfer } from './fields.js';
import type { KindDefinition } from './types.js';

// Withholding tax on credited interest, printed only by ČS
export const taxInterest: KindDefinition<'TaxInterest'> = {
  kind: 'TaxInterest',
  banks: {
    cs: {
      markers: ['Daň z úroku'],
      extract: (ctx) => {
        const base = pdfBase(ctx);
        const { amount } = readTransfer(ctx, TRANSFER_LAYOUTS.cs.TaxInterest);
        return { ...base, kind: 'TaxInterest', accountFrom: ctx.statementAccount, amount };
      },
    },
  },
};
