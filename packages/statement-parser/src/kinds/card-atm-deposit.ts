import { CS_DEPOSIT_LAYOUT } from './layouts.js';
import { pdfBase, readSymbol, scanAmount } from './fields.js';
import type { KindDefinition } from './types.js';

export const cardAtmDeposit: KindDefinition<'CardAtmDeposit'> = {
  kind: 'CardAtmDeposit',
  banks: {
    cs: {
      markers: ['Vklad hotovosti přes bankomat'],
      extract: (ctx) => {
        const base = pdfBase(ctx);
        const variableSymbol = readSymbol(ctx, CS_DEPOSIT_LAYOUT.variableSymbol, 'variable symbol');
        const amount = scanAmount(ctx);
        const constantSymbol = readSymbol(ctx, CS_DEPOSIT_LAYOUT.constantSymbol, 'constant symbol');
        return {
          ...base,
          kind: 'CardAtmDeposit',
          accountFrom: ctx.statementAccount,
          accountTo: ctx.statementAccount,
          amount,
          variableSymbol,
          constantSymbol,
          depositDate: base.dateBooked,
        };
      },
    },
  },
};
