import { TRANSFER_LAYOUTS } from './layouts.js';
import { pdfBase, readTransfer } from './fields.js';
import type { KindDefinition } from './types.js';

/**
 * ČSOB internet banking transfers go either way; the sign of the amount
 * decides which side the statement account is on.
 */
export const electronicBankingTransfer: KindDefinition<'ElectronicBankingTransfer'> = {
  kind: 'ElectronicBankingTransfer',
  banks: {
    csob: {
      markers: ['Bezhotovostní převod EB'],
      extract: (ctx) => {
        const base = pdfBase(ctx);
        const { counterparty, amount } = readTransfer(ctx, TRANSFER_LAYOUTS.csob.ElectronicBankingTransfer);
        const outgoing = amount < 0;
        return {
          ...base,
          kind: 'ElectronicBankingTransfer',
          accountFrom: outgoing ? ctx.statementAccount : counterparty,
          accountTo: outgoing ? counterparty : ctx.statementAccount,
          amount,
        };
      },
    },
  },
};
