import { TRANSFER_LAYOUTS, type TransferLayout } from './layouts.js';
import { pdfBase, readTransfer } from './fields.js';
import type { ExtractionContext, KindDefinition, TransactionInitOf } from './types.js';

function extractIncoming(layout: TransferLayout) {
  return (ctx: ExtractionContext): TransactionInitOf<'IncomingPayment'> => {
    const base = pdfBase(ctx);
    const { counterparty, amount } = readTransfer(ctx, layout);
    return {
      ...base,
      kind: 'IncomingPayment',
      accountFrom: counterparty,
      accountTo: ctx.statementAccount,
      amount,
    };
  };
}

export const incomingPayment: KindDefinition<'IncomingPayment'> = {
  kind: 'IncomingPayment',
  banks: {
    cs: {
      markers: ['Příchozí úhrada', 'Zahraniční příchozí úhrada'],
      extract: extractIncoming(TRANSFER_LAYOUTS.cs.IncomingPayment),
    },
    csob: {
      markers: ['Příchozí úhrada'],
      extract: extractIncoming(TRANSFER_LAYOUTS.csob.IncomingPayment),
    },
  },
};
