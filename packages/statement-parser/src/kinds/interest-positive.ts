import { TRANSFER_LAYOUTS, type TransferLayout } from './layouts.js';
import { pdfBase, readTransfer } from './fields.js';
import type { ExtractionContext, KindDefinition, TransactionInitOf } from './types.js';

function extractInterest(layout: TransferLayout) {
  return (ctx: ExtractionContext): TransactionInitOf<'InterestPositive'> => {
    const base = pdfBase(ctx);
    const { counterparty, amount } = readTransfer(ctx, layout);
    return {
      ...base,
      kind: 'InterestPositive',
      accountFrom: counterparty,
      accountTo: counterparty,
      amount,
    };
  };
}

export const interestPositive: KindDefinition<'InterestPositive'> = {
  kind: 'InterestPositive',
  banks: {
    cs: {
      markers: ['Kreditní úrok'],
      extract: extractInterest(TRANSFER_LAYOUTS.cs.InterestPositive),
    },
    csob: {
      markers: ['Zúčtování kladných úroků'],
      extract: extractInterest(TRANSFER_LAYOUTS.csob.InterestPositive),
    },
  },
};
