import { TRANSFER_LAYOUTS, type TransferLayout } from './layouts.js';
import { pdfBase, readTransfer } from './fields.js';
import type { ExtractionContext, KindDefinition, TransactionInitOf } from './types.js';

/**
 * Outgoing transfers: the statement account pays the counterparty.
 */
export function extractOutgoing<K extends 'OutgoingPayment' | 'OutgoingPaymentPeriodic' | 'DirectDebit'>(
  kind: K,
  layout: TransferLayout
) {
  return (ctx: ExtractionContext) => {
    const base = pdfBase(ctx);
    const { counterparty, amount } = readTransfer(ctx, layout);
    return {
      ...base,
      kind,
      accountFrom: ctx.statementAccount,
      accountTo: counterparty,
      amount,
    };
  };
}

export const outgoingPayment: KindDefinition<'OutgoingPayment'> = {
  kind: 'OutgoingPayment',
  banks: {
    cs: {
      markers: ['Tuzemská odchozí úhrada'],
      extract: extractOutgoing('OutgoingPayment', TRANSFER_LAYOUTS.cs.OutgoingPayment),
    },
    csob: {
      markers: ['Odchozí úhrada'],
      extract: extractOutgoing('OutgoingPayment', TRANSFER_LAYOUTS.csob.OutgoingPayment),
    },
  },
};
