import { TRANSFER_LAYOUTS } from './layouts.js';
import { extractOutgoing } from './outgoing-payment.js';
import type { KindDefinition } from './types.js';

// Standing orders
export const outgoingPaymentPeriodic: KindDefinition<'OutgoingPaymentPeriodic'> = {
  kind: 'OutgoingPaymentPeriodic',
  banks: {
    cs: {
      markers: ['Trvalý příkaz'],
      extract: extractOutgoing('OutgoingPaymentPeriodic', TRANSFER_LAYOUTS.cs.OutgoingPaymentPeriodic),
    },
    csob: {
      markers: ['Trvalý příkaz'],
      extract: extractOutgoing('OutgoingPaymentPeriodic', TRANSFER_LAYOUTS.csob.OutgoingPaymentPeriodic),
    },
  },
};
