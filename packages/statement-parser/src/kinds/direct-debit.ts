import { TRANSFER_LAYOUTS } from './layouts.js';
import { extractOutgoing } from './outgoing-payment.js';
import type { KindDefinition } from './types.js';

export const directDebit: KindDefinition<'DirectDebit'> = {
  kind: 'DirectDebit',
  banks: {
    cs: {
      markers: ['Inkaso'],
      extract: extractOutgoing('DirectDebit', TRANSFER_LAYOUTS.cs.DirectDebit),
    },
    csob: {
      markers: ['Inkaso'],
      extract: extractOutgoing('DirectDebit', TRANSFER_LAYOUTS.csob.DirectDebit),
    },
  },
};
