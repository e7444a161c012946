export {
  LedgerRecordSchema,
  LedgerDocumentSchema,
  RevolutRowSchema,
  CardOwnersSchema,
  REVOLUT_REQUIRED_COLUMNS,
} from './ledger-record.js';

export type { LedgerRecord, RevolutRow, CardOwners } from './ledger-record.js';
