/**
 * Output module - ledger exports and their re-import.
 */

export {
  LEGACY_KIND_ALIASES,
  resolveRecordKind,
  toLedgerRecord,
  fromLedgerRecord,
} from './ledger-record.js';

export { JSON_INDENT, toLedgerDocument, exportJson } from './json-exporter.js';

export {
  CSV_COLUMNS,
  CSV_DELIMITER,
  CSV_LINE_END,
  UTF8_BOM,
  escapeCsvValue,
  exportTypeLabel,
  exportCsv,
} from './csv-exporter.js';

export {
  readLedgerJson,
  loadLedgerHistory,
  type SkippedRecord,
  type LedgerReadResult,
  type LedgerHistory,
} from './ledger-reader.js';

export {
  JSON_EXPORT_FILE,
  CSV_EXPORT_FILE,
  writeLedgerExports,
  type WrittenExports,
} from './export-files.js';
