// Transaction kinds and their per-bank marker rules
export {
  KIND_PRECEDENCE,
  matchKind,
  markersFor,
  findMarkerOverlaps,
  createCardOwnerLookup,
  unknownCardOwners,
  resolveServiceType,
  TRANSFER_LAYOUTS,
  CS_CARD_LAYOUTS,
  CSOB_CARD_LAYOUTS,
  CS_DEPOSIT_LAYOUT,
  CS_SERVICE_TYPES,
  CSOB_SERVICE_TYPES,
  type KindMatch,
  type MarkerOverlap,
  type CardOwnerLookup,
  type ExtractionContext,
  type KindDefinition,
  type BankRule,
} from './kinds/index.js';

// Segmentation engine
export {
  SegmentationEngine,
  segmentPages,
  type SegmentationOptions,
  type SegmentationState,
} from './engine/segmentation-engine.js';

// CSV path
export { parseStatementCsv, readCsvRows } from './csv/csv-reader.js';
export {
  CSV_KIND_RULES,
  resolveCsvKind,
  isCompletedRow,
  resolveCsvCurrency,
  readCsvStatementInfo,
  extractCsvTransactions,
  type CsvStatementInfo,
  type CsvStatementOptions,
  type CsvExtractionOptions,
  type CsvExtractionResult,
} from './csv/csv-statement.js';

// Statement account
export {
  detectBank,
  findAccountNumber,
  findOpeningBalance,
  findClosingBalance,
  findStatementYear,
  readStatementInfo,
  type StatementInfo,
} from './statement/statement-info.js';
export {
  defaultReaders,
  polarityWarnings,
  parsePdfStatement,
  parseCsvStatement,
  loadStatement,
  type StatementReaders,
  type StatementParseOptions,
  type LoadStatementOptions,
} from './statement/statement-account.js';

// Ledger registry
export { SequentialIdAllocator } from './ledger/id-allocator.js';
export { StatementLedger } from './ledger/ledger.js';

// Batch processor
export {
  processStatements,
  type ParseError,
  type BatchProcessResult,
  type BatchProcessOptions,
} from './batch-processor.js';

// Directory scanner
export {
  scanDirectoryForStatements,
  validateDirectory,
  type StatementFileInfo,
  type StatementFileKind,
  type ScanResult,
} from './directory-scanner.js';
