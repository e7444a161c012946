export {
  validateLedgerExport,
  validateAndThrow,
  formatValidationErrors,
} from './ajv-validator.js';
export type { ValidationResult, ValidationError } from './ajv-validator.js';

export {
  validateReconciliation,
  reconcileStatement,
  formatReconciliationResult,
} from './reconciliation.js';
export type { ReconciliationResult } from './reconciliation.js';
