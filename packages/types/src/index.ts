// Types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Validation (AJV + reconciliation)
export * from './validation/index.js';

// Pure utils (date, money, line scans, errors, constants)
export * from './utils/index.js';
