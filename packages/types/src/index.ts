// Errors
export * from './errors.js';

// Zod schemas and record types
export * from './schemas/index.js';

// Config validation and column mapping
export * from './validation/index.js';

// Pure utils (date, money, constants)
export * from './utils/index.js';

// Statement period
export * from './period/index.js';
