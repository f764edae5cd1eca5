export {
  validateConversionConfig,
  parseConversionConfig,
  resolveColumnMapping,
  validateColumnMapping,
  type ConfigValidationError,
  type ConfigValidationResult,
  type ColumnNameMapping,
} from './config-validator.js';
