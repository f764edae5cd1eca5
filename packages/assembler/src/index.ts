export { assembleRecord, duplicateKey, OccurrenceCounter, type AssemblyOptions } from './assembler.js';
export { buildDescription } from './description.js';
export { determineTransactionType, swapTransactionType } from './transaction-type.js';
export {
  generateDeterministicId,
  extractOrGenerateId,
  isGeneratedId,
  uuidV5,
  FITID_NAMESPACE,
  NAMESPACE_DNS,
  type TransactionIdInput,
} from './id-generator.js';
export { calculateBalanceSummary } from './balance.js';
