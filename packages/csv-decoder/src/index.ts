export { decodeCsv } from './decoder.js';
export { normalizeAmount } from './amount-normalizer.js';
