/**
 * Output module - renders assembled records as an OFX statement.
 */

export { StatementSerializer, type GenerateOptions } from './ofx-serializer.js';
export { OFX_HEADER_LINES, escapeSgml, formatMemo, truncate } from './sgml.js';
