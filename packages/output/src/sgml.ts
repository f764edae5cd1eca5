/**
 * OFX 1.0.2 SGML text helpers.
 */

import { MAX_DESCRIPTION_LENGTH } from '@csv2ofx/types';

export const OFX_HEADER_LINES = [
  'OFXHEADER:100',
  'DATA:OFXSGML',
  'VERSION:102',
  'SECURITY:NONE',
  'ENCODING:UTF-8',
  'CHARSET:NONE',
  'COMPRESSION:NONE',
  'OLDFILEUID:NONE',
  'NEWFILEUID:NONE',
] as const;

/**
 * Escape the characters SGML content cannot carry literally.
 */
export function escapeSgml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Truncate string to max length for OFX fields, counting code points so a
 * surrogate pair is never split.
 */
export function truncate(text: string, maxLength: number): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) {
    return text;
  }
  return codePoints.slice(0, maxLength).join('');
}

/**
 * MEMO content: control characters become spaces, the text is cut to 255
 * characters, then escaped.
 */
export function formatMemo(description: string): string {
  // eslint-disable-next-line no-control-regex
  const singleLine = description.replace(/[\u0000-\u001f\u007f]/g, ' ').trim();
  return escapeSgml(truncate(singleLine, MAX_DESCRIPTION_LENGTH));
}

export function element(tag: string, value: string): string {
  return `<${tag}>${value}</${tag}>`;
}
