/**
 * Deterministic ID Generation (OFX FITID)
 *
 * Transactions without an ID column get a name-based UUID (version 5)
 * computed from their content, so re-exporting the same CSV yields the
 * same FITIDs and downstream software can skip duplicates.
 */

import { createHash } from 'crypto';
import { formatAmount, formatOfxDate, MAX_DESCRIPTION_LENGTH, type Amount, type RawRow } from '@csv2ofx/types';

/** RFC 4122 DNS namespace */
export const NAMESPACE_DNS = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const UUID_V5_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

/**
 * Name-based UUID, version 5 (SHA-1).
 */
export function uuidV5(name: string, namespace: string): string {
  if (!UUID_PATTERN.test(namespace)) {
    throw new Error(`Invalid namespace UUID: ${namespace}`);
  }

  const bytes = createHash('sha1')
    .update(Buffer.from(namespace.replace(/-/g, ''), 'hex'))
    .update(name, 'utf8')
    .digest()
    .subarray(0, 16);

  bytes.writeUInt8((bytes.readUInt8(6) & 0x0f) | 0x50, 6);
  bytes.writeUInt8((bytes.readUInt8(8) & 0x3f) | 0x80, 8);

  const hex = bytes.toString('hex');
  return [hex.substring(0, 8), hex.substring(8, 12), hex.substring(12, 16), hex.substring(16, 20), hex.substring(20)].join(
    '-'
  );
}

/** Fixed namespace all generated FITIDs hang off. */
export const FITID_NAMESPACE = uuidV5('csv-to-ofx-converter.local', NAMESPACE_DNS);

/**
 * Transaction content the generated ID is derived from.
 */
export interface TransactionIdInput {
  date: Date;
  amount: Amount;
  description: string;
  accountId: string;
  /** Separates otherwise identical transactions, e.g. the occurrence number */
  disambiguator: string;
}

function normalizeDescription(description: string): string {
  return description.trim().toLowerCase().substring(0, MAX_DESCRIPTION_LENGTH);
}

/**
 * Compute a deterministic transaction ID.
 *
 * Canonical string: YYYYMMDD | amount (2 decimals) | description (trimmed,
 * lowercased, max 255) | account id | disambiguator, hashed as a UUID v5
 * under FITID_NAMESPACE. Output is always 36 characters.
 */
export function generateDeterministicId(input: TransactionIdInput): string {
  const canonicalParts = [
    formatOfxDate(input.date),
    formatAmount(input.amount),
    normalizeDescription(input.description),
    input.accountId.trim(),
    input.disambiguator.trim(),
  ];

  return uuidV5(canonicalParts.join('|'), FITID_NAMESPACE);
}

/**
 * Read the ID column when it is mapped and non-blank; otherwise derive the
 * ID from the transaction content.
 */
export function extractOrGenerateId(row: RawRow, idColumn: number | null, input: TransactionIdInput): string {
  if (idColumn !== null) {
    const value = row.fields[idColumn]?.trim() ?? '';
    if (value !== '') {
      return value;
    }
  }
  return generateDeterministicId(input);
}

export function isGeneratedId(id: string): boolean {
  return UUID_V5_PATTERN.test(id);
}
