/**
 * Document number utilities
 * Sequential, year-scoped numbers in format: {PREFIX}-{YYYY}-{NNN}
 */

export type DocumentPrefix = 'PO' | 'RA' | 'JOB';

const DOCUMENT_NUMBER_PATTERN = /^(PO|RA|JOB)-(\d{4})-(\d{3,})$/;

/**
 * Format a document number
 * @example
 * formatDocumentNumber('PO', 2026, 7) // Returns 'PO-2026-007'
 */
export function formatDocumentNumber(prefix: DocumentPrefix, year: number, sequence: number): string {
  return `${prefix}-${year}-${String(sequence).padStart(3, '0')}`;
}

/**
 * Parse a document number into its components
 * @returns null when the value does not follow the {PREFIX}-{YYYY}-{NNN} format
 */
export function parseDocumentNumber(
  value: string
): { prefix: DocumentPrefix; year: number; sequence: number } | null {
  const match = DOCUMENT_NUMBER_PATTERN.exec(value);
  if (!match) return null;

  const [, prefix, year, sequence] = match;
  if (prefix !== 'PO' && prefix !== 'RA' && prefix !== 'JOB') return null;
  return { prefix, year: Number(year), sequence: Number(sequence) };
}

/** LIKE pattern selecting every number issued for a prefix in a given year */
export function documentNumberPattern(prefix: DocumentPrefix, year: number): string {
  return `${prefix}-${year}-%`;
}

/**
 * Next number in sequence, one above the highest number already issued that year.
 * Hand-entered numbers that do not follow the format are ignored.
 * `issuedCount` covers numbers whose documents were since deleted; the sequence never drops below it.
 */
export function nextDocumentNumber(
  prefix: DocumentPrefix,
  year: number,
  existing: readonly string[],
  issuedCount = 0
): string {
  let highest = issuedCount;
  for (const value of existing) {
    const parsed = parseDocumentNumber(value);
    if (parsed && parsed.prefix === prefix && parsed.year === year && parsed.sequence > highest) {
      highest = parsed.sequence;
    }
  }
  return formatDocumentNumber(prefix, year, highest + 1);
}
