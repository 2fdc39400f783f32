import { describe, it, expect } from 'vitest';
import {
  documentNumberPattern,
  formatDocumentNumber,
  nextDocumentNumber,
  parseDocumentNumber,
} from '../documentNumbers';

describe('formatDocumentNumber', () => {
  it('pads the sequence to three digits', () => {
    expect(formatDocumentNumber('PO', 2026, 7)).toBe('PO-2026-007');
    expect(formatDocumentNumber('RA', 2026, 42)).toBe('RA-2026-042');
  });

  it('keeps longer sequences intact', () => {
    expect(formatDocumentNumber('JOB', 2026, 1234)).toBe('JOB-2026-1234');
  });
});

describe('parseDocumentNumber', () => {
  it('splits a well-formed number', () => {
    expect(parseDocumentNumber('RA-2025-019')).toEqual({ prefix: 'RA', year: 2025, sequence: 19 });
  });

  it('returns null for anything else', () => {
    expect(parseDocumentNumber('PO-26-001')).toBeNull();
    expect(parseDocumentNumber('INV-2026-001')).toBeNull();
    expect(parseDocumentNumber('PO-2026-01')).toBeNull();
    expect(parseDocumentNumber('JOB-TEST-1')).toBeNull();
  });
});

describe('documentNumberPattern', () => {
  it('builds a LIKE pattern for the year', () => {
    expect(documentNumberPattern('PO', 2026)).toBe('PO-2026-%');
  });
});

describe('nextDocumentNumber', () => {
  it('starts at 001', () => {
    expect(nextDocumentNumber('PO', 2026, [])).toBe('PO-2026-001');
  });

  it('continues after the highest issued number, not the count', () => {
    expect(nextDocumentNumber('PO', 2026, ['PO-2026-001', 'PO-2026-009', 'PO-2026-003'])).toBe('PO-2026-010');
  });

  it('ignores other years, other prefixes and hand-entered numbers', () => {
    expect(
      nextDocumentNumber('RA', 2026, ['RA-2025-050', 'PO-2026-020', 'RA-2026-002', 'RA-2026-SPECIAL'])
    ).toBe('RA-2026-003');
  });

  it('never reuses a number counted as issued', () => {
    expect(nextDocumentNumber('RA', 2026, [], 2)).toBe('RA-2026-003');
    expect(nextDocumentNumber('RA', 2026, ['RA-2026-005'], 2)).toBe('RA-2026-006');
  });
});
