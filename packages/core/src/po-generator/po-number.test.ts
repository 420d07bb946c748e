import { describe, it, expect } from 'vitest';
import { formatPoNumber } from './po-number.js';

describe('formatPoNumber', () => {
  it('should combine prefix, UTC date and a padded sequence', () => {
    expect(formatPoNumber('PO', new Date('2026-03-02T23:30:00Z'), 42)).toBe('PO-20260302-000042');
  });

  it('should not truncate sequences wider than six digits', () => {
    expect(formatPoNumber('ACME', new Date('2026-12-31T00:00:00Z'), 1234567)).toBe('ACME-20261231-1234567');
  });
});
