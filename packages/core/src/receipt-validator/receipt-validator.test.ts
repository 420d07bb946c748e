import { describe, it, expect } from 'vitest';
import { ReceiptValidator, parseReceiptLines } from './receipt-validator.js';
import { ValidationError } from '../shared/errors.js';
import type { PurchaseOrder } from '../domain/types.js';

const po: PurchaseOrder = {
  id: 'po-1',
  request_id: 'req-1',
  po_number: 'PO-20260302-000001',
  sequence: 1,
  requester_id: 'alice',
  approved_by: { level_1: 'bob', level_2: 'carol' },
  lines: [
    { line_number: 1, description: 'Pens', quantity: 10, unit_price: 2, line_total: 20 },
    { line_number: 2, description: 'Printer paper', quantity: 5, unit_price: 4.5, line_total: 22.5 },
  ],
  total_amount: 42.5,
  document_ref: null,
  generated_at: new Date('2026-03-02T09:00:00Z'),
};

describe('ReceiptValidator', () => {
  const exact = new ReceiptValidator();

  it('should accept a receipt that matches the order', () => {
    const result = exact.validate(po, [
      { description: 'pens', quantity: 10, unit_price: 2 },
      { line_number: 2, description: 'Paper A4', quantity: 5, unit_price: 4.5 },
    ]);

    expect(result).toEqual({ ok: true, po_id: 'po-1', po_number: 'PO-20260302-000001', discrepancies: [] });
  });

  it('should flag over delivery', () => {
    const result = exact.validate(po, [
      { line_number: 1, description: 'Pens', quantity: 12, unit_price: 2 },
      { line_number: 2, description: 'Printer paper', quantity: 5, unit_price: 4.5 },
    ]);

    expect(result.ok).toBe(false);
    expect(result.discrepancies).toEqual([
      {
        kind: 'over_delivery',
        line_number: 1,
        description: 'Pens',
        expected_quantity: 10,
        received_quantity: 12,
        expected_unit_price: 2,
        received_unit_price: null,
      },
    ]);
  });

  it('should flag missing, short and unexpected lines', () => {
    const result = exact.validate(po, [
      { line_number: 1, description: 'Pens', quantity: 7, unit_price: 2 },
      { description: 'Staples', quantity: 1, unit_price: 3 },
    ]);

    expect(result.discrepancies.map((d) => [d.kind, d.line_number, d.description])).toEqual([
      ['unexpected_item', null, 'Staples'],
      ['under_delivery', 1, 'Pens'],
      ['missing_item', 2, 'Printer paper'],
    ]);
    expect(result.discrepancies[2].received_quantity).toBe(0);
  });

  it('should flag a price mismatch per received price', () => {
    const result = exact.validate(po, [
      { line_number: 1, description: 'Pens', quantity: 6, unit_price: 2 },
      { line_number: 1, description: 'Pens', quantity: 4, unit_price: 2.2 },
      { line_number: 2, description: 'Printer paper', quantity: 5, unit_price: 4.5 },
    ]);

    expect(result.discrepancies).toEqual([
      {
        kind: 'price_mismatch',
        line_number: 1,
        description: 'Pens',
        expected_quantity: 10,
        received_quantity: 10,
        expected_unit_price: 2,
        received_unit_price: 2.2,
      },
    ]);
  });

  it('should honour quantity and price tolerances', () => {
    const lenient = new ReceiptValidator({ quantity: 1, price: 0.1 });

    const result = lenient.validate(po, [
      { line_number: 1, description: 'Pens', quantity: 11, unit_price: 2.2 },
      { line_number: 2, description: 'Printer paper', quantity: 3, unit_price: 4.5 },
    ]);

    expect(result.discrepancies.map((d) => d.kind)).toEqual(['under_delivery']);
  });

  it('should refuse negative tolerances', () => {
    expect(() => new ReceiptValidator({ quantity: -1 })).toThrow('receipt tolerances must be non-negative');
  });
});

describe('parseReceiptLines', () => {
  it('should require at least one line', () => {
    expect(() => parseReceiptLines([])).toThrow('lines: a receipt needs at least one line');
  });

  it('should name the offending field', () => {
    try {
      parseReceiptLines([{ description: 'Pens', quantity: -2, unit_price: 2 }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe('lines.0.quantity');
      }
    }
  });

  it('should keep optional line numbers', () => {
    expect(parseReceiptLines([{ line_number: 2, description: 'Paper', quantity: 1, unit_price: 4.5 }])).toEqual([
      { line_number: 2, description: 'Paper', quantity: 1, unit_price: 4.5 },
    ]);
  });
});

describe('ReceiptValidator with repeated descriptions', () => {
  const twoPensLines: PurchaseOrder = {
    ...po,
    lines: [
      { line_number: 1, description: 'Pens', quantity: 10, unit_price: 2, line_total: 20 },
      { line_number: 2, description: 'Pens', quantity: 10, unit_price: 2, line_total: 20 },
    ],
    total_amount: 40,
  };
  const validator = new ReceiptValidator();

  it('should give each unnumbered receipt line its own order line', () => {
    const result = validator.validate(twoPensLines, [
      { description: 'Pens', quantity: 10, unit_price: 2 },
      { description: 'Pens', quantity: 10, unit_price: 2 },
    ]);

    expect(result.ok).toBe(true);
    expect(result.discrepancies).toEqual([]);
  });

  it('should leave numbered lines to their own order line', () => {
    const result = validator.validate(twoPensLines, [
      { description: 'Pens', quantity: 10, unit_price: 2 },
      { line_number: 1, description: 'Pens', quantity: 10, unit_price: 2 },
    ]);

    expect(result.ok).toBe(true);
  });

  it('should add surplus lines to the first order line once all are claimed', () => {
    const result = validator.validate(twoPensLines, [
      { description: 'Pens', quantity: 10, unit_price: 2 },
      { description: 'Pens', quantity: 10, unit_price: 2 },
      { description: 'Pens', quantity: 5, unit_price: 2 },
    ]);

    expect(result.discrepancies.map((d) => [d.kind, d.line_number, d.received_quantity])).toEqual([
      ['over_delivery', 1, 15],
    ]);
  });
});

describe('ReceiptValidator price precision', () => {
  it('should flag a sub-cent price difference under exact matching', () => {
    const result = new ReceiptValidator().validate(po, [
      { line_number: 1, description: 'Pens', quantity: 10, unit_price: 2.004 },
      { line_number: 2, description: 'Printer paper', quantity: 5, unit_price: 4.5 },
    ]);

    expect(result.ok).toBe(false);
    expect(result.discrepancies.map((d) => [d.kind, d.line_number, d.received_unit_price])).toEqual([
      ['price_mismatch', 1, 2.004],
    ]);
  });

  it('should refuse receipt prices with more than two decimals', () => {
    expect(() => parseReceiptLines([{ description: 'Pens', quantity: 10, unit_price: 2.004 }])).toThrow(
      'lines.0.unit_price: unit_price must have at most two decimal places',
    );
  });
});
