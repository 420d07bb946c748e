import { describe, it, expect } from 'vitest';
import { evaluateCondition } from './condition-evaluator.js';

describe('ConditionEvaluator', () => {
  describe('eq / neq', () => {
    it('should match equal values', () => {
      expect(evaluateCondition({ field: 'item_count', operator: 'eq', value: 0 }, { item_count: 0 })).toBe(true);
      expect(evaluateCondition({ field: 'item_count', operator: 'eq', value: 0 }, { item_count: 2 })).toBe(false);
    });

    it('should invert with neq', () => {
      expect(evaluateCondition({ field: 'source', operator: 'neq', value: 'manual' }, { source: 'proforma' })).toBe(true);
      expect(evaluateCondition({ field: 'source', operator: 'neq', value: 'manual' }, { source: 'manual' })).toBe(false);
    });
  });

  describe('not_empty operator', () => {
    it('should return true for non-empty string', () => {
      expect(evaluateCondition({ field: 'title', operator: 'not_empty' }, { title: 'Pens' })).toBe(true);
    });

    it('should return false for empty string, null and missing values', () => {
      expect(evaluateCondition({ field: 'title', operator: 'not_empty' }, { title: '' })).toBe(false);
      expect(evaluateCondition({ field: 'title', operator: 'not_empty' }, { title: null })).toBe(false);
      expect(evaluateCondition({ field: 'title', operator: 'not_empty' }, {})).toBe(false);
    });

    it('should treat an empty array as empty', () => {
      expect(evaluateCondition({ field: 'items', operator: 'not_empty' }, { items: [] })).toBe(false);
      expect(evaluateCondition({ field: 'items', operator: 'not_empty' }, { items: [1] })).toBe(true);
    });
  });

  describe('in / not_in', () => {
    it('should check membership', () => {
      const condition = { field: 'source', operator: 'in' as const, value: ['manual', 'proforma'] };
      expect(evaluateCondition(condition, { source: 'proforma' })).toBe(true);
      expect(evaluateCondition(condition, { source: 'email' })).toBe(false);
    });

    it('should be false for not_in when the value is listed', () => {
      expect(
        evaluateCondition({ field: 'source', operator: 'not_in', value: ['manual'] }, { source: 'manual' }),
      ).toBe(false);
    });

    it('should be false when the rule value is not a list', () => {
      expect(evaluateCondition({ field: 'source', operator: 'in', value: 'manual' }, { source: 'manual' })).toBe(false);
    });
  });

  describe('exists operator', () => {
    it('should treat null as present and undefined as absent', () => {
      expect(evaluateCondition({ field: 'description', operator: 'exists' }, { description: null })).toBe(true);
      expect(evaluateCondition({ field: 'description', operator: 'exists' }, {})).toBe(false);
    });
  });

  describe('numeric comparisons', () => {
    it('should compare numbers', () => {
      expect(evaluateCondition({ field: 'total_amount', operator: 'gt', value: 1000 }, { total_amount: 1000.01 })).toBe(true);
      expect(evaluateCondition({ field: 'total_amount', operator: 'gte', value: 1000 }, { total_amount: 1000 })).toBe(true);
      expect(evaluateCondition({ field: 'total_amount', operator: 'lt', value: 1000 }, { total_amount: 1000 })).toBe(false);
      expect(evaluateCondition({ field: 'total_amount', operator: 'lte', value: 1000 }, { total_amount: 1000 })).toBe(true);
    });

    it('should not coerce strings', () => {
      expect(evaluateCondition({ field: 'total_amount', operator: 'gt', value: 10 }, { total_amount: '20' })).toBe(false);
    });
  });

  describe('matches operator', () => {
    it('should test a regular expression', () => {
      expect(evaluateCondition({ field: 'title', operator: 'matches', value: '^URGENT' }, { title: 'URGENT toner' })).toBe(true);
      expect(evaluateCondition({ field: 'title', operator: 'matches', value: '^URGENT' }, { title: 'toner' })).toBe(false);
    });

    it('should return false for an invalid pattern', () => {
      expect(evaluateCondition({ field: 'title', operator: 'matches', value: '(' }, { title: '(' })).toBe(false);
    });
  });

  describe('nested field paths', () => {
    it('should resolve dot-separated paths', () => {
      expect(
        evaluateCondition(
          { field: 'proforma.vendor_name', operator: 'eq', value: 'Acme Supplies' },
          { proforma: { vendor_name: 'Acme Supplies' } },
        ),
      ).toBe(true);
    });

    it('should return undefined for a missing intermediate path', () => {
      expect(evaluateCondition({ field: 'proforma.vendor_name', operator: 'exists' }, { title: 'Pens' })).toBe(false);
    });
  });
});
