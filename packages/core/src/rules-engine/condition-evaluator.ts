import type { Condition } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function getFieldValue(data: Record<string, unknown>, fieldPath: string): unknown {
  let current: unknown = data;
  for (const part of fieldPath.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function compareNumbers(
  value: unknown,
  expected: unknown,
  compare: (a: number, b: number) => boolean,
): boolean {
  return typeof value === 'number' && typeof expected === 'number' && compare(value, expected);
}

export function evaluateCondition(
  condition: Condition,
  data: Record<string, unknown>,
): boolean {
  const value = getFieldValue(data, condition.field);

  switch (condition.operator) {
    case 'eq':
      return value === condition.value;

    case 'neq':
      return value !== condition.value;

    case 'not_empty':
      return (
        value !== null &&
        value !== undefined &&
        value !== '' &&
        !(Array.isArray(value) && value.length === 0)
      );

    case 'in':
      return Array.isArray(condition.value) && condition.value.includes(value);

    case 'not_in':
      return Array.isArray(condition.value) && !condition.value.includes(value);

    case 'exists':
      return value !== undefined;

    case 'gt':
      return compareNumbers(value, condition.value, (a, b) => a > b);

    case 'lt':
      return compareNumbers(value, condition.value, (a, b) => a < b);

    case 'gte':
      return compareNumbers(value, condition.value, (a, b) => a >= b);

    case 'lte':
      return compareNumbers(value, condition.value, (a, b) => a <= b);

    case 'matches':
      if (typeof value !== 'string' || typeof condition.value !== 'string') return false;
      try {
        return new RegExp(condition.value).test(value);
      } catch {
        return false;
      }
  }
}
