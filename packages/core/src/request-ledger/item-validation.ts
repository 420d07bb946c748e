import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';
import {
  MAX_QUANTITY,
  MAX_TOTAL_CENTS,
  MAX_UNIT_PRICE,
  fromCents,
  hasAtMostTwoDecimals,
  lineTotal,
  toCents,
  totalCents,
} from '../shared/money.js';
import type { RequestItem, RequestItemInput } from '../domain/types.js';

const itemSchema = z.object({
  description: z
    .string({ required_error: 'description is required', invalid_type_error: 'description must be text' })
    .trim()
    .min(1, 'description is required')
    .max(500, 'description must be at most 500 characters'),
  quantity: z
    .number({ required_error: 'quantity is required', invalid_type_error: 'quantity must be a number' })
    .int('quantity must be a whole number')
    .positive('quantity must be greater than zero')
    .max(MAX_QUANTITY, `quantity must be at most ${MAX_QUANTITY}`),
  unit_price: z
    .number({ required_error: 'unit_price is required', invalid_type_error: 'unit_price must be a number' })
    .finite('unit_price must be finite')
    .nonnegative('unit_price must not be negative')
    .max(MAX_UNIT_PRICE, `unit_price must be at most ${MAX_UNIT_PRICE}`)
    .refine(hasAtMostTwoDecimals, 'unit_price must have at most two decimal places'),
});

const itemsSchema = z
  .array(
    itemSchema.refine((item) => item.quantity * toCents(item.unit_price) <= MAX_TOTAL_CENTS, {
      message: `line total must be at most ${fromCents(MAX_TOTAL_CENTS)}`,
    }),
    { invalid_type_error: 'items must be a list' },
  )
  .refine((items) => totalCents(items) <= MAX_TOTAL_CENTS, {
    message: `request total must be at most ${fromCents(MAX_TOTAL_CENTS)}`,
  });

/**
 * Validates line items from any source (manual entry or document extraction)
 * and numbers them from 1. Empty lists pass here; the request policy rules
 * decide whether a list may be empty.
 */
export function validateItems(input: unknown): RequestItem[] {
  const parsed = itemsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = ['items', ...issue.path].reduce<string>(
      (path, part) => (typeof part === 'number' ? `${path}[${part}]` : path ? `${path}.${part}` : part),
      '',
    );
    throw new ValidationError(`${field}: ${issue.message}`, field, {
      issues: parsed.error.issues.map((i) => ({ path: i.path, message: i.message })),
    });
  }
  return parsed.data.map((item: RequestItemInput, index) => ({
    line_number: index + 1,
    description: item.description,
    quantity: item.quantity,
    unit_price: item.unit_price,
    line_total: lineTotal(item.quantity, item.unit_price),
  }));
}
