import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { MAX_UNIT_PRICE, hasAtMostTwoDecimals, toCents } from '../shared/money.js';
import { SPANS, tracedSync } from '../observability/tracing.js';
import type {
  Discrepancy,
  PurchaseOrder,
  PurchaseOrderLine,
  ReceiptLine,
  ReceiptValidationResult,
} from '../domain/types.js';

export interface ReceiptTolerance {
  /** Units a received quantity may differ from the ordered quantity. */
  quantity: number;
  /** Fraction of the ordered unit price a received price may differ by. */
  price: number;
}

export const EXACT_MATCH: ReceiptTolerance = { quantity: 0, price: 0 };

const receiptLineSchema = z.object({
  line_number: z.number().int().positive().optional(),
  description: z.string().trim().min(1, 'description is required'),
  quantity: z.number().nonnegative('quantity must not be negative'),
  unit_price: z
    .number()
    .nonnegative('unit_price must not be negative')
    .max(MAX_UNIT_PRICE, `unit_price must be at most ${MAX_UNIT_PRICE}`)
    .refine(hasAtMostTwoDecimals, 'unit_price must have at most two decimal places'),
});

const receiptSchema = z.array(receiptLineSchema).min(1, 'a receipt needs at least one line');

export function parseReceiptLines(input: unknown): ReceiptLine[] {
  const parsed = receiptSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = ['lines', ...issue.path].join('.');
    throw new ValidationError(`${field}: ${issue.message}`, field);
  }
  return parsed.data;
}

function normalize(description: string): string {
  return description.trim().toLowerCase();
}

interface Received {
  quantity: number;
  unitPrices: number[];
}

/**
 * Compares what arrived against the purchase order snapshot. Pure: the order
 * and the request are never touched; callers decide what to do with the
 * discrepancies.
 */
export class ReceiptValidator {
  private readonly logger = createLogger('receipt-validator');
  private readonly tolerance: ReceiptTolerance;

  constructor(tolerance: Partial<ReceiptTolerance> = {}) {
    const merged = { ...EXACT_MATCH, ...tolerance };
    if (!(merged.quantity >= 0) || !(merged.price >= 0)) {
      throw new ValidationError('receipt tolerances must be non-negative', 'tolerance', { ...merged });
    }
    this.tolerance = merged;
  }

  validate(po: PurchaseOrder, receipt: ReceiptLine[]): ReceiptValidationResult {
    return tracedSync(SPANS.validateReceipt, { 'po.id': po.id, 'receipt.lines': receipt.length }, () =>
      this.compare(po, receipt),
    );
  }

  private compare(po: PurchaseOrder, receipt: ReceiptLine[]): ReceiptValidationResult {
    const received = new Map<number, Received>();
    const discrepancies: Discrepancy[] = [];

    const matches = this.matchLines(po.lines, receipt);
    receipt.forEach((line, index) => {
      const poLine = matches[index];
      if (!poLine) {
        discrepancies.push({
          kind: 'unexpected_item',
          line_number: line.line_number ?? null,
          description: line.description,
          expected_quantity: null,
          received_quantity: line.quantity,
          expected_unit_price: null,
          received_unit_price: line.unit_price,
        });
        return;
      }
      const entry = received.get(poLine.line_number) ?? { quantity: 0, unitPrices: [] };
      entry.quantity += line.quantity;
      entry.unitPrices.push(line.unit_price);
      received.set(poLine.line_number, entry);
    });

    for (const poLine of po.lines) {
      const entry = received.get(poLine.line_number);
      if (!entry) {
        discrepancies.push(this.discrepancy('missing_item', poLine, 0, null));
        continue;
      }

      const delta = entry.quantity - poLine.quantity;
      if (delta > this.tolerance.quantity) {
        discrepancies.push(this.discrepancy('over_delivery', poLine, entry.quantity, null));
      } else if (-delta > this.tolerance.quantity) {
        discrepancies.push(this.discrepancy('under_delivery', poLine, entry.quantity, null));
      }

      for (const unitPrice of entry.unitPrices) {
        if (!this.priceWithinTolerance(poLine.unit_price, unitPrice)) {
          discrepancies.push(this.discrepancy('price_mismatch', poLine, entry.quantity, unitPrice));
        }
      }
    }

    const result: ReceiptValidationResult = {
      ok: discrepancies.length === 0,
      po_id: po.id,
      po_number: po.po_number,
      discrepancies,
    };
    this.logger.info(
      { po_id: po.id, po_number: po.po_number, ok: result.ok, discrepancies: discrepancies.length },
      'receipt validated',
    );
    return result;
  }

  /**
   * Pairs each receipt line with a PO line. Numbered lines claim theirs
   * first; a line matched by description takes the first unclaimed PO line
   * with that description, or the first such line once all are claimed.
   */
  private matchLines(lines: PurchaseOrderLine[], receipt: ReceiptLine[]): Array<PurchaseOrderLine | undefined> {
    const claimed = new Set<number>();
    for (const line of receipt) {
      if (line.line_number !== undefined) claimed.add(line.line_number);
    }

    return receipt.map((line) => {
      if (line.line_number !== undefined) {
        return lines.find((l) => l.line_number === line.line_number);
      }
      const wanted = normalize(line.description);
      const candidates = lines.filter((l) => normalize(l.description) === wanted);
      const poLine = candidates.find((l) => !claimed.has(l.line_number)) ?? candidates[0];
      if (poLine) claimed.add(poLine.line_number);
      return poLine;
    });
  }

  private priceWithinTolerance(expected: number, actual: number): boolean {
    const expectedCents = toCents(expected);
    const allowed = expectedCents * this.tolerance.price;
    // the received price is not rounded: 2.004 against 2.00 is a mismatch
    return Math.abs(actual * 100 - expectedCents) <= allowed + 1e-6;
  }

  private discrepancy(
    kind: Discrepancy['kind'],
    poLine: PurchaseOrderLine,
    receivedQuantity: number,
    receivedUnitPrice: number | null,
  ): Discrepancy {
    return {
      kind,
      line_number: poLine.line_number,
      description: poLine.description,
      expected_quantity: poLine.quantity,
      received_quantity: receivedQuantity,
      expected_unit_price: poLine.unit_price,
      received_unit_price: receivedUnitPrice,
    };
  }
}
