import { generateId } from '../shared/types.js';
import {
  DuplicatePurchaseOrderError,
  InvalidStateError,
  PurchaseOrderGenerationError,
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { Approval, PurchaseOrder, PurchaseRequest } from '../domain/types.js';
import type { RequestTransaction } from '../store/types.js';
import { DEFAULT_PO_PREFIX, formatPoNumber } from './po-number.js';

/** External document generation for a purchase order (PDF, ERP export, ...). */
export interface PurchaseOrderDocumentRenderer {
  render(order: PurchaseOrder, request: PurchaseRequest): Promise<{ document_ref: string }>;
}

export interface PurchaseOrderGeneratorOptions {
  prefix?: string;
  /** Upper bound for the renderer; exceeding it fails the generation. */
  timeoutMs?: number;
  renderer?: PurchaseOrderDocumentRenderer;
  clock?: () => Date;
}

export const DEFAULT_PO_GENERATION_TIMEOUT_MS = 5_000;

async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function approverAt(approvals: Approval[], level: 1 | 2): string {
  const approval = approvals.find((a) => a.level === level && a.decision === 'approved');
  if (!approval) {
    throw new Error(`missing level ${level} approval`);
  }
  return approval.decider_id;
}

export class PurchaseOrderGenerator {
  private readonly logger = createLogger('po-generator');
  private readonly prefix: string;
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(private readonly options: PurchaseOrderGeneratorOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_PO_PREFIX;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PO_GENERATION_TIMEOUT_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Derives the purchase order from a request that has just become approved,
   * inside the approval's transaction. Lines are copied, so the order never
   * follows later changes to the request.
   */
  async generate(tx: RequestTransaction, approvals: Approval[]): Promise<PurchaseOrder> {
    const request = tx.request;
    if (request.status !== 'approved') {
      throw new InvalidStateError(
        `Purchase orders are generated for approved requests; ${request.id} is ${request.status}`,
        request.status,
      );
    }
    if (await tx.getPurchaseOrder()) {
      throw new DuplicatePurchaseOrderError(request.id);
    }

    try {
      const sequence = await tx.nextPurchaseOrderSequence();
      const generatedAt = this.clock();
      const draft: PurchaseOrder = {
        id: generateId(),
        request_id: request.id,
        po_number: formatPoNumber(this.prefix, generatedAt, sequence),
        sequence,
        requester_id: request.requester_id,
        approved_by: {
          level_1: approverAt(approvals, 1),
          level_2: approverAt(approvals, 2),
        },
        lines: request.items.map((item) => ({
          line_number: item.line_number,
          description: item.description,
          quantity: item.quantity,
          unit_price: item.unit_price,
          line_total: item.line_total,
        })),
        total_amount: request.total_amount,
        document_ref: null,
        generated_at: generatedAt,
      };

      const order = this.options.renderer
        ? {
            ...draft,
            document_ref: (
              await withTimeout(
                this.options.renderer.render(draft, request),
                this.timeoutMs,
                'purchase order rendering',
              )
            ).document_ref,
          }
        : draft;

      const stored = await tx.insertPurchaseOrder(order);
      this.logger.info(
        { request_id: request.id, po_id: stored.id, po_number: stored.po_number },
        'purchase order generated',
      );
      return stored;
    } catch (error) {
      if (error instanceof DuplicatePurchaseOrderError) throw error;
      throw new PurchaseOrderGenerationError(request.id, error);
    }
  }
}
