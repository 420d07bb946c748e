import { ok, err } from './shared/types.js';
import type { Result } from './shared/types.js';
import { EntityNotFoundError, ValidationError, isProcurementError } from './shared/errors.js';
import { createLogger } from './shared/logger.js';
import type { ProcurementError } from './shared/errors.js';
import { parseApprovalLevel, parseDecision } from './domain/status.js';
import type {
  PurchaseOrder,
  PurchaseRequest,
  ReceiptValidationResult,
  RequestStatus,
  RequestView,
  Role,
} from './domain/types.js';
import { requireActionRole, requireAuthorization } from './role-authority/role-authority.js';
import { resolveProfile } from './identity/identity-resolver.js';
import type { IdentityResolver } from './identity/identity-resolver.js';
import { RequestLedger } from './request-ledger/request-ledger.service.js';
import type { RequestDraft } from './request-ledger/request-ledger.service.js';
import { ApprovalEngine } from './approval-engine/approval-engine.service.js';
import type { DecisionOutcome } from './approval-engine/approval-engine.service.js';
import { PurchaseOrderGenerator } from './po-generator/po-generator.service.js';
import type { PurchaseOrderDocumentRenderer } from './po-generator/po-generator.service.js';
import { ReceiptValidator, parseReceiptLines } from './receipt-validator/receipt-validator.js';
import type { ReceiptTolerance } from './receipt-validator/receipt-validator.js';
import { assertSupportedDocument, parseExtractedProforma } from './extraction/proforma.js';
import type { DocumentExtractionService, ProformaDocument } from './extraction/proforma.js';
import type { Rule } from './rules-engine/index.js';
import type { ProcurementStore } from './store/types.js';

export interface ProcurementServiceOptions {
  extraRules?: Rule[];
  receiptTolerance?: Partial<ReceiptTolerance>;
  poPrefix?: string;
  poGenerationTimeoutMs?: number;
  poRenderer?: PurchaseOrderDocumentRenderer;
  extraction?: DocumentExtractionService;
  clock?: () => Date;
}

export interface ProformaImport {
  title: string;
  description?: string;
  document: ProformaDocument;
}

export type ServiceResult<T> = Result<T, ProcurementError>;

/** Which requests each role works on. */
const QUEUE_BY_ROLE: Record<Exclude<Role, 'staff'>, RequestStatus> = {
  approver_level_1: 'pending_level_1',
  approver_level_2: 'pending_level_2',
  finance: 'approved',
};

/**
 * The operations the transport layer wraps. Every known failure comes back
 * as an `err` result naming the precondition; anything else is rethrown.
 */
export class ProcurementService {
  private readonly logger = createLogger('procurement');
  private readonly extraction?: DocumentExtractionService;
  readonly ledger: RequestLedger;
  readonly engine: ApprovalEngine;
  readonly poGenerator: PurchaseOrderGenerator;
  readonly receiptValidator: ReceiptValidator;

  constructor(
    private readonly store: ProcurementStore,
    private readonly identities: IdentityResolver,
    options: ProcurementServiceOptions = {},
  ) {
    this.ledger = new RequestLedger(store, { extraRules: options.extraRules, clock: options.clock });
    this.poGenerator = new PurchaseOrderGenerator({
      prefix: options.poPrefix,
      timeoutMs: options.poGenerationTimeoutMs,
      renderer: options.poRenderer,
      clock: options.clock,
    });
    this.engine = new ApprovalEngine(store, this.poGenerator, { clock: options.clock });
    this.receiptValidator = new ReceiptValidator(options.receiptTolerance);
    this.extraction = options.extraction;
  }

  submitRequest(requesterId: string, draft: RequestDraft): Promise<ServiceResult<PurchaseRequest>> {
    return this.run(async () => {
      const requester = await resolveProfile(this.identities, requesterId);
      return this.ledger.create(requester, draft);
    });
  }

  /**
   * Creates a request from a supplier proforma. The extracted items go
   * through the same validation and policy as manual entry.
   */
  importProforma(requesterId: string, input: ProformaImport): Promise<ServiceResult<PurchaseRequest>> {
    return this.run(async () => {
      const requester = await resolveProfile(this.identities, requesterId);
      requireActionRole(requester, 'create_request');
      assertSupportedDocument(input.document);

      const extraction = this.extraction;
      if (!extraction) {
        throw new ValidationError('Proforma extraction is not configured', 'document');
      }
      const raw = await extraction.extractProforma(input.document).catch((error: unknown) => {
        this.logger.warn({ file_name: input.document.file_name, err: error }, 'proforma extraction failed');
        throw new ValidationError(
          `Could not extract the proforma: ${error instanceof Error ? error.message : String(error)}`,
          'document',
        );
      });
      const extracted = parseExtractedProforma(raw);

      return this.ledger.create(requester, {
        title: input.title,
        description: input.description,
        items: extracted.items,
        source: 'proforma',
        proforma: extracted.metadata,
      });
    });
  }

  editRequest(
    requestId: string,
    requesterId: string,
    items: unknown,
  ): Promise<ServiceResult<PurchaseRequest>> {
    return this.run(async () => {
      const requester = await resolveProfile(this.identities, requesterId);
      return this.ledger.edit(requestId, requester, items);
    });
  }

  withdrawRequest(requestId: string, requesterId: string): Promise<ServiceResult<{ request_id: string }>> {
    return this.run(async () => {
      const requester = await resolveProfile(this.identities, requesterId);
      await this.ledger.withdraw(requestId, requester);
      return { request_id: requestId };
    });
  }

  decide(
    requestId: string,
    level: unknown,
    deciderId: string,
    decision: unknown,
    comment?: string | null,
  ): Promise<ServiceResult<DecisionOutcome>> {
    return this.run(async () => {
      const parsedLevel = parseApprovalLevel(level);
      const parsedDecision = parseDecision(decision);
      const decider = await resolveProfile(this.identities, deciderId);
      return this.engine.decide(decider, {
        request_id: requestId,
        level: parsedLevel,
        decision: parsedDecision,
        comment,
      });
    });
  }

  getRequest(requestId: string): Promise<ServiceResult<RequestView>> {
    return this.run(async () => this.toView(await this.ledger.get(requestId)));
  }

  /** getRequest behind the viewer's access: staff see their own, finance approved ones. */
  viewRequest(requestId: string, viewerId: string): Promise<ServiceResult<RequestView>> {
    return this.run(async () => {
      const viewer = await resolveProfile(this.identities, viewerId);
      const request = await this.store.getRequest(requestId);
      requireAuthorization(viewer, 'view_request', request, requestId);
      return this.toView(await this.ledger.get(requestId));
    });
  }

  /** Requests in the viewer's queue: own requests for staff, the pending level for approvers, approved ones for finance. */
  listRequests(viewerId: string): Promise<ServiceResult<RequestView[]>> {
    return this.run(async () => {
      const viewer = await resolveProfile(this.identities, viewerId);
      const requests =
        viewer.role === 'staff'
          ? await this.ledger.list({ requester_id: viewer.id })
          : await this.ledger.list({ status: QUEUE_BY_ROLE[viewer.role] });
      return Promise.all(requests.map((r) => this.toView(r)));
    });
  }

  listRequestsForFinance(viewerId: string): Promise<ServiceResult<RequestView[]>> {
    return this.run(async () => {
      const viewer = await resolveProfile(this.identities, viewerId);
      requireActionRole(viewer, 'view_finance');
      const approved = await this.ledger.list({ status: 'approved' });
      return Promise.all(approved.map((r) => this.toView(r)));
    });
  }

  getRequestForFinance(requestId: string, viewerId: string): Promise<ServiceResult<RequestView>> {
    return this.run(async () => {
      const viewer = await resolveProfile(this.identities, viewerId);
      const request = await this.store.getRequest(requestId);
      requireAuthorization(viewer, 'view_finance', request, requestId);
      return this.toView(await this.ledger.get(requestId));
    });
  }

  /** Finance and the original requester may read a purchase order. */
  getPurchaseOrder(poId: string, viewerId: string): Promise<ServiceResult<PurchaseOrder>> {
    return this.run(async () => {
      const viewer = await resolveProfile(this.identities, viewerId);
      const po = await this.requirePurchaseOrder(poId);
      requireAuthorization(
        viewer,
        'view_purchase_order',
        { id: po.request_id, requester_id: po.requester_id, status: 'approved' },
        po.request_id,
      );
      return po;
    });
  }

  validateReceipt(poId: string, receiptLines: unknown): Promise<ServiceResult<ReceiptValidationResult>> {
    return this.run(async () => {
      const po = await this.requirePurchaseOrder(poId);
      return this.receiptValidator.validate(po, parseReceiptLines(receiptLines));
    });
  }

  private async requirePurchaseOrder(poId: string): Promise<PurchaseOrder> {
    const po = await this.store.getPurchaseOrder(poId);
    if (!po) {
      throw new EntityNotFoundError('purchase_order', poId);
    }
    return po;
  }

  private async toView(request: PurchaseRequest): Promise<RequestView> {
    const [approvals, purchaseOrder] = await Promise.all([
      this.store.getApprovals(request.id),
      this.store.getPurchaseOrderByRequest(request.id),
    ]);
    return { ...request, approvals, purchase_order: purchaseOrder };
  }

  private async run<T>(work: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
      return ok(await work());
    } catch (error) {
      if (isProcurementError(error)) return err(error);
      throw error;
    }
  }
}
