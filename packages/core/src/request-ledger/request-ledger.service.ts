import { generateId } from '../shared/types.js';
import { EntityNotFoundError, InvalidStateError, ValidationError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { sumLines } from '../shared/money.js';
import { requireAuthorization } from '../role-authority/role-authority.js';
import { evaluate, REQUEST_POLICY_RULES } from '../rules-engine/index.js';
import type { Rule, RuleOperation } from '../rules-engine/index.js';
import type {
  ProformaMetadata,
  PurchaseRequest,
  RequestItem,
  RequestSource,
  UserProfile,
} from '../domain/types.js';
import type { ProcurementStore, RequestFilter } from '../store/types.js';
import { validateItems } from './item-validation.js';

export interface RequestDraft {
  title: string;
  description?: string;
  /** Untrusted line items; validated here whatever their source. */
  items: unknown;
  source?: RequestSource;
  proforma?: ProformaMetadata | null;
}

export interface RequestLedgerOptions {
  /** Deployment rules evaluated after the built-in request policy. */
  extraRules?: Rule[];
  clock?: () => Date;
}

export class RequestLedger {
  private readonly logger = createLogger('request-ledger');
  private readonly rules: Rule[];
  private readonly clock: () => Date;

  constructor(
    private readonly store: ProcurementStore,
    options: RequestLedgerOptions = {},
  ) {
    this.rules = [...REQUEST_POLICY_RULES, ...(options.extraRules ?? [])];
    this.clock = options.clock ?? (() => new Date());
  }

  async create(requester: UserProfile, draft: RequestDraft): Promise<PurchaseRequest> {
    const id = generateId();
    requireAuthorization(
      requester,
      'create_request',
      { id, requester_id: requester.id, status: 'pending_level_1' },
      id,
    );

    const title = draft.title.trim();
    const items = validateItems(draft.items);
    const totalAmount = sumLines(items);
    this.applyPolicy('request.submit', { title, items, totalAmount });

    const now = this.clock();
    const stored = await this.store.insertRequest({
      id,
      title,
      description: draft.description?.trim() ?? '',
      requester_id: requester.id,
      items,
      total_amount: totalAmount,
      status: 'pending_level_1',
      source: draft.source ?? 'manual',
      proforma: draft.proforma ?? null,
      version: 1,
      created_at: now,
      updated_at: now,
      approved_at: null,
      rejected_at: null,
    });

    this.logger.info(
      { request_id: id, requester_id: requester.id, total_amount: totalAmount, items: items.length },
      'purchase request submitted',
    );
    return stored;
  }

  /** Replaces the items of a request nobody has decided on yet. */
  async edit(requestId: string, editor: UserProfile, items: unknown): Promise<PurchaseRequest> {
    return this.store.withRequest(requestId, async (tx) => {
      requireAuthorization(editor, 'edit_request', tx.request, requestId);
      this.assertUndecided(tx.request, await tx.getApprovals(), 'edited');

      const validated = validateItems(items);
      const totalAmount = sumLines(validated);
      this.applyPolicy('request.edit', { title: tx.request.title, items: validated, totalAmount });

      const updated = await tx.replaceItems(validated, totalAmount, this.clock());
      this.logger.info(
        { request_id: requestId, total_amount: totalAmount, items: validated.length },
        'purchase request items replaced',
      );
      return updated;
    });
  }

  /** Removes an undecided request together with its items. */
  async withdraw(requestId: string, requester: UserProfile): Promise<void> {
    await this.store.withRequest(requestId, async (tx) => {
      requireAuthorization(requester, 'edit_request', tx.request, requestId);
      this.assertUndecided(tx.request, await tx.getApprovals(), 'withdrawn');
      await tx.deleteRequest();
    });
    this.logger.info({ request_id: requestId }, 'purchase request withdrawn');
  }

  async get(requestId: string): Promise<PurchaseRequest> {
    const request = await this.store.getRequest(requestId);
    if (!request) {
      throw new EntityNotFoundError('purchase_request', requestId);
    }
    return request;
  }

  async list(filter: RequestFilter = {}): Promise<PurchaseRequest[]> {
    return this.store.listRequests(filter);
  }

  private assertUndecided(
    request: PurchaseRequest,
    approvals: ReadonlyArray<unknown>,
    verb: string,
  ): void {
    if (request.status !== 'pending_level_1' || approvals.length > 0) {
      throw new InvalidStateError(
        `Request ${request.id} can no longer be ${verb} (status: ${request.status})`,
        request.status,
      );
    }
  }

  private applyPolicy(
    operation: RuleOperation,
    subject: { title: string; items: RequestItem[]; totalAmount: number },
  ): void {
    const result = evaluate(this.rules, {
      operation,
      data: {
        title: subject.title,
        title_length: subject.title.length,
        item_count: subject.items.length,
        total_amount: subject.totalAmount,
        max_quantity: Math.max(0, ...subject.items.map((i) => i.quantity)),
      },
    }, this.clock().toISOString().slice(0, 10));

    if (result.decision === 'reject') {
      const rule = result.rejected_by;
      throw new ValidationError(
        rule?.rejection_message ?? 'Request rejected by policy',
        rule?.field,
        { rule_id: rule?.id },
      );
    }
  }
}
