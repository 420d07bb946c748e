import { generateId } from '../shared/types.js';
import { AlreadyDecidedError, PurchaseOrderGenerationError, ValidationError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { SPANS, traced } from '../observability/tracing.js';
import { transition } from '../domain/status.js';
import { requireAuthorization } from '../role-authority/role-authority.js';
import type { PurchaseOrderGenerator } from '../po-generator/po-generator.service.js';
import type {
  Approval,
  ApprovalLevel,
  Decision,
  PurchaseOrder,
  PurchaseRequest,
  UserProfile,
} from '../domain/types.js';
import type { ProcurementStore } from '../store/types.js';

export const COMMENT_MAX_LENGTH = 2000;

export interface DecisionInput {
  request_id: string;
  level: ApprovalLevel;
  decision: Decision;
  comment?: string | null;
}

export interface DecisionOutcome {
  request: PurchaseRequest;
  approval: Approval;
  purchase_order: PurchaseOrder | null;
}

export interface ApprovalEngineOptions {
  clock?: () => Date;
}

function normalizeComment(comment: string | null | undefined): string | null {
  const trimmed = comment?.trim() ?? '';
  if (trimmed.length > COMMENT_MAX_LENGTH) {
    throw new ValidationError(`comment must be at most ${COMMENT_MAX_LENGTH} characters`, 'comment');
  }
  return trimmed === '' ? null : trimmed;
}

/**
 * Drives a request through level 1 and level 2. Each decision (approval
 * record, status change and, on final approval, the purchase order) commits
 * or rolls back as one unit under the request's lock.
 */
export class ApprovalEngine {
  private readonly logger = createLogger('approval-engine');
  private readonly clock: () => Date;

  constructor(
    private readonly store: ProcurementStore,
    private readonly poGenerator: PurchaseOrderGenerator,
    options: ApprovalEngineOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  decide(decider: UserProfile, input: DecisionInput): Promise<DecisionOutcome> {
    const attributes = {
      'request.id': input.request_id,
      'approval.level': input.level,
      'approval.decision': input.decision,
    };
    return traced(SPANS.decide, attributes, async () => {
      try {
        return await this.record(decider, input);
      } catch (error) {
        if (error instanceof PurchaseOrderGenerationError) {
          this.logger.error(
            { request_id: input.request_id, level: input.level, err: error },
            'purchase order generation failed; decision rolled back',
          );
        }
        throw error;
      }
    });
  }

  private async record(decider: UserProfile, input: DecisionInput): Promise<DecisionOutcome> {
    const comment = normalizeComment(input.comment);

    const outcome = await this.store.withRequest(input.request_id, async (tx) => {
      const request = tx.request;
      const approvals = await tx.getApprovals();

      if (approvals.some((a) => a.level === input.level)) {
        throw new AlreadyDecidedError(request.id, input.level);
      }

      const step = transition(request.status, input.level, input.decision);
      requireAuthorization(
        decider,
        input.level === 1 ? 'decide_level1' : 'decide_level2',
        request,
        request.id,
      );

      const decidedAt = this.clock();
      const approval = await tx.insertApproval({
        id: generateId(),
        request_id: request.id,
        level: input.level,
        decider_id: decider.id,
        decision: input.decision,
        comment,
        decided_at: decidedAt,
      });

      const updated = await tx.changeStatus(
        {
          status: step.to,
          approved_at: step.to === 'approved' ? decidedAt : undefined,
          rejected_at: step.to === 'rejected' ? decidedAt : undefined,
        },
        decidedAt,
      );

      const purchaseOrder = step.generatesPurchaseOrder
        ? await this.poGenerator.generate(tx, [...approvals, approval])
        : null;

      return { request: updated, approval, purchase_order: purchaseOrder };
    });

    this.logger.info(
      {
        request_id: input.request_id,
        level: input.level,
        decision: input.decision,
        decider_id: decider.id,
        status: outcome.request.status,
        po_number: outcome.purchase_order?.po_number,
      },
      'approval decision recorded',
    );
    return outcome;
  }
}
