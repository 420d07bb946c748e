import {
  AlreadyDecidedError,
  ConcurrencyConflictError,
  DuplicatePurchaseOrderError,
  EntityNotFoundError,
} from '../shared/errors.js';
import type { Approval, PurchaseOrder, PurchaseRequest } from '../domain/types.js';
import { KeyedLock } from './keyed-lock.js';
import type { ProcurementStore, RequestFilter, RequestTransaction } from './types.js';

interface StagedChanges {
  draft: PurchaseRequest;
  deleted: boolean;
  approvals: Approval[];
  order: PurchaseOrder | null;
}

/**
 * Process-local store. Each request's transactions are serialized through a
 * keyed lock and staged on copies, so a throw inside `withRequest` leaves the
 * committed state untouched.
 */
export class InMemoryProcurementStore implements ProcurementStore {
  private readonly requests = new Map<string, PurchaseRequest>();
  private readonly approvals = new Map<string, Approval[]>();
  private readonly orders = new Map<string, PurchaseOrder>();
  private readonly orderIdByRequest = new Map<string, string>();
  private readonly lock = new KeyedLock();
  private sequence = 0;

  async insertRequest(request: PurchaseRequest): Promise<PurchaseRequest> {
    const existing = this.requests.get(request.id);
    if (existing) {
      throw new ConcurrencyConflictError(request.id, 0, existing.version);
    }
    this.requests.set(request.id, structuredClone(request));
    return structuredClone(request);
  }

  async getRequest(requestId: string): Promise<PurchaseRequest | null> {
    const request = this.requests.get(requestId);
    return request ? structuredClone(request) : null;
  }

  async listRequests(filter: RequestFilter): Promise<PurchaseRequest[]> {
    return [...this.requests.values()]
      .filter((r) => filter.status === undefined || r.status === filter.status)
      .filter((r) => filter.requester_id === undefined || r.requester_id === filter.requester_id)
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map((r) => structuredClone(r));
  }

  async getApprovals(requestId: string): Promise<Approval[]> {
    return structuredClone(this.approvals.get(requestId) ?? []);
  }

  async getPurchaseOrder(poId: string): Promise<PurchaseOrder | null> {
    const order = this.orders.get(poId);
    return order ? structuredClone(order) : null;
  }

  async getPurchaseOrderByRequest(requestId: string): Promise<PurchaseOrder | null> {
    const poId = this.orderIdByRequest.get(requestId);
    return poId ? this.getPurchaseOrder(poId) : null;
  }

  async withRequest<T>(
    requestId: string,
    work: (tx: RequestTransaction) => Promise<T>,
  ): Promise<T> {
    return this.lock.run(requestId, async () => {
      const committed = this.requests.get(requestId);
      if (!committed) {
        throw new EntityNotFoundError('purchase_request', requestId);
      }

      const staged: StagedChanges = {
        draft: structuredClone(committed),
        deleted: false,
        approvals: [],
        order: null,
      };
      const committedApprovals = this.approvals.get(requestId) ?? [];
      const committedOrderId = this.orderIdByRequest.get(requestId);

      const tx: RequestTransaction = {
        get request() {
          return structuredClone(staged.draft);
        },

        getApprovals: async () =>
          structuredClone([...committedApprovals, ...staged.approvals].sort((a, b) => a.level - b.level)),

        insertApproval: async (approval) => {
          const taken = [...committedApprovals, ...staged.approvals].some((a) => a.level === approval.level);
          if (taken) {
            throw new AlreadyDecidedError(requestId, approval.level);
          }
          staged.approvals.push(structuredClone(approval));
          return structuredClone(approval);
        },

        replaceItems: async (items, totalAmount, at) => {
          staged.draft = {
            ...staged.draft,
            items: structuredClone(items),
            total_amount: totalAmount,
            version: staged.draft.version + 1,
            updated_at: at,
          };
          return structuredClone(staged.draft);
        },

        changeStatus: async (change, at) => {
          staged.draft = {
            ...staged.draft,
            status: change.status,
            approved_at: change.approved_at ?? staged.draft.approved_at,
            rejected_at: change.rejected_at ?? staged.draft.rejected_at,
            version: staged.draft.version + 1,
            updated_at: at,
          };
          return structuredClone(staged.draft);
        },

        deleteRequest: async () => {
          staged.deleted = true;
        },

        getPurchaseOrder: async () => {
          if (staged.order) return structuredClone(staged.order);
          return committedOrderId ? this.getPurchaseOrder(committedOrderId) : null;
        },

        insertPurchaseOrder: async (order) => {
          if (committedOrderId || staged.order) {
            throw new DuplicatePurchaseOrderError(requestId);
          }
          staged.order = structuredClone(order);
          return structuredClone(order);
        },

        nextPurchaseOrderSequence: async () => {
          this.sequence += 1;
          return this.sequence;
        },
      };

      const result = await work(tx);

      if (staged.deleted) {
        this.requests.delete(requestId);
        this.approvals.delete(requestId);
        return result;
      }

      this.requests.set(requestId, staged.draft);
      if (staged.approvals.length > 0) {
        this.approvals.set(requestId, [...committedApprovals, ...staged.approvals]);
      }
      if (staged.order) {
        this.orders.set(staged.order.id, staged.order);
        this.orderIdByRequest.set(requestId, staged.order.id);
      }
      return result;
    });
  }
}
