import type {
  Approval,
  PurchaseOrder,
  PurchaseRequest,
  RequestItem,
  RequestStatus,
} from '../domain/types.js';

export interface RequestFilter {
  status?: RequestStatus;
  requester_id?: string;
}

export interface StatusChange {
  status: RequestStatus;
  approved_at?: Date;
  rejected_at?: Date;
}

/**
 * Work done while holding the exclusive lock on one request. Writes become
 * visible to other callers only when the surrounding transaction commits.
 */
export interface RequestTransaction {
  readonly request: PurchaseRequest;
  getApprovals(): Promise<Approval[]>;
  insertApproval(approval: Approval): Promise<Approval>;
  replaceItems(items: RequestItem[], totalAmount: number, at: Date): Promise<PurchaseRequest>;
  changeStatus(change: StatusChange, at: Date): Promise<PurchaseRequest>;
  deleteRequest(): Promise<void>;
  getPurchaseOrder(): Promise<PurchaseOrder | null>;
  insertPurchaseOrder(order: PurchaseOrder): Promise<PurchaseOrder>;
  /** Next value of the process-wide purchase order sequence. Never reused, even on rollback. */
  nextPurchaseOrderSequence(): Promise<number>;
}

/** Persistence substrate with atomic read-modify-write per request. */
export interface ProcurementStore {
  insertRequest(request: PurchaseRequest): Promise<PurchaseRequest>;
  getRequest(requestId: string): Promise<PurchaseRequest | null>;
  listRequests(filter: RequestFilter): Promise<PurchaseRequest[]>;
  getApprovals(requestId: string): Promise<Approval[]>;
  getPurchaseOrder(poId: string): Promise<PurchaseOrder | null>;
  getPurchaseOrderByRequest(requestId: string): Promise<PurchaseOrder | null>;
  /**
   * Serializes `work` against every other transaction on the same request.
   * Resolving commits; throwing rolls back and rethrows. A missing request
   * is EntityNotFoundError.
   */
  withRequest<T>(requestId: string, work: (tx: RequestTransaction) => Promise<T>): Promise<T>;
}
