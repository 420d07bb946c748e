import pg from 'pg';
import { withTransaction } from '../shared/database.js';
import {
  AlreadyDecidedError,
  ConcurrencyConflictError,
  DuplicatePurchaseOrderError,
  EntityNotFoundError,
} from '../shared/errors.js';
import type {
  Approval,
  PurchaseOrder,
  PurchaseRequest,
  RequestItem,
} from '../domain/types.js';
import { APPROVAL_LEVEL_CONSTRAINT, PO_REQUEST_CONSTRAINT, STORE_QUERIES } from './pg-store.queries.js';
import {
  numeric,
  rowToApproval,
  rowToItem,
  rowToPurchaseOrder,
  rowToPurchaseOrderLine,
  rowToRequest,
} from './rows.js';
import type { Row } from './rows.js';
import type { ProcurementStore, RequestFilter, RequestTransaction, StatusChange } from './types.js';

type Queryable = pg.Pool | pg.PoolClient;

function isUniqueViolation(error: unknown, constraint: string): boolean {
  return error instanceof pg.DatabaseError && error.code === '23505' && error.constraint === constraint;
}

async function loadRequest(
  conn: Queryable,
  requestId: string,
  forUpdate: boolean,
): Promise<PurchaseRequest | null> {
  const { rows } = await conn.query<Row>(
    forUpdate ? STORE_QUERIES.GET_REQUEST_FOR_UPDATE : STORE_QUERIES.GET_REQUEST,
    [requestId],
  );
  if (rows.length === 0) return null;
  const { rows: itemRows } = await conn.query<Row>(STORE_QUERIES.GET_ITEMS, [requestId]);
  return rowToRequest(rows[0], itemRows.map(rowToItem));
}

async function insertItems(conn: Queryable, requestId: string, items: RequestItem[]): Promise<void> {
  for (const item of items) {
    await conn.query(STORE_QUERIES.INSERT_ITEM, [
      requestId,
      item.line_number,
      item.description,
      item.quantity,
      item.unit_price,
      item.line_total,
    ]);
  }
}

async function loadPurchaseOrder(conn: Queryable, row: Row | undefined): Promise<PurchaseOrder | null> {
  if (!row) return null;
  const order = rowToPurchaseOrder(row, []);
  const { rows: lineRows } = await conn.query<Row>(STORE_QUERIES.GET_PO_LINES, [order.id]);
  return { ...order, lines: lineRows.map(rowToPurchaseOrderLine) };
}

class PgRequestTransaction implements RequestTransaction {
  constructor(
    private readonly client: pg.PoolClient,
    public request: PurchaseRequest,
  ) {}

  async getApprovals(): Promise<Approval[]> {
    const { rows } = await this.client.query<Row>(STORE_QUERIES.GET_APPROVALS, [this.request.id]);
    return rows.map(rowToApproval);
  }

  async insertApproval(approval: Approval): Promise<Approval> {
    try {
      const { rows } = await this.client.query<Row>(STORE_QUERIES.INSERT_APPROVAL, [
        approval.id,
        approval.request_id,
        approval.level,
        approval.decider_id,
        approval.decision,
        approval.comment,
        approval.decided_at,
      ]);
      return rowToApproval(rows[0]);
    } catch (error) {
      if (isUniqueViolation(error, APPROVAL_LEVEL_CONSTRAINT)) {
        throw new AlreadyDecidedError(this.request.id, approval.level);
      }
      throw error;
    }
  }

  async replaceItems(items: RequestItem[], totalAmount: number, at: Date): Promise<PurchaseRequest> {
    await this.client.query(STORE_QUERIES.DELETE_ITEMS, [this.request.id]);
    await insertItems(this.client, this.request.id, items);
    const { rows } = await this.client.query<Row>(STORE_QUERIES.UPDATE_ITEMS_TOTAL, [
      this.request.id,
      this.request.version,
      totalAmount,
      at,
    ]);
    this.request = this.applied(rows, items);
    return this.request;
  }

  async changeStatus(change: StatusChange, at: Date): Promise<PurchaseRequest> {
    const { rows } = await this.client.query<Row>(STORE_QUERIES.UPDATE_STATUS, [
      this.request.id,
      this.request.version,
      change.status,
      change.approved_at ?? null,
      change.rejected_at ?? null,
      at,
    ]);
    this.request = this.applied(rows, this.request.items);
    return this.request;
  }

  async deleteRequest(): Promise<void> {
    await this.client.query(STORE_QUERIES.DELETE_REQUEST, [this.request.id]);
  }

  async getPurchaseOrder(): Promise<PurchaseOrder | null> {
    const { rows } = await this.client.query<Row>(STORE_QUERIES.GET_PO_BY_REQUEST, [this.request.id]);
    return loadPurchaseOrder(this.client, rows[0]);
  }

  async insertPurchaseOrder(order: PurchaseOrder): Promise<PurchaseOrder> {
    try {
      await this.client.query(STORE_QUERIES.INSERT_PO, [
        order.id,
        order.request_id,
        order.po_number,
        order.sequence,
        order.requester_id,
        order.approved_by.level_1,
        order.approved_by.level_2,
        order.total_amount,
        order.document_ref,
        order.generated_at,
      ]);
    } catch (error) {
      if (isUniqueViolation(error, PO_REQUEST_CONSTRAINT)) {
        throw new DuplicatePurchaseOrderError(this.request.id);
      }
      throw error;
    }
    for (const line of order.lines) {
      await this.client.query(STORE_QUERIES.INSERT_PO_LINE, [
        order.id,
        line.line_number,
        line.description,
        line.quantity,
        line.unit_price,
        line.line_total,
      ]);
    }
    return order;
  }

  async nextPurchaseOrderSequence(): Promise<number> {
    const { rows } = await this.client.query<Row>(STORE_QUERIES.NEXT_PO_SEQUENCE);
    return numeric(rows[0], 'value');
  }

  private applied(rows: Row[], items: RequestItem[]): PurchaseRequest {
    if (rows.length === 0) {
      throw new ConcurrencyConflictError(this.request.id, this.request.version, this.request.version + 1);
    }
    return rowToRequest(rows[0], items);
  }
}

export class PgProcurementStore implements ProcurementStore {
  constructor(private readonly pool: pg.Pool) {}

  async insertRequest(request: PurchaseRequest): Promise<PurchaseRequest> {
    return withTransaction(this.pool, async (client) => {
      await client.query(STORE_QUERIES.INSERT_REQUEST, [
        request.id,
        request.title,
        request.description,
        request.requester_id,
        request.total_amount,
        request.status,
        request.source,
        request.proforma ? JSON.stringify(request.proforma) : null,
        request.version,
        request.created_at,
        request.updated_at,
      ]);
      await insertItems(client, request.id, request.items);
      const stored = await loadRequest(client, request.id, false);
      if (!stored) {
        throw new EntityNotFoundError('purchase_request', request.id);
      }
      return stored;
    });
  }

  async getRequest(requestId: string): Promise<PurchaseRequest | null> {
    return loadRequest(this.pool, requestId, false);
  }

  async listRequests(filter: RequestFilter): Promise<PurchaseRequest[]> {
    const { rows } = await this.pool.query<Row>(STORE_QUERIES.LIST_REQUESTS, [
      filter.status ?? null,
      filter.requester_id ?? null,
    ]);
    if (rows.length === 0) return [];

    const ids = rows.map((row) => row.id);
    const { rows: itemRows } = await this.pool.query<Row>(STORE_QUERIES.GET_ITEMS_FOR_REQUESTS, [ids]);
    const itemsByRequest = new Map<unknown, RequestItem[]>();
    for (const itemRow of itemRows) {
      const list = itemsByRequest.get(itemRow.request_id) ?? [];
      list.push(rowToItem(itemRow));
      itemsByRequest.set(itemRow.request_id, list);
    }
    return rows.map((row) => rowToRequest(row, itemsByRequest.get(row.id) ?? []));
  }

  async getApprovals(requestId: string): Promise<Approval[]> {
    const { rows } = await this.pool.query<Row>(STORE_QUERIES.GET_APPROVALS, [requestId]);
    return rows.map(rowToApproval);
  }

  async getPurchaseOrder(poId: string): Promise<PurchaseOrder | null> {
    const { rows } = await this.pool.query<Row>(STORE_QUERIES.GET_PO, [poId]);
    return loadPurchaseOrder(this.pool, rows[0]);
  }

  async getPurchaseOrderByRequest(requestId: string): Promise<PurchaseOrder | null> {
    const { rows } = await this.pool.query<Row>(STORE_QUERIES.GET_PO_BY_REQUEST, [requestId]);
    return loadPurchaseOrder(this.pool, rows[0]);
  }

  /**
   * Row lock on the request (SELECT ... FOR UPDATE) for the whole transaction,
   * so concurrent decisions on one request run one after another.
   */
  async withRequest<T>(
    requestId: string,
    work: (tx: RequestTransaction) => Promise<T>,
  ): Promise<T> {
    return withTransaction(this.pool, async (client) => {
      const request = await loadRequest(client, requestId, true);
      if (!request) {
        throw new EntityNotFoundError('purchase_request', requestId);
      }
      return work(new PgRequestTransaction(client, request));
    });
  }
}
