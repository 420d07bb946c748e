import { isRequestStatus } from '../domain/status.js';
import type {
  Approval,
  ApprovalLevel,
  Decision,
  ProformaMetadata,
  PurchaseOrder,
  PurchaseOrderLine,
  PurchaseRequest,
  RequestItem,
  RequestSource,
  RequestStatus,
} from '../domain/types.js';

export type Row = Record<string, unknown>;

function column(row: Row, name: string): unknown {
  if (!(name in row)) {
    throw new TypeError(`Row is missing column ${name}`);
  }
  return row[name];
}

export function text(row: Row, name: string): string {
  const value = column(row, name);
  if (typeof value !== 'string') {
    throw new TypeError(`Column ${name} is not text`);
  }
  return value;
}

export function optionalText(row: Row, name: string): string | null {
  const value = row[name];
  return value === null || value === undefined ? null : text(row, name);
}

/** NUMERIC and BIGINT arrive from pg as strings. */
export function numeric(row: Row, name: string): number {
  const value = column(row, name);
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    throw new TypeError(`Column ${name} is not numeric`);
  }
  return parsed;
}

export function timestamp(row: Row, name: string): Date {
  const value = column(row, name);
  if (value instanceof Date) return value;
  if (typeof value === 'string') return new Date(value);
  throw new TypeError(`Column ${name} is not a timestamp`);
}

export function optionalTimestamp(row: Row, name: string): Date | null {
  const value = row[name];
  return value === null || value === undefined ? null : timestamp(row, name);
}

function status(row: Row): RequestStatus {
  const value = column(row, 'status');
  if (!isRequestStatus(value)) {
    throw new TypeError(`Unknown request status in row: ${String(value)}`);
  }
  return value;
}

function source(row: Row): RequestSource {
  const value = text(row, 'source');
  if (value !== 'manual' && value !== 'proforma') {
    throw new TypeError(`Unknown request source in row: ${value}`);
  }
  return value;
}

function level(row: Row): ApprovalLevel {
  const value = numeric(row, 'level');
  if (value !== 1 && value !== 2) {
    throw new TypeError(`Unknown approval level in row: ${value}`);
  }
  return value;
}

function decision(row: Row): Decision {
  const value = text(row, 'decision');
  if (value !== 'approved' && value !== 'rejected') {
    throw new TypeError(`Unknown decision in row: ${value}`);
  }
  return value;
}

function proforma(row: Row): ProformaMetadata | null {
  const value = row.proforma;
  if (value === null || value === undefined) return null;
  if (typeof value !== 'object') {
    throw new TypeError('Column proforma is not an object');
  }
  const meta: Row = { ...value };
  return {
    vendor_name: optionalText(meta, 'vendor_name'),
    quote_number: optionalText(meta, 'quote_number'),
    quote_date: optionalText(meta, 'quote_date'),
    payment_terms: optionalText(meta, 'payment_terms'),
  };
}

export function rowToItem(row: Row): RequestItem {
  return {
    line_number: numeric(row, 'line_number'),
    description: text(row, 'description'),
    quantity: numeric(row, 'quantity'),
    unit_price: numeric(row, 'unit_price'),
    line_total: numeric(row, 'line_total'),
  };
}

export function rowToRequest(row: Row, items: RequestItem[]): PurchaseRequest {
  return {
    id: text(row, 'id'),
    title: text(row, 'title'),
    description: text(row, 'description'),
    requester_id: text(row, 'requester_id'),
    items,
    total_amount: numeric(row, 'total_amount'),
    status: status(row),
    source: source(row),
    proforma: proforma(row),
    version: numeric(row, 'version'),
    created_at: timestamp(row, 'created_at'),
    updated_at: timestamp(row, 'updated_at'),
    approved_at: optionalTimestamp(row, 'approved_at'),
    rejected_at: optionalTimestamp(row, 'rejected_at'),
  };
}

export function rowToApproval(row: Row): Approval {
  return {
    id: text(row, 'id'),
    request_id: text(row, 'request_id'),
    level: level(row),
    decider_id: text(row, 'decider_id'),
    decision: decision(row),
    comment: optionalText(row, 'comment'),
    decided_at: timestamp(row, 'decided_at'),
  };
}

export function rowToPurchaseOrderLine(row: Row): PurchaseOrderLine {
  return {
    line_number: numeric(row, 'line_number'),
    description: text(row, 'description'),
    quantity: numeric(row, 'quantity'),
    unit_price: numeric(row, 'unit_price'),
    line_total: numeric(row, 'line_total'),
  };
}

export function rowToPurchaseOrder(row: Row, lines: PurchaseOrderLine[]): PurchaseOrder {
  return {
    id: text(row, 'id'),
    request_id: text(row, 'request_id'),
    po_number: text(row, 'po_number'),
    sequence: numeric(row, 'sequence'),
    requester_id: text(row, 'requester_id'),
    approved_by: {
      level_1: text(row, 'level_1_approver_id'),
      level_2: text(row, 'level_2_approver_id'),
    },
    lines,
    total_amount: numeric(row, 'total_amount'),
    document_ref: optionalText(row, 'document_ref'),
    generated_at: timestamp(row, 'generated_at'),
  };
}
