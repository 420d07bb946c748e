export const ROLES = ['staff', 'approver_level_1', 'approver_level_2', 'finance'] as const;
export type Role = (typeof ROLES)[number];

export const REQUEST_STATUSES = [
  'pending_level_1',
  'pending_level_2',
  'approved',
  'rejected',
] as const;
export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export type ApprovalLevel = 1 | 2;
export type Decision = 'approved' | 'rejected';

export interface UserProfile {
  id: string;
  role: Role;
}

export interface RequestItemInput {
  description: string;
  quantity: number;
  unit_price: number;
}

export interface RequestItem extends RequestItemInput {
  line_number: number;
  line_total: number;
}

export interface ProformaMetadata {
  vendor_name: string | null;
  quote_number: string | null;
  quote_date: string | null;
  payment_terms: string | null;
}

export type RequestSource = 'manual' | 'proforma';

export interface PurchaseRequest {
  id: string;
  title: string;
  description: string;
  requester_id: string;
  items: RequestItem[];
  total_amount: number;
  status: RequestStatus;
  source: RequestSource;
  proforma: ProformaMetadata | null;
  version: number;
  created_at: Date;
  updated_at: Date;
  approved_at: Date | null;
  rejected_at: Date | null;
}

export interface Approval {
  id: string;
  request_id: string;
  level: ApprovalLevel;
  decider_id: string;
  decision: Decision;
  comment: string | null;
  decided_at: Date;
}

export interface PurchaseOrderLine {
  line_number: number;
  description: string;
  quantity: number;
  unit_price: number;
  line_total: number;
}

export interface PurchaseOrder {
  id: string;
  request_id: string;
  po_number: string;
  sequence: number;
  requester_id: string;
  approved_by: { level_1: string; level_2: string };
  lines: PurchaseOrderLine[];
  total_amount: number;
  document_ref: string | null;
  generated_at: Date;
}

export interface ReceiptLine {
  line_number?: number;
  description: string;
  quantity: number;
  unit_price: number;
}

export type DiscrepancyKind =
  | 'over_delivery'
  | 'under_delivery'
  | 'price_mismatch'
  | 'missing_item'
  | 'unexpected_item';

export interface Discrepancy {
  kind: DiscrepancyKind;
  line_number: number | null;
  description: string;
  expected_quantity: number | null;
  received_quantity: number | null;
  expected_unit_price: number | null;
  received_unit_price: number | null;
}

export interface ReceiptValidationResult {
  ok: boolean;
  po_id: string;
  po_number: string;
  discrepancies: Discrepancy[];
}

export interface RequestView extends PurchaseRequest {
  approvals: Approval[];
  purchase_order: PurchaseOrder | null;
}
