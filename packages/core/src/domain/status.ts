import { InvalidStateError, ValidationError } from '../shared/errors.js';
import { REQUEST_STATUSES, ROLES } from './types.js';
import type { ApprovalLevel, Decision, RequestStatus, Role } from './types.js';

export interface Transition {
  from: RequestStatus;
  level: ApprovalLevel;
  decision: Decision;
  to: RequestStatus;
  /** Final approval also produces the purchase order. */
  generatesPurchaseOrder: boolean;
}

export const TRANSITIONS: readonly Transition[] = [
  { from: 'pending_level_1', level: 1, decision: 'approved', to: 'pending_level_2', generatesPurchaseOrder: false },
  { from: 'pending_level_1', level: 1, decision: 'rejected', to: 'rejected', generatesPurchaseOrder: false },
  { from: 'pending_level_2', level: 2, decision: 'approved', to: 'approved', generatesPurchaseOrder: true },
  { from: 'pending_level_2', level: 2, decision: 'rejected', to: 'rejected', generatesPurchaseOrder: false },
];

const TERMINAL: ReadonlySet<RequestStatus> = new Set<RequestStatus>(['approved', 'rejected']);

export function isTerminal(status: RequestStatus): boolean {
  return TERMINAL.has(status);
}

/** The status in which a level is open for decision. */
export function pendingStatusFor(level: ApprovalLevel): RequestStatus {
  return level === 1 ? 'pending_level_1' : 'pending_level_2';
}

export function transition(
  current: RequestStatus,
  level: ApprovalLevel,
  decision: Decision,
): Transition {
  const match = TRANSITIONS.find(
    (t) => t.from === current && t.level === level && t.decision === decision,
  );
  if (!match) {
    throw new InvalidStateError(
      isTerminal(current)
        ? `Request is ${current}; no further decisions are accepted`
        : `Level ${level} cannot be decided while the request is ${current}`,
      current,
    );
  }
  return match;
}

export function isRequestStatus(value: unknown): value is RequestStatus {
  return REQUEST_STATUSES.some((status) => status === value);
}

export function parseRequestStatus(value: unknown): RequestStatus {
  if (!isRequestStatus(value)) {
    throw new ValidationError(`Unknown request status: ${String(value)}`, 'status');
  }
  return value;
}

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

export function parseApprovalLevel(value: unknown): ApprovalLevel {
  if (value === 1 || value === 2) return value;
  throw new ValidationError('level must be 1 or 2', 'level');
}

export function parseDecision(value: unknown): Decision {
  if (value === 'approved' || value === 'rejected') return value;
  throw new ValidationError("decision must be 'approved' or 'rejected'", 'decision');
}
