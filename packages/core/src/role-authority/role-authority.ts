import { EntityNotFoundError, PermissionDeniedError } from '../shared/errors.js';
import type { Precondition } from '../shared/errors.js';
import type { PurchaseRequest, Role, UserProfile } from '../domain/types.js';

export const ACTIONS = [
  'create_request',
  'edit_request',
  'decide_level1',
  'decide_level2',
  'view_finance',
  'view_request',
  'view_purchase_order',
] as const;
export type Action = (typeof ACTIONS)[number];

export type AuthorizationSubject = Pick<PurchaseRequest, 'id' | 'requester_id' | 'status'>;

export type AuthorizationDecision =
  | { allowed: true }
  | { allowed: false; precondition: Exclude<Precondition, 'idempotency'>; reason: string };

const ROLE_LABELS: Record<Role, string> = {
  staff: 'Staff',
  approver_level_1: 'Approver Level 1',
  approver_level_2: 'Approver Level 2',
  finance: 'Finance',
};

function allow(): AuthorizationDecision {
  return { allowed: true };
}

function deny(
  precondition: Exclude<Precondition, 'idempotency'>,
  reason: string,
): AuthorizationDecision {
  return { allowed: false, precondition, reason };
}

function requireRole(identity: UserProfile, role: Role, action: Action): AuthorizationDecision | null {
  if (identity.role === role) return null;
  return deny(
    'role',
    `${action} requires role ${ROLE_LABELS[role]}; ${identity.id} is ${ROLE_LABELS[identity.role]}`,
  );
}

function decideLevel(
  identity: UserProfile,
  request: AuthorizationSubject,
  action: 'decide_level1' | 'decide_level2',
): AuthorizationDecision {
  const role: Role = action === 'decide_level1' ? 'approver_level_1' : 'approver_level_2';
  const pending = action === 'decide_level1' ? 'pending_level_1' : 'pending_level_2';

  const roleDenied = requireRole(identity, role, action);
  if (roleDenied) return roleDenied;

  if (request.status !== pending) {
    return deny('state', `${action} requires status ${pending}; request ${request.id} is ${request.status}`);
  }

  if (request.requester_id === identity.id) {
    return deny('self_approval', `${identity.id} cannot decide on their own request ${request.id}`);
  }

  return allow();
}

/**
 * Pure role/ownership/state decision for one action on one request. The rule
 * set is fixed.
 */
export function authorize(
  identity: UserProfile,
  action: Action,
  request: AuthorizationSubject,
): AuthorizationDecision {
  switch (action) {
    case 'create_request':
    case 'edit_request': {
      const roleDenied = requireRole(identity, 'staff', action);
      if (roleDenied) return roleDenied;
      if (request.requester_id !== identity.id) {
        return deny('ownership', `${action} is limited to the requester of ${request.id}`);
      }
      return allow();
    }

    case 'decide_level1':
    case 'decide_level2':
      return decideLevel(identity, request, action);

    case 'view_finance': {
      const roleDenied = requireRole(identity, 'finance', action);
      if (roleDenied) return roleDenied;
      if (request.status !== 'approved') {
        return deny('state', `Request ${request.id} is not approved (status: ${request.status})`);
      }
      return allow();
    }

    case 'view_request':
      if (identity.role === 'staff' && request.requester_id !== identity.id) {
        return deny('ownership', `${action} is limited to the requester of ${request.id}`);
      }
      if (identity.role === 'finance' && request.status !== 'approved') {
        return deny('state', `Request ${request.id} is not approved (status: ${request.status})`);
      }
      return allow();

    case 'view_purchase_order':
      if (identity.role === 'finance') return allow();
      if (identity.role === 'staff' && request.requester_id === identity.id) return allow();
      return deny(
        'role',
        `${action} requires role ${ROLE_LABELS.finance} or the requester; ${identity.id} is ${ROLE_LABELS[identity.role]}`,
      );
  }
}

type SingleRoleAction = Exclude<Action, 'view_request' | 'view_purchase_order'>;

const ACTION_ROLES: Record<SingleRoleAction, Role> = {
  create_request: 'staff',
  edit_request: 'staff',
  decide_level1: 'approver_level_1',
  decide_level2: 'approver_level_2',
  view_finance: 'finance',
};

/** Role check alone, for operations that span several requests. */
export function requireActionRole(identity: UserProfile, action: SingleRoleAction): void {
  const denied = requireRole(identity, ACTION_ROLES[action], action);
  if (denied && !denied.allowed) {
    throw new PermissionDeniedError(denied.reason, denied.precondition);
  }
}

/** Throws NotFound for a missing request and PermissionDenied for a refusal. */
export function requireAuthorization(
  identity: UserProfile,
  action: Action,
  request: AuthorizationSubject | null,
  requestId: string,
): void {
  if (!request) {
    throw new EntityNotFoundError('purchase_request', requestId);
  }
  const decision = authorize(identity, action, request);
  if (!decision.allowed) {
    throw new PermissionDeniedError(decision.reason, decision.precondition);
  }
}
