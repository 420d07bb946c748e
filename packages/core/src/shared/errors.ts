import type { ApprovalLevel, RequestStatus } from '../domain/types.js';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'PERMISSION_DENIED'
  | 'INVALID_STATE'
  | 'ALREADY_DECIDED'
  | 'NOT_FOUND'
  | 'DUPLICATE_PO'
  | 'PO_GENERATION_FAILED'
  | 'CONCURRENCY_CONFLICT'
  | 'AUTHENTICATION_FAILED';

/** Which precondition a refused action failed. */
export type Precondition = 'role' | 'ownership' | 'self_approval' | 'state' | 'idempotency';

export abstract class ProcurementError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ProcurementError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export class PermissionDeniedError extends ProcurementError {
  readonly code = 'PERMISSION_DENIED';

  constructor(
    message: string,
    public readonly precondition: Exclude<Precondition, 'idempotency'>,
  ) {
    super(message);
  }
}

export class InvalidStateError extends ProcurementError {
  readonly code = 'INVALID_STATE';
  readonly precondition = 'state';

  constructor(
    message: string,
    public readonly currentStatus: RequestStatus,
  ) {
    super(message);
  }
}

export class AlreadyDecidedError extends ProcurementError {
  readonly code = 'ALREADY_DECIDED';
  readonly precondition = 'idempotency';

  constructor(
    public readonly requestId: string,
    public readonly level: ApprovalLevel,
  ) {
    super(`Level ${level} has already been decided for request ${requestId}`);
  }
}

export class EntityNotFoundError extends ProcurementError {
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly entityType: string,
    public readonly entityId: string,
  ) {
    super(`Entity not found: ${entityType}/${entityId}`);
  }
}

export class DuplicatePurchaseOrderError extends ProcurementError {
  readonly code = 'DUPLICATE_PO';

  constructor(public readonly requestId: string) {
    super(`A purchase order already exists for request ${requestId}`);
  }
}

export class PurchaseOrderGenerationError extends ProcurementError {
  readonly code = 'PO_GENERATION_FAILED';

  constructor(
    public readonly requestId: string,
    cause: unknown,
  ) {
    super(
      `Purchase order generation failed for request ${requestId}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class ConcurrencyConflictError extends ProcurementError {
  readonly code = 'CONCURRENCY_CONFLICT';

  constructor(
    public readonly entityId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(
      `Concurrency conflict on entity ${entityId}: expected version ${expectedVersion}, actual ${actualVersion}`,
    );
  }
}

export class AuthenticationError extends ProcurementError {
  readonly code = 'AUTHENTICATION_FAILED';
}

export function isProcurementError(error: unknown): error is ProcurementError {
  return error instanceof ProcurementError;
}
