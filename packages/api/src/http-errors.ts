import type { FastifyReply } from 'fastify';
import type { ProcurementError } from '@requisition/core';
import type { IntentErrorCode, IntentResult } from '@requisition/intent';
import { failure } from '@requisition/intent';

const STATUS: Record<IntentErrorCode, { status: number; label: string }> = {
  VALIDATION_ERROR: { status: 400, label: 'Validation Error' },
  UNKNOWN_INTENT: { status: 400, label: 'Unknown Intent' },
  AUTHENTICATION_FAILED: { status: 401, label: 'Unauthorized' },
  PERMISSION_DENIED: { status: 403, label: 'Forbidden' },
  NOT_FOUND: { status: 404, label: 'Not Found' },
  INVALID_STATE: { status: 409, label: 'Invalid State' },
  ALREADY_DECIDED: { status: 409, label: 'Already Decided' },
  DUPLICATE_PO: { status: 409, label: 'Duplicate Purchase Order' },
  CONCURRENCY_CONFLICT: { status: 409, label: 'Concurrency Conflict' },
  PO_GENERATION_FAILED: { status: 502, label: 'Purchase Order Generation Failed' },
};

export function statusForCode(code: IntentErrorCode | undefined): number {
  return code ? STATUS[code].status : 500;
}

/** Sends a failed intent or service result with the status its code maps to. */
export function sendFailure(reply: FastifyReply, result: IntentResult): FastifyReply {
  const code = result.error_code;
  return reply.status(statusForCode(code)).send({
    error: code ? STATUS[code].label : 'Internal Server Error',
    code,
    message: result.error,
    intent_id: result.intent_id || undefined,
    precondition: result.precondition,
    field: result.field,
  });
}

export function sendError(reply: FastifyReply, error: ProcurementError): FastifyReply {
  return sendFailure(reply, failure('', error));
}
