import {
  AlreadyDecidedError,
  InvalidStateError,
  PermissionDeniedError,
  ValidationError,
  err,
} from '@requisition/core';
import type { Precondition, ProcurementError, ServiceResult } from '@requisition/core';
import type { z } from 'zod';
import type { IntentResult } from './types.js';

function preconditionOf(error: ProcurementError): Precondition | undefined {
  if (
    error instanceof PermissionDeniedError ||
    error instanceof InvalidStateError ||
    error instanceof AlreadyDecidedError
  ) {
    return error.precondition;
  }
  return undefined;
}

export function failure(intentId: string, error: ProcurementError): IntentResult<never> {
  return {
    success: false,
    intent_id: intentId,
    error: error.message,
    error_code: error.code,
    precondition: preconditionOf(error),
    field: error instanceof ValidationError ? error.field : undefined,
  };
}

export function toIntentResult<T>(intentId: string, outcome: ServiceResult<T>): IntentResult<T> {
  if (!outcome.ok) {
    return failure(intentId, outcome.error);
  }
  return { success: true, intent_id: intentId, result: outcome.value };
}

/** Checks the shape of `intent.data`; the services validate the content. */
export function parseIntentData<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: Record<string, unknown>,
): ServiceResult<T> {
  const parsed = schema.safeParse(data);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const field = issue.path.join('.');
  return err(new ValidationError(field ? `${field}: ${issue.message}` : issue.message, field || undefined));
}
