import type { ErrorCode, Precondition } from '@requisition/core';

export interface IntentActor {
  type: 'human' | 'system';
  id: string;
  name?: string;
}

export interface Intent {
  intent_type: string;
  actor: IntentActor;
  data: Record<string, unknown>;
  correlation_id?: string;
}

export type IntentErrorCode = ErrorCode | 'UNKNOWN_INTENT';

export interface IntentResult<T = unknown> {
  success: boolean;
  intent_id: string;
  result?: T;
  error?: string;
  error_code?: IntentErrorCode;
  /** Which check refused the intent, for permission and state failures. */
  precondition?: Precondition;
  /** Offending input field, for validation failures. */
  field?: string;
}

export interface IntentHandler {
  intent_type: string;
  execute(intent: Intent, intentId: string): Promise<IntentResult>;
}
