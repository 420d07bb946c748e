import { generateId, createLogger } from '@requisition/core';
import type { Intent, IntentResult, IntentHandler } from './types.js';

export class IntentPipeline {
  private handlers: Map<string, IntentHandler> = new Map();
  private readonly logger = createLogger('intent-pipeline');

  /** One handler per intent type; registering a type twice is a wiring error. */
  registerHandler(handler: IntentHandler): void {
    if (this.handlers.has(handler.intent_type)) {
      throw new Error(`Handler already registered for intent type: ${handler.intent_type}`);
    }
    this.handlers.set(handler.intent_type, handler);
  }

  intentTypes(): string[] {
    return [...this.handlers.keys()].sort();
  }

  async execute(intent: Intent): Promise<IntentResult> {
    const intentId = generateId();

    const handler = this.handlers.get(intent.intent_type);
    if (!handler) {
      return {
        success: false,
        intent_id: intentId,
        error: `No handler registered for intent type: ${intent.intent_type}`,
        error_code: 'UNKNOWN_INTENT',
      };
    }

    const result = await handler.execute(intent, intentId);

    this.logger.info(
      {
        intent_id: intentId,
        intent_type: intent.intent_type,
        actor_id: intent.actor.id,
        correlation_id: intent.correlation_id,
        success: result.success,
        error_code: result.error_code,
      },
      'intent executed',
    );
    return result;
  }
}
