import { z } from 'zod';
import type { ProcurementService } from '@requisition/core';
import type { Intent, IntentResult, IntentHandler } from '../types.js';
import { failure, parseIntentData, toIntentResult } from '../intent-result.js';

const submitSchema = z.object({
  title: z.string({ required_error: 'title is required', invalid_type_error: 'title must be text' }),
  description: z.string().optional(),
  items: z.unknown(),
});

export class RequestSubmitHandler implements IntentHandler {
  readonly intent_type = 'procurement.request.submit';

  constructor(private readonly service: ProcurementService) {}

  async execute(intent: Intent, intentId: string): Promise<IntentResult> {
    const data = parseIntentData(submitSchema, intent.data);
    if (!data.ok) return failure(intentId, data.error);

    return toIntentResult(
      intentId,
      await this.service.submitRequest(intent.actor.id, {
        title: data.value.title,
        description: data.value.description,
        items: data.value.items,
      }),
    );
  }
}
