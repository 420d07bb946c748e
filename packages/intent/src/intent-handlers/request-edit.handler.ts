import { z } from 'zod';
import type { ProcurementService } from '@requisition/core';
import type { Intent, IntentResult, IntentHandler } from '../types.js';
import { failure, parseIntentData, toIntentResult } from '../intent-result.js';

const editSchema = z.object({
  request_id: z.string({ required_error: 'request_id is required' }).min(1, 'request_id is required'),
  items: z.unknown(),
});

export class RequestEditHandler implements IntentHandler {
  readonly intent_type = 'procurement.request.edit';

  constructor(private readonly service: ProcurementService) {}

  async execute(intent: Intent, intentId: string): Promise<IntentResult> {
    const data = parseIntentData(editSchema, intent.data);
    if (!data.ok) return failure(intentId, data.error);

    return toIntentResult(
      intentId,
      await this.service.editRequest(data.value.request_id, intent.actor.id, data.value.items),
    );
  }
}
