import { z } from 'zod';
import type { ProcurementService } from '@requisition/core';
import type { Intent, IntentResult, IntentHandler } from '../types.js';
import { failure, parseIntentData, toIntentResult } from '../intent-result.js';

// level and decision are checked by the service so their messages match
// across transports.
const decideSchema = z.object({
  request_id: z.string({ required_error: 'request_id is required' }).min(1, 'request_id is required'),
  level: z.unknown(),
  decision: z.unknown(),
  comment: z.string().nullish(),
});

export class RequestDecideHandler implements IntentHandler {
  readonly intent_type = 'procurement.request.decide';

  constructor(private readonly service: ProcurementService) {}

  async execute(intent: Intent, intentId: string): Promise<IntentResult> {
    const data = parseIntentData(decideSchema, intent.data);
    if (!data.ok) return failure(intentId, data.error);

    const { request_id, level, decision, comment } = data.value;
    return toIntentResult(
      intentId,
      await this.service.decide(request_id, level, intent.actor.id, decision, comment),
    );
  }
}
