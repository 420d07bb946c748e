import { z } from 'zod';
import type { ProcurementService } from '@requisition/core';
import type { Intent, IntentResult, IntentHandler } from '../types.js';
import { failure, parseIntentData, toIntentResult } from '../intent-result.js';

const withdrawSchema = z.object({
  request_id: z.string({ required_error: 'request_id is required' }).min(1, 'request_id is required'),
});

export class RequestWithdrawHandler implements IntentHandler {
  readonly intent_type = 'procurement.request.withdraw';

  constructor(private readonly service: ProcurementService) {}

  async execute(intent: Intent, intentId: string): Promise<IntentResult> {
    const data = parseIntentData(withdrawSchema, intent.data);
    if (!data.ok) return failure(intentId, data.error);

    return toIntentResult(intentId, await this.service.withdrawRequest(data.value.request_id, intent.actor.id));
  }
}
