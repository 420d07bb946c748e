import { z } from 'zod';
import type { ProcurementService } from '@requisition/core';
import type { Intent, IntentResult, IntentHandler } from '../types.js';
import { failure, parseIntentData, toIntentResult } from '../intent-result.js';

const importSchema = z.object({
  title: z.string({ required_error: 'title is required' }),
  description: z.string().optional(),
  document: z.object(
    {
      file_name: z.string().min(1),
      content_type: z.string().min(1),
      content: z.string(),
    },
    { required_error: 'document is required' },
  ),
});

export class ProformaImportHandler implements IntentHandler {
  readonly intent_type = 'procurement.proforma.import';

  constructor(private readonly service: ProcurementService) {}

  async execute(intent: Intent, intentId: string): Promise<IntentResult> {
    const data = parseIntentData(importSchema, intent.data);
    if (!data.ok) return failure(intentId, data.error);

    return toIntentResult(intentId, await this.service.importProforma(intent.actor.id, data.value));
  }
}
