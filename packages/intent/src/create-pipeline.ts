import type { ProcurementService } from '@requisition/core';
import { IntentPipeline } from './intent-pipeline.js';
import { RequestSubmitHandler } from './intent-handlers/request-submit.handler.js';
import { RequestEditHandler } from './intent-handlers/request-edit.handler.js';
import { RequestWithdrawHandler } from './intent-handlers/request-withdraw.handler.js';
import { RequestDecideHandler } from './intent-handlers/request-decide.handler.js';
import { ProformaImportHandler } from './intent-handlers/proforma-import.handler.js';

/** Pipeline with every procurement intent registered. */
export function createIntentPipeline(service: ProcurementService): IntentPipeline {
  const pipeline = new IntentPipeline();
  pipeline.registerHandler(new RequestSubmitHandler(service));
  pipeline.registerHandler(new RequestEditHandler(service));
  pipeline.registerHandler(new RequestWithdrawHandler(service));
  pipeline.registerHandler(new RequestDecideHandler(service));
  pipeline.registerHandler(new ProformaImportHandler(service));
  return pipeline;
}
