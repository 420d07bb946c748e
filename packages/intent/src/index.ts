export { IntentPipeline } from './intent-pipeline.js';
export { createIntentPipeline } from './create-pipeline.js';
export { RequestSubmitHandler } from './intent-handlers/request-submit.handler.js';
export { RequestEditHandler } from './intent-handlers/request-edit.handler.js';
export { RequestWithdrawHandler } from './intent-handlers/request-withdraw.handler.js';
export { RequestDecideHandler } from './intent-handlers/request-decide.handler.js';
export { ProformaImportHandler } from './intent-handlers/proforma-import.handler.js';
export { toIntentResult, failure, parseIntentData } from './intent-result.js';
export type { Intent, IntentActor, IntentResult, IntentHandler, IntentErrorCode } from './types.js';
