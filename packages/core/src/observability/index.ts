export { SPANS, traced, tracedSync } from './tracing.js';
export type { SpanName } from './tracing.js';
