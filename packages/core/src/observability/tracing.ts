import { trace, SpanStatusCode } from '@opentelemetry/api';
import type { Attributes, Span } from '@opentelemetry/api';

const tracer = trace.getTracer('requisition');

export const SPANS = {
  decide: 'approval.decide',
  validateReceipt: 'receipt.validate',
} as const;

export type SpanName = (typeof SPANS)[keyof typeof SPANS];

function finish(span: Span, error?: unknown): void {
  if (error === undefined) {
    span.setStatus({ code: SpanStatusCode.OK });
  } else {
    const exception = error instanceof Error ? error : new Error(String(error));
    span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
    span.recordException(exception);
  }
  span.end();
}

/**
 * Runs `work` inside an active span. A throw marks the span as failed and is
 * rethrown unchanged.
 */
export function traced<T>(name: SpanName, attributes: Attributes, work: (span: Span) => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await work(span);
      finish(span);
      return result;
    } catch (error) {
      finish(span, error);
      throw error;
    }
  });
}

export function tracedSync<T>(name: SpanName, attributes: Attributes, work: (span: Span) => T): T {
  return tracer.startActiveSpan(name, { attributes }, (span) => {
    try {
      const result = work(span);
      finish(span);
      return result;
    } catch (error) {
      finish(span, error);
      throw error;
    }
  });
}
