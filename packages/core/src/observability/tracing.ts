import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, Span } from '@opentelemetry/api';

const TRACER_NAME = 'eavstore';

export type StoreOperation =
  | 'create_ent'
  | 'update_ent'
  | 'upsert_ent'
  | 'query_ents'
  | 'execute_sql';

export function getStoreTracer() {
  return trace.getTracer(TRACER_NAME);
}

export function finishSpan(span: Span, error?: unknown): void {
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
 * Run one store operation inside an active `eav.<operation>` span, so the
 * query spans of instrumented drivers nest under it.
 */
export function traceStoreOperation<T>(
  operation: StoreOperation,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return getStoreTracer().startActiveSpan(`eav.${operation}`, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      finishSpan(span);
      return result;
    } catch (error) {
      finishSpan(span, error);
      throw error;
    }
  });
}
