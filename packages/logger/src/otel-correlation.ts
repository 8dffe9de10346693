/**
 * OpenTelemetry correlation for run phases.
 *
 * Without a registered SDK the API hands out no-op spans, so these helpers cost nothing in a
 * plain CLI run and light up once an exporter is configured.
 */

import { trace, context as otelContext, SpanStatusCode } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';

const TRACER_NAME = 'catalog-price-sync';

export type TraceContext = Readonly<{
  traceId: string | undefined;
  spanId: string | undefined;
}>;

/**
 * Get current trace context from active span
 */
export function getTraceContext(): TraceContext {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (!spanContext || !trace.isSpanContextValid(spanContext)) {
    return { traceId: undefined, spanId: undefined };
  }
  return { traceId: spanContext.traceId, spanId: spanContext.spanId };
}

export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Run a function within a new span context
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = trace.getTracer(TRACER_NAME).startSpan(name, { attributes });

  try {
    const result = await otelContext.with(trace.setSpan(otelContext.active(), span), () =>
      fn(span)
    );
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
    span.recordException(err);
    throw error;
  } finally {
    span.end();
  }
}
