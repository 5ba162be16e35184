// runtime/src/tracing.ts
import { context, trace, Span, Tracer, SpanStatusCode, Attributes } from "@opentelemetry/api";

let tracer: Tracer | null = null;

/**
 * Initialize the OpenTelemetry tracer.
 * Call this once when the engine is created; without a registered SDK the API is a no-op.
 */
export function initTracer(serviceName: string): Tracer {
  tracer = trace.getTracer(serviceName);
  return tracer;
}

export function getTracer(): Tracer {
  if (!tracer) tracer = trace.getTracer("eda-engine");
  return tracer;
}

/**
 * Run fn inside a new active span. The span is marked ERROR and the
 * exception recorded when fn throws; the error is rethrown.
 */
export function startSpan<T>(
  name: string,
  attrs: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = getTracer().startSpan(name, { attributes: attrs });
  return context.with(trace.setSpan(context.active(), span), async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const e = err instanceof Error ? err : new Error(String(err));
      span.setStatus({ code: SpanStatusCode.ERROR, message: e.message });
      span.recordException(e);
      throw err;
    } finally {
      span.end();
    }
  });
}

/**
 * Add an event to a span, if there is one.
 */
export function addSpanEvent(span: Span | undefined, event: string, attrs?: Attributes): void {
  if (span) span.addEvent(event, attrs);
}
