/**
 * Tracing utilities — thin wrapper around OpenTelemetry API.
 *
 * No SDK is registered by this package; a deployment that wants spans exported
 * registers one before the service starts. Without it every helper is a no-op.
 */
import { trace, context, SpanStatusCode, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'palaver';

/** Get a tracer instance */
export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

/** Trace id of the active span, if any */
export function activeTraceId(): string | undefined {
  return trace.getActiveSpan()?.spanContext().traceId;
}

/**
 * Wrap an async function in an OTel span.
 * Records the error and marks the span failed when `fn` throws.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  return context.with(context.active(), () => {
    return tracer.startActiveSpan(name, { attributes }, async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
        span.recordException(error instanceof Error ? error : new Error(String(error)));
        throw error;
      } finally {
        span.end();
      }
    });
  });
}
