/**
 * Tracing utilities over the OpenTelemetry API.
 *
 * No SDK is started here; spans are no-ops unless the host process registers one.
 */
import { trace, SpanStatusCode, type Attributes, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'toolrelay';

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

/** Get a tracer instance */
export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

/** Trace id of the active span, if any */
export function currentTraceId(): string | undefined {
  return trace.getActiveSpan()?.spanContext().traceId;
}

function definedAttributes(attributes: SpanAttributes): Attributes {
  const result: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Wrap an async function in an OTel span. Undefined attributes are left off.
 * Records errors and sets span status.
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes: definedAttributes(attributes) }, async (span) => {
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
}
