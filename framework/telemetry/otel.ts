/**
 * OpenTelemetry Integration
 *
 * Request spans through `@opentelemetry/api`. The API is a no-op until an
 * SDK registers a tracer provider, and spans are only started at all when
 * OTEL_ENABLED=true; otherwise callers get a non-recording span.
 *
 * @module
 */

import {
  trace,
  context,
  INVALID_SPAN_CONTEXT,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
} from '@opentelemetry/api';

export const TRACER_NAME = 'jsonroute';
export const TRACER_VERSION = '0.1.0';

export function isOTELEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.OTEL_ENABLED === 'true';
}

let tracer: Tracer | undefined;

export function getOTELTracer(): Tracer {
  tracer ??= trace.getTracer(TRACER_NAME, TRACER_VERSION);
  return tracer;
}

export interface CreateSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
  parentContext?: Context;
}

/**
 * Run `fn` inside an active span that ends when `fn` settles
 *
 * A rejection is recorded on the span and passed on unchanged.
 */
export function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {}
): Promise<T> {
  if (!isOTELEnabled()) {
    return fn(trace.wrapSpanContext(INVALID_SPAN_CONTEXT));
  }

  return getOTELTracer().startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    options.parentContext ?? context.active(),
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        recordException(span, error);
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Mark a span failed with the given error
 */
export function recordException(span: Span, error: unknown, message?: string): void {
  const err = error instanceof Error ? error : new Error(String(error));
  span.recordException(err);
  span.setStatus({ code: SpanStatusCode.ERROR, message: message ?? err.message });
}

export {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
};
