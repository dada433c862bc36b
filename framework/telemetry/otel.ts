/**
 * OpenTelemetry Integration
 *
 * Span helpers for decoration work that crosses into the data layer
 * (association loading) and span events for decoration diagnostics.
 *
 * When tracing is disabled the helpers run the work against a no-op span, so
 * callers never branch on whether telemetry is configured.
 *
 * @module
 */

import {
  trace,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';
import { getConfig } from '../config/config.ts';

/**
 * Check if tracing is enabled, via config `tracing.enabled` or OTEL_ENABLED
 */
export function isOTELEnabled(): boolean {
  return getConfig().get<boolean>('tracing.enabled', false) || process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the currently active span, if tracing is enabled and one is active
 */
export function getActiveSpan(): Span | undefined {
  if (!isOTELEnabled()) return undefined;
  return trace.getActiveSpan();
}

/**
 * Add an event to the active span
 */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = getActiveSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}

let _tracer: Tracer | undefined;

/**
 * Get the tracer for the decoration layer
 */
export function getOTELTracer(version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(getConfig().get<string>('tracing.serviceName', 'mantle'), version);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * Run a synchronous function inside a new span.
 * The span is ended when the function returns or throws.
 */
export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  options: CreateSpanOptions = {},
): T {
  const span = isOTELEnabled()
    ? getOTELTracer().startSpan(name, {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    })
    : trace.getTracer('noop').startSpan('noop');

  try {
    const result = fn(span);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    if (error instanceof Error) {
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    }
    throw error;
  } finally {
    span.end();
  }
}

export { trace, SpanKind, SpanStatusCode, type Tracer, type Span, type Attributes };
