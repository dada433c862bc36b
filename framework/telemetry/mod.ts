/**
 * Telemetry
 *
 * Diagnostic logging and tracing for the decoration layer.
 */

export {
  Logger,
  getLogger,
  setLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  getActiveSpan,
  addSpanEvent,
  getOTELTracer,
  withSpanSync,
  trace,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
  type Tracer as OTELTracer,
  type Span as OTELSpan,
  type Attributes as OTELAttributes,
} from './otel.ts';
