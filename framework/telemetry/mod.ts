/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry spans.
 */

export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  formatLogEntry,
  streamSink,
  loggerDefaults,
  isLogLevel,
  isLogFormat,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
  type LogSink,
  type RequestLogContext,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELTracer,
  withSpan,
  recordException,
  TRACER_NAME,
  TRACER_VERSION,
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
  type Tracer as OTELTracer,
  type Span as OTELSpan,
  type Context as OTELContext,
  type Attributes as OTELAttributes,
} from './otel.ts';
