/**
 * Layer 12: Observability & Telemetry
 *
 * Structured logging and OpenTelemetry span helpers.
 *
 * Responsibilities:
 * - Produce structured, levelled logs
 * - Trace database and outgoing HTTP calls when OTEL is enabled
 */

export {
  Logger,
  getLogger,
  setLogger,
  isLogLevel,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';
export {
  isOTELEnabled,
  getServiceName,
  getActiveSpan,
  setRouteAttribute,
  recordSpanException,
  getOTELTracer,
  withSpan,
  withDbSpan,
  withHttpClientSpan,
  type CreateSpanOptions,
} from './otel.ts';
