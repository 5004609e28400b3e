/**
 * OpenTelemetry Integration
 *
 * Thin helpers over @opentelemetry/api. Spans are only created when
 * OTEL_ENABLED=true; a tracer provider must be registered by the host
 * process (for example through the Node SDK's --import hook).
 *
 * This module provides utilities to:
 * - Check if OTEL is enabled
 * - Set route attributes on the active request span
 * - Create custom spans for database and outgoing HTTP operations
 *
 * @module
 */

import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';

// ============================================================================
// Configuration
// ============================================================================

/**
 * Check if OpenTelemetry is enabled via OTEL_ENABLED environment variable
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

/**
 * Service name reported on spans
 */
export function getServiceName(): string {
  return process.env.OTEL_SERVICE_NAME ?? 'doro-stickers';
}

// ============================================================================
// Span Access and Manipulation
// ============================================================================

/**
 * Get the currently active span from the context
 * Returns undefined if no span is active or OTEL is not enabled
 */
export function getActiveSpan(): Span | undefined {
  if (!isOTELEnabled()) return undefined;
  return trace.getActiveSpan();
}

/**
 * Set the http.route attribute on the active span and update its name
 *
 * @param routePattern - The matched route pattern (e.g., '/api/stickers/:id')
 */
export function setRouteAttribute(routePattern: string, method: string): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', routePattern);
    span.updateName(`${method} ${routePattern}`);
  }
}

/**
 * Record an exception on the active span and set error status
 */
export function recordSpanException(error: Error, message?: string): void {
  const span = getActiveSpan();
  if (span) {
    span.recordException(error);
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: message ?? error.message,
    });
  }
}

// ============================================================================
// Span Creation Utilities
// ============================================================================

/** Cached tracer instance */
let _tracer: Tracer | undefined;

/**
 * Get the OpenTelemetry tracer for this service
 */
export function getOTELTracer(): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(getServiceName());
  }
  return _tracer;
}

export interface CreateSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * Create a new span and run a function within its context
 * The span is automatically ended when the function completes
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | undefined) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    return await fn(undefined);
  }

  return getOTELTracer().startActiveSpan(
    name,
    {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    context.active(),
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

/**
 * Create a database operation span
 *
 * @param operation - Database operation name (e.g., 'get', 'set', 'commit')
 * @param key - Key or key prefix being accessed
 */
export async function withDbSpan<T>(
  operation: string,
  key: readonly unknown[],
  fn: (span: Span | undefined) => Promise<T>,
): Promise<T> {
  return withSpan(`db.${operation}`, fn, {
    kind: SpanKind.CLIENT,
    attributes: {
      'db.system': 'deno_kv',
      'db.operation': operation,
      'db.key': JSON.stringify(key),
    },
  });
}

/**
 * Create an HTTP client span for outgoing requests
 */
export async function withHttpClientSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | undefined) => Promise<T>,
): Promise<T> {
  const urlObj = new URL(url);
  return withSpan(`HTTP ${method}`, fn, {
    kind: SpanKind.CLIENT,
    attributes: {
      'http.method': method,
      'http.url': url,
      'http.scheme': urlObj.protocol.replace(':', ''),
      'http.host': urlObj.host,
      'http.target': urlObj.pathname + urlObj.search,
    },
  });
}
