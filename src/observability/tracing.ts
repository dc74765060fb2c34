/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * One `rss.parse` span per parse call, plus a correlation ID for log lines.
 * The host application registers its own tracer provider; without one the
 * API hands out no-op spans.
 *
 * Enable via parser config (`tracing.enabled`) or the environment:
 * - OTEL_ENABLED=1
 */

import { trace, SpanStatusCode } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'rss-feed-core';

/**
 * Check if OpenTelemetry is enabled
 */
export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the global tracer instance, or null when tracing is off
 */
export function getTracer(enabled: boolean = isOTelEnabled()) {
  if (!enabled) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for a parse call
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a synchronous function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @param enabled - Overrides the OTEL_ENABLED check
 * @returns Result of fn
 */
export function withSpan<T>(
  name: string,
  fn: (span: Span | null) => T,
  attributes?: Record<string, string | number | boolean>,
  enabled?: boolean
): T {
  const tracer = getTracer(enabled ?? isOTelEnabled());

  // If tracing disabled, execute without span
  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const exception = error instanceof Error ? error : new Error(String(error));
      span.recordException(exception);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: exception.message,
      });

      throw error;
    } finally {
      span.end();
    }
  });
}
