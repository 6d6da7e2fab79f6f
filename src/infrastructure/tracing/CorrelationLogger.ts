/**
 * Correlation Logger
 *
 * Adds the active trace context to pino log lines.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { getCorrelationId, getCurrentTraceContext } from './TraceContext.js';

/**
 * Mixin function for Pino to add trace context to every log
 * Usage: pino({ mixin: traceContextMixin })
 */
export function traceContextMixin(): Record<string, unknown> {
  const context = getCurrentTraceContext();

  if (!context) {
    return {};
  }

  return {
    traceId: context.traceId,
    spanId: context.spanId,
    correlationId: getCorrelationId(),
  };
}

/**
 * Create a child logger bound to the current trace context
 */
export function withTraceContext(logger: Logger): Logger {
  const bindings = traceContextMixin();
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

/**
 * Create base logger options with trace context support
 */
export function getTracingLoggerOptions(
  name: string,
  options: pino.LoggerOptions = {}
): pino.LoggerOptions {
  return {
    name,
    mixin: traceContextMixin,
    serializers: {
      ...pino.stdSerializers,
    },
    ...options,
  };
}
