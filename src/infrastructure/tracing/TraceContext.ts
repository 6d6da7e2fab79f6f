/**
 * Trace Context Propagation
 *
 * W3C traceparent handling on top of the OpenTelemetry global propagator.
 * The pub/sub payload doubles as the carrier: a string value holds the
 * sender's traceparent.
 */

import { context, propagation, trace, type Context } from '@opentelemetry/api';
import type { Value } from '../../session/value.js';
import type { TraceContext } from './types.js';
import { TRACEPARENT_HEADER } from './types.js';

/**
 * Text carrier understood by the propagator
 */
export type Carrier = Record<string, string>;

/**
 * Placeholder carried when a payload is not a string
 */
export const NON_STRING_PAYLOAD = 'other data type';

const TRACE_FLAG_SAMPLED = 0x01;

/**
 * Parse W3C Traceparent header
 * Format: 00-{traceId}-{spanId}-{traceFlags}
 * @see https://www.w3.org/TR/trace-context/#traceparent-header
 */
export function parseTraceparent(header: string): TraceContext | null {
  const parts = header.trim().split('-');
  if (parts.length !== 4) {
    return null;
  }

  const [version, traceId, spanId, flagsHex] = parts;

  // Validate version (currently only 00 is supported)
  if (version !== '00') {
    return null;
  }

  // Validate trace ID (32 hex chars, not all zeros)
  if (!/^[0-9a-f]{32}$/.test(traceId) || traceId === '0'.repeat(32)) {
    return null;
  }

  // Validate span ID (16 hex chars, not all zeros)
  if (!/^[0-9a-f]{16}$/.test(spanId) || spanId === '0'.repeat(16)) {
    return null;
  }

  if (!/^[0-9a-f]{2}$/.test(flagsHex)) {
    return null;
  }

  return {
    traceId,
    spanId,
    traceFlags: parseInt(flagsHex, 16),
  };
}

/**
 * Format trace context as W3C Traceparent header
 */
export function formatTraceparent(ctx: TraceContext): string {
  const flags = ctx.traceFlags.toString(16).padStart(2, '0');
  return `00-${ctx.traceId}-${ctx.spanId}-${flags}`;
}

/**
 * Serialize a context into a fresh carrier through the global propagator.
 * Empty when the context holds no valid span.
 */
export function injectTraceparent(ctx: Context = context.active()): Carrier {
  const carrier: Carrier = {};
  propagation.inject(ctx, carrier);
  return carrier;
}

/**
 * The traceparent of a carrier, if one was injected
 */
export function traceparentOf(carrier: Carrier): string | undefined {
  return carrier[TRACEPARENT_HEADER];
}

/**
 * Build a carrier from a received payload. Non-string payloads yield a
 * placeholder that extracts to no parent.
 */
export function carrierFromValue(value: Value | undefined): Carrier {
  const traceparent = value?.kind === 'StringUtf8' ? value.value : NON_STRING_PAYLOAD;
  return { [TRACEPARENT_HEADER]: traceparent };
}

/**
 * Extract a parent context from a carrier, layered over the active context
 */
export function extractParentContext(carrier: Carrier): Context {
  return propagation.extract(context.active(), carrier);
}

/**
 * The span context a context carries, when valid
 */
export function traceContextOf(ctx: Context): TraceContext | undefined {
  const spanContext = trace.getSpanContext(ctx);
  if (!spanContext || !trace.isSpanContextValid(spanContext)) {
    return undefined;
  }
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
    traceFlags: spanContext.traceFlags,
  };
}

/**
 * One-line rendering of a parent context for console output
 */
export function describeContext(ctx: Context): string {
  const remote = traceContextOf(ctx);
  if (!remote) {
    return 'no parent span';
  }
  const sampled = (remote.traceFlags & TRACE_FLAG_SAMPLED) === TRACE_FLAG_SAMPLED;
  return `trace_id=${remote.traceId} span_id=${remote.spanId} sampled=${sampled}`;
}

/**
 * Current trace context from the active span
 */
export function getCurrentTraceContext(): TraceContext | undefined {
  return traceContextOf(context.active());
}

/**
 * Create a correlation ID from trace context
 * Format: {traceId}-{spanId} (shortened for logging)
 */
export function getCorrelationId(): string | undefined {
  const ctx = getCurrentTraceContext();
  if (!ctx) {
    return undefined;
  }
  return `${ctx.traceId.slice(0, 8)}-${ctx.spanId.slice(0, 8)}`;
}
