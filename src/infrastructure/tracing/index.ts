/**
 * Distributed Tracing Module
 *
 * OpenTelemetry setup, W3C trace context carried in pub/sub payloads, and
 * spans for workspace operations.
 *
 * @example
 * ```typescript
 * import { initTracing, injectTraceparent, shutdownTracing } from './infrastructure/tracing/index.js';
 *
 * initTracing({ serviceName: 'sensor', otlpEndpoint: 'http://localhost:4318/v1/traces' });
 * const carrier = injectTraceparent();
 * // ... put carrier.traceparent ...
 * await shutdownTracing();
 * ```
 */

// Types
export type { TraceContext, TracingConfig } from './types.js';

export {
  SpanNames,
  AttributeKeys,
  EventNames,
  MESSAGING_SYSTEM,
  TRACEPARENT_HEADER,
  DEFAULT_TRACING_CONFIG,
} from './types.js';

// Context propagation
export {
  NON_STRING_PAYLOAD,
  parseTraceparent,
  formatTraceparent,
  injectTraceparent,
  traceparentOf,
  carrierFromValue,
  extractParentContext,
  traceContextOf,
  describeContext,
  getCurrentTraceContext,
  getCorrelationId,
} from './TraceContext.js';
export type { Carrier } from './TraceContext.js';

// Tracer
export {
  LoggingSpanProcessor,
  logSpanSummary,
  initTracing,
  getTracer,
  isTracingActive,
  shutdownTracing,
} from './Tracer.js';
export type { TracingOptions } from './Tracer.js';

// Pub/Sub Instrumentation
export {
  createPubSubAttributes,
  recordFailure,
  withOperationSpan,
  startReceiveSpan,
  startChildSpan,
  runInSpan,
} from './PubSubInstrumentation.js';
export type { PubSubMessageAttributes, PubSubOperation } from './PubSubInstrumentation.js';

// Correlation Logging
export { traceContextMixin, withTraceContext, getTracingLoggerOptions } from './CorrelationLogger.js';
