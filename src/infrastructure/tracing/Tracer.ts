/**
 * Tracer Setup
 *
 * Installs the OpenTelemetry tracer provider, the W3C propagator and the
 * async context manager for the current process, and tears them down.
 */

import { context, propagation, trace, type Context, type Tracer } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import { W3CTraceContextPropagator, hrTimeToMilliseconds } from '@opentelemetry/core';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  ParentBasedSampler,
  TraceIdRatioBasedSampler,
  type ReadableSpan,
  type Span,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import pino, { type Logger } from 'pino';
import { TracingError } from '../../errors.js';
import type { TracingConfig } from './types.js';
import { AttributeKeys, DEFAULT_TRACING_CONFIG } from './types.js';

const defaultLogger = pino({ name: 'tracing:tracer', level: 'silent' });

/**
 * Logs every ended span at debug level
 */
export class LoggingSpanProcessor implements SpanProcessor {
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger;
  }

  onStart(span: Span, _parentContext: Context): void {
    this.log.debug({ spanName: span.name, traceId: span.spanContext().traceId }, 'Span started');
  }

  onEnd(span: ReadableSpan): void {
    logSpanSummary(this.log, span);
  }

  async forceFlush(): Promise<void> {
    // Nothing buffered
  }

  async shutdown(): Promise<void> {
    // Nothing to release
  }
}

/**
 * Log span summary for debugging
 */
export function logSpanSummary(logger: Logger, span: ReadableSpan): void {
  const ctx = span.spanContext();
  logger.debug(
    {
      name: span.name,
      traceId: ctx.traceId,
      spanId: ctx.spanId,
      parentSpanId: span.parentSpanContext?.spanId,
      durationMs: hrTimeToMilliseconds(span.duration),
      status: span.status.code,
      eventCount: span.events.length,
    },
    'Span ended'
  );
}

export interface TracingOptions extends Partial<TracingConfig> {
  /** Extra processors, installed after the exporter */
  spanProcessors?: SpanProcessor[];
  logger?: Logger;
}

/**
 * Active provider for this process
 */
let activeProvider: BasicTracerProvider | null = null;
let activeConfig: TracingConfig | null = null;

function buildResourceAttributes(config: TracingConfig): Record<string, string | number> {
  return {
    [ATTR_SERVICE_NAME]: config.serviceName,
    [ATTR_SERVICE_VERSION]: config.serviceVersion ?? DEFAULT_TRACING_CONFIG.serviceVersion ?? '',
    [AttributeKeys.DEPLOYMENT_ENVIRONMENT]: config.environment ?? 'development',
    [AttributeKeys.PROCESS_PID]: process.pid,
    [AttributeKeys.PROCESS_EXECUTABLE_PATH]: process.execPath,
  };
}

/**
 * Install tracing for this process.
 *
 * When tracing is disabled only the propagator is installed: spans are
 * no-ops and injecting yields an empty carrier.
 */
export function initTracing(options: TracingOptions = {}): BasicTracerProvider | null {
  const { spanProcessors = [], logger = defaultLogger, ...overrides } = options;
  const config: TracingConfig = { ...DEFAULT_TRACING_CONFIG, ...overrides };
  const log = logger.child({ component: 'tracing' });

  if (activeProvider) {
    log.warn('Tracing already initialized, returning existing provider');
    return activeProvider;
  }

  propagation.setGlobalPropagator(new W3CTraceContextPropagator());
  activeConfig = config;

  if (!config.enabled) {
    log.info({ serviceName: config.serviceName }, 'Tracing disabled');
    return null;
  }

  if (config.samplingRate < 0 || config.samplingRate > 1) {
    throw new TracingError(`Sampling rate must be between 0 and 1, got ${config.samplingRate}`);
  }

  const processors: SpanProcessor[] = [];
  if (config.otlpEndpoint) {
    processors.push(
      new BatchSpanProcessor(new OTLPTraceExporter({ url: config.otlpEndpoint }), {
        maxExportBatchSize: config.maxExportBatchSize,
        scheduledDelayMillis: config.exportIntervalMs,
      })
    );
  }
  if (config.logSpans) {
    processors.push(new LoggingSpanProcessor(log));
  }
  processors.push(...spanProcessors);

  const contextManager = new AsyncLocalStorageContextManager();
  contextManager.enable();
  context.setGlobalContextManager(contextManager);

  const provider = new BasicTracerProvider({
    resource: resourceFromAttributes(buildResourceAttributes(config)),
    sampler: new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(config.samplingRate) }),
    spanProcessors: processors,
  });
  trace.setGlobalTracerProvider(provider);
  activeProvider = provider;

  log.info(
    {
      serviceName: config.serviceName,
      samplingRate: config.samplingRate,
      otlpEndpoint: config.otlpEndpoint,
    },
    'Tracing initialized'
  );

  return provider;
}

/**
 * Tracer for instrumentation scope `name`
 */
export function getTracer(name: string = activeConfig?.serviceName ?? DEFAULT_TRACING_CONFIG.serviceName): Tracer {
  return trace.getTracer(name, activeConfig?.serviceVersion);
}

export function isTracingActive(): boolean {
  return activeProvider !== null;
}

/**
 * Flush pending spans to the exporter and release the provider and globals
 */
export async function shutdownTracing(): Promise<void> {
  const provider = activeProvider;
  activeProvider = null;
  activeConfig = null;

  try {
    if (provider) {
      await provider.forceFlush();
      await provider.shutdown();
    }
  } finally {
    trace.disable();
    context.disable();
    propagation.disable();
  }
}
