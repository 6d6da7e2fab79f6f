/**
 * Distributed Tracing Types
 *
 * Configuration and naming conventions for the OpenTelemetry setup.
 * Trace context follows the W3C Trace Context specification.
 */

import { VERSION } from '../../version.js';

/**
 * Trace context following W3C Trace Context specification
 * @see https://www.w3.org/TR/trace-context/
 */
export interface TraceContext {
  /** 32-character hex trace ID */
  traceId: string;
  /** 16-character hex span ID */
  spanId: string;
  /** Trace flags (sampled, etc.) */
  traceFlags: number;
}

/**
 * Tracing configuration
 */
export interface TracingConfig {
  /** Service name for traces */
  serviceName: string;
  /** Service version */
  serviceVersion?: string;
  /** Environment (production, staging, development) */
  environment?: string;
  /** Enable tracing; when false spans are no-ops and nothing is injected */
  enabled: boolean;
  /** Sampling rate for root spans (0.0 to 1.0) */
  samplingRate: number;
  /** OTLP/HTTP traces URL; no exporter is installed when absent */
  otlpEndpoint?: string;
  /** Maximum spans per export batch */
  maxExportBatchSize: number;
  /** Export interval in milliseconds */
  exportIntervalMs: number;
  /** Log every ended span at debug level */
  logSpans: boolean;
}

/**
 * Default tracing configuration
 */
export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  serviceName: 'pubtrace',
  serviceVersion: VERSION,
  environment: 'development',
  enabled: true,
  samplingRate: 1.0,
  maxExportBatchSize: 512,
  exportIntervalMs: 5000,
  logSpans: false,
};

export const TRACEPARENT_HEADER = 'traceparent';

/**
 * Span names used by the workspace instrumentation and the commands
 */
export const SpanNames = {
  /** Workspace operations */
  PUT: 'pubtrace.put',
  DELETE: 'pubtrace.delete',
  GET: 'pubtrace.get',
  REPLY: 'pubtrace.reply',
  /** Commands */
  SENSOR_PUT: 'Put data',
  MOTION_COMPUTE: 'Get computing output and start motion',
  SUB_PROCESS: 'Get and process data',
  GET_ROOT: 'Root',
  EVAL_REQUEST: 'Request time',
} as const;

/**
 * Semantic attribute keys following OpenTelemetry conventions
 */
export const AttributeKeys = {
  // Resource (service.name and service.version come from semantic-conventions)
  DEPLOYMENT_ENVIRONMENT: 'deployment.environment',
  PROCESS_PID: 'process.pid',
  PROCESS_EXECUTABLE_PATH: 'process.executable.path',
  // Messaging
  MESSAGING_SYSTEM: 'messaging.system',
  MESSAGING_DESTINATION: 'messaging.destination',
  MESSAGING_OPERATION: 'messaging.operation',
  // pubtrace
  SELECTOR: 'pubtrace.selector',
  ENCODING: 'pubtrace.encoding',
  CHANGE_KIND: 'pubtrace.change.kind',
  REPLY_COUNT: 'pubtrace.reply.count',
} as const;

export const MESSAGING_SYSTEM = 'nats';

/**
 * Span event names
 */
export const EventNames = {
  PROCESS_START: 'Start process data',
  PROCESS_FINISH: 'Finish process',
  GET_RETURN_DATA: 'Get the return data',
} as const;
