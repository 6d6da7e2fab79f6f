import { z } from 'zod';
import { ConfigValidationError } from './errors.js';

const DEFAULT_OTLP_TRACES_ENDPOINT = 'http://localhost:4318/v1/traces';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),

  // Tracing
  tracingEnabled: booleanFlag.default('true'),
  samplingRate: z.number().min(0).max(1).default(1),
  logSpans: booleanFlag.default('false'),
  serviceName: z.string().min(1).optional(), // overrides the per-command name
  tracesExporter: z.enum(['otlp', 'none']).default('otlp'),
  otlpEndpoint: z.string().url('OTLP endpoint must be a valid URL').default(DEFAULT_OTLP_TRACES_ENDPOINT),

  // Session
  getTimeoutMs: z.number().int().min(100).max(60000).default(3000),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Resolve the OTLP traces URL.
 * OTEL_EXPORTER_OTLP_TRACES_ENDPOINT is used as-is; OTEL_EXPORTER_OTLP_ENDPOINT
 * is a base URL and gets the /v1/traces signal path.
 */
export function resolveOtlpEndpoint(env: NodeJS.ProcessEnv): string | undefined {
  const traces = env['OTEL_EXPORTER_OTLP_TRACES_ENDPOINT'];
  if (traces) {
    return traces;
  }
  const base = env['OTEL_EXPORTER_OTLP_ENDPOINT'];
  if (base) {
    return `${base.replace(/\/+$/, '')}/v1/traces`;
  }
  return undefined;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    nodeEnv: env['NODE_ENV'] || undefined,
    logLevel: env['LOG_LEVEL'] || undefined,
    tracingEnabled: env['TRACING_ENABLED'] || undefined,
    samplingRate: parseNumber(env['TRACE_SAMPLING_RATE']),
    logSpans: env['TRACE_LOG_SPANS'] || undefined,
    serviceName: env['OTEL_SERVICE_NAME'] || undefined,
    tracesExporter: env['OTEL_TRACES_EXPORTER'] || undefined,
    otlpEndpoint: resolveOtlpEndpoint(env),
    getTimeoutMs: parseNumber(env['PUBTRACE_GET_TIMEOUT_MS']),
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
