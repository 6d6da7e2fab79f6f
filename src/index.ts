/**
 * pubtrace
 *
 * Pub/sub sessions over NATS with W3C trace context carried in payloads.
 */

export * from './session/index.js';
export * from './infrastructure/tracing/index.js';
export * from './errors.js';
export { loadConfig, getConfig, resetConfig, resolveOtlpEndpoint } from './config.js';
export type { Config } from './config.js';
export { createLogger, createSilentLogger } from './logger.js';
export { VERSION } from './version.js';
