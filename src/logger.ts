/**
 * Process logger
 *
 * pino on stderr so stdout carries only command output.
 */

import pino, { type Logger } from 'pino';
import type { Config } from './config.js';
import { getTracingLoggerOptions } from './infrastructure/tracing/CorrelationLogger.js';

const STDERR = 2;

export function createLogger(config: Pick<Config, 'logLevel' | 'nodeEnv'>, name: string = 'pubtrace'): Logger {
  const options = getTracingLoggerOptions(name, { level: config.logLevel });

  if (config.nodeEnv === 'development') {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: STDERR } },
    });
  }

  return pino(options, pino.destination(STDERR));
}

/**
 * Logger that discards everything, for library use without a host logger
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
