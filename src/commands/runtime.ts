/**
 * Command runtime
 *
 * Tracing setup, session opening and teardown shared by the commands.
 *
 * @module commands/runtime
 */

import type { SpanProcessor } from '@opentelemetry/sdk-trace-base';
import chalk from 'chalk';
import type { Logger } from 'pino';
import { getConfig, loadConfig, type Config } from '../config.js';
import { initTracing, shutdownTracing } from '../infrastructure/tracing/Tracer.js';
import { createLogger } from '../logger.js';
import { Session } from '../session/Session.js';
import type { TransportFactory } from '../session/transport.js';
import type { Workspace } from '../session/Workspace.js';
import { buildSessionProperties, type SessionCommandOptions } from './options.js';

/**
 * Collaborators a command may be given instead of the process defaults
 */
export interface CommandDeps {
  /** Environment to read configuration from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  transportFactory?: TransportFactory;
  /** Installed next to the exporter */
  spanProcessors?: SpanProcessor[];
  /** Watched for `q` by the long-running commands */
  input?: NodeJS.ReadableStream;
}

export interface CommandRuntime {
  config: Config;
  logger: Logger;
  serviceName: string;
  deps: CommandDeps;
}

export interface OpenedWorkspace {
  session: Session;
  workspace: Workspace;
}

/**
 * Load configuration, create the logger and install tracing for `serviceName`
 */
export function startCommand(serviceName: string, deps: CommandDeps = {}): CommandRuntime {
  const config = deps.env ? loadConfig(deps.env) : getConfig();
  const logger = deps.logger ?? createLogger(config, serviceName);
  const name = config.serviceName ?? serviceName;

  initTracing({
    serviceName: name,
    environment: config.nodeEnv,
    enabled: config.tracingEnabled,
    samplingRate: config.samplingRate,
    otlpEndpoint: config.tracesExporter === 'otlp' ? config.otlpEndpoint : undefined,
    logSpans: config.logSpans,
    spanProcessors: deps.spanProcessors,
    logger,
  });

  return { config, logger, serviceName: name, deps };
}

/**
 * Open a session from the command's session options and its root workspace
 */
export async function openWorkspace(
  options: SessionCommandOptions,
  runtime: CommandRuntime
): Promise<OpenedWorkspace> {
  const properties = await buildSessionProperties(options);

  console.log(chalk.dim('New session...'));
  const session = await Session.open(properties, {
    logger: runtime.logger,
    transportFactory: runtime.deps.transportFactory,
    getTimeoutMs: runtime.config.getTimeoutMs,
  });

  console.log(chalk.dim('New workspace...'));
  return { session, workspace: session.workspace() };
}

/**
 * Close the session, then flush and shut down tracing
 */
export async function finishCommand(session?: Session): Promise<void> {
  try {
    await session?.close();
  } finally {
    await shutdownTracing();
  }
}
