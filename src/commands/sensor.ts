/**
 * Sensor Command - pubtrace sensor
 *
 * Starts a trace and publishes its traceparent as the value of a path, so
 * that subscribers can continue the trace.
 *
 * @module commands/sensor
 */

import { getTracer } from '../infrastructure/tracing/Tracer.js';
import { injectTraceparent, traceparentOf } from '../infrastructure/tracing/TraceContext.js';
import { SpanNames } from '../infrastructure/tracing/types.js';
import type { Session } from '../session/Session.js';
import { Values } from '../session/value.js';
import type { SessionCommandOptions } from './options.js';
import { finishCommand, openWorkspace, startCommand, type CommandDeps } from './runtime.js';

export interface SensorCommandOptions extends SessionCommandOptions {
  path: string;
  /** Published when no traceparent could be injected */
  value: string;
}

export async function sensorCommand(options: SensorCommandOptions, deps: CommandDeps = {}): Promise<void> {
  const runtime = startCommand('sensor', deps);
  let session: Session | undefined;

  try {
    await getTracer().startActiveSpan(SpanNames.SENSOR_PUT, async (span) => {
      try {
        const traceparent = traceparentOf(injectTraceparent());
        const opened = await openWorkspace(options, runtime);
        session = opened.session;

        const payload = traceparent ?? options.value;
        console.log(`Put Data ('${options.path}': '${payload}')...`);
        console.log();
        await opened.workspace.put(options.path, Values.string(payload));
      } finally {
        span.end();
      }
    });
  } finally {
    await finishCommand(session);
  }
}
