/**
 * Motion Command - pubtrace motion
 *
 * Subscribes to a selector and runs a simulated motion computation per
 * change, continuing the trace a string value carries.
 *
 * @module commands/motion
 */

import { getTracer } from '../infrastructure/tracing/Tracer.js';
import {
  carrierFromValue,
  describeContext,
  extractParentContext,
  type Carrier,
} from '../infrastructure/tracing/TraceContext.js';
import { SpanNames } from '../infrastructure/tracing/types.js';
import { formatTimestamp } from '../session/change.js';
import type { Session } from '../session/Session.js';
import { isStringValue } from '../session/value.js';
import type { SessionCommandOptions } from './options.js';
import { finishCommand, openWorkspace, startCommand, type CommandDeps } from './runtime.js';
import { sleep, watchForQuit } from './utils.js';

export interface MotionCommandOptions extends SessionCommandOptions {
  selector: string;
  /** Simulated computation per change */
  workMs: number;
}

export async function motionCommand(options: MotionCommandOptions, deps: CommandDeps = {}): Promise<void> {
  const runtime = startCommand('motion', deps);
  let session: Session | undefined;

  try {
    const opened = await openWorkspace(options, runtime);
    session = opened.session;

    console.log(`Subscribe to '${options.selector}'...`);
    console.log();
    const changes = await opened.workspace.subscribe(options.selector);
    const stopWatching = watchForQuit(() => {
      changes.close().catch((err: unknown) => runtime.logger.warn({ err }, 'Failed to close subscription'));
    }, deps.input);

    try {
      for await (const change of changes) {
        let carrier: Carrier = {};
        if (isStringValue(change.value)) {
          console.log(
            `>> [Subscription listener] received ${change.kind} for ${change.path} : ${JSON.stringify(change.value.value)} with timestamp ${formatTimestamp(change.timestamp)}`
          );
          carrier = carrierFromValue(change.value);
        }

        // Without a string carrier the computation starts its own trace
        const parent = extractParentContext(carrier);
        console.log(describeContext(parent));

        const span = getTracer().startSpan(SpanNames.MOTION_COMPUTE, {}, parent);
        try {
          await sleep(options.workMs);
        } finally {
          span.end();
        }
      }
    } finally {
      stopWatching();
      await changes.close();
    }
  } finally {
    await finishCommand(session);
  }
}
