/**
 * Sub Command - pubtrace sub
 *
 * Subscribes to a selector and records a consumer span per change, parented
 * on the traceparent carried by the value.
 *
 * @module commands/sub
 */

import { startReceiveSpan } from '../infrastructure/tracing/PubSubInstrumentation.js';
import {
  NON_STRING_PAYLOAD,
  carrierFromValue,
  extractParentContext,
} from '../infrastructure/tracing/TraceContext.js';
import { EventNames, SpanNames } from '../infrastructure/tracing/types.js';
import { formatTimestamp } from '../session/change.js';
import type { Session } from '../session/Session.js';
import { isStringValue } from '../session/value.js';
import type { SessionCommandOptions } from './options.js';
import { finishCommand, openWorkspace, startCommand, type CommandDeps } from './runtime.js';
import { sleep, watchForQuit } from './utils.js';

export interface SubCommandOptions extends SessionCommandOptions {
  selector: string;
  /** Simulated processing per change */
  workMs: number;
}

export async function subCommand(options: SubCommandOptions, deps: CommandDeps = {}): Promise<void> {
  const runtime = startCommand('sub', deps);
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
        const text = isStringValue(change.value) ? change.value.value : NON_STRING_PAYLOAD;
        const parent = extractParentContext(carrierFromValue(change.value));

        const span = startReceiveSpan(SpanNames.SUB_PROCESS, parent, {
          destination: change.path.toString(),
          kind: change.kind,
        });
        try {
          span.addEvent(EventNames.PROCESS_START);
          await sleep(options.workMs);
          span.addEvent(EventNames.PROCESS_FINISH);

          console.log(
            `>> [Subscription listener] received ${change.kind} for ${change.path} : ${JSON.stringify(text)} with timestamp ${formatTimestamp(change.timestamp)}`
          );
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
