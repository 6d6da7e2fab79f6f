/**
 * Get Command - pubtrace get
 *
 * Starts a trace, hands its traceparent to the eval through a put, then
 * queries the evals and records each reply as a span event.
 *
 * @module commands/get
 */

import { getTracer } from '../infrastructure/tracing/Tracer.js';
import { injectTraceparent, traceparentOf } from '../infrastructure/tracing/TraceContext.js';
import { EventNames, SpanNames } from '../infrastructure/tracing/types.js';
import { formatTimestamp } from '../session/change.js';
import type { Session } from '../session/Session.js';
import { Values, encodingDescr, formatValue } from '../session/value.js';
import type { SessionCommandOptions } from './options.js';
import { finishCommand, openWorkspace, startCommand, type CommandDeps } from './runtime.js';

export interface GetCommandOptions extends SessionCommandOptions {
  selector: string;
  /** Where the traceparent is put for the eval to pick up */
  tracePath: string;
}

export async function getCommand(options: GetCommandOptions, deps: CommandDeps = {}): Promise<void> {
  const runtime = startCommand('get', deps);
  let session: Session | undefined;

  try {
    await getTracer().startActiveSpan(SpanNames.GET_ROOT, async (span) => {
      try {
        const traceparent = traceparentOf(injectTraceparent());
        const opened = await openWorkspace(options, runtime);
        session = opened.session;
        const { workspace } = opened;

        if (traceparent !== undefined) {
          console.log(`Put Span Data ('${traceparent}')...`);
          console.log();
          await workspace.put(options.tracePath, Values.string(traceparent));
        }

        console.log(`Get Data from '${options.selector}'...`);
        console.log();
        for await (const data of workspace.get(options.selector)) {
          const rendered = formatValue(data.value);
          console.log(
            `  ${data.path} : ${rendered} (encoding: ${encodingDescr(data.value)} , timestamp: ${formatTimestamp(data.timestamp)})`
          );
          span.addEvent(EventNames.GET_RETURN_DATA, { data: rendered });
        }

        await opened.session.close();
      } finally {
        span.end();
      }
    });
  } finally {
    await finishCommand(session);
  }
}
