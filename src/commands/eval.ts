/**
 * Eval Command - pubtrace eval
 *
 * Answers gets on one path. The trace to join is read from the first value
 * put on that path; each request is then served in a span under it.
 *
 * The reply is `Eval from <name>` where the name comes from the selector:
 * - `/demo/example/eval`: the default name
 * - `/demo/example/eval?(name=Bob)`: `Bob`
 * - `/demo/example/eval?(name=/demo/example/name)`: the first value a get
 *   on `/demo/example/name` returns
 *
 * @module commands/eval
 */

import type { Span } from '@opentelemetry/api';
import { PathError } from '../errors.js';
import { startChildSpan, runInSpan } from '../infrastructure/tracing/PubSubInstrumentation.js';
import {
  carrierFromValue,
  extractParentContext,
  type Carrier,
} from '../infrastructure/tracing/TraceContext.js';
import { SpanNames } from '../infrastructure/tracing/types.js';
import { formatTimestamp, type Data } from '../session/change.js';
import { Path, Selector } from '../session/path.js';
import type { Session } from '../session/Session.js';
import { Values, formatValue } from '../session/value.js';
import type { GetRequest, Workspace } from '../session/Workspace.js';
import type { SessionCommandOptions } from './options.js';
import { finishCommand, openWorkspace, startCommand, type CommandDeps } from './runtime.js';
import { sleep, watchForQuit } from './utils.js';

export const DEFAULT_EVAL_NAME = 'pubtrace!';
const NAME_PROPERTY = 'name';

export interface EvalCommandOptions extends SessionCommandOptions {
  path: string;
  /** Simulated computation per request */
  workMs: number;
}

async function firstReply(workspace: Workspace, selector: Selector): Promise<Data | undefined> {
  for await (const data of workspace.get(selector)) {
    return data;
  }
  return undefined;
}

/**
 * Name to greet with, following a path-valued name through a get
 */
export async function resolveName(workspace: Workspace, request: GetRequest): Promise<string> {
  const name = request.selector.properties.get(NAME_PROPERTY) ?? DEFAULT_EVAL_NAME;
  if (!name.startsWith('/')) {
    return name;
  }

  console.log(`   >> Get name to use from path: ${name}`);
  let selector: Selector;
  try {
    selector = Selector.parse(name);
  } catch (error) {
    if (error instanceof PathError) {
      console.log(`Failed to get value from '${name}' : this is not a valid Selector`);
      return name;
    }
    throw error;
  }

  const data = await firstReply(workspace, selector);
  if (data === undefined) {
    console.log(`Failed to get name from '${name}' : not found`);
    return name;
  }
  if (data.value.kind !== 'StringUtf8') {
    console.log(`Failed to get name from '${name}' : not a UTF-8 String`);
    return name;
  }
  return data.value.value;
}

async function serve(
  workspace: Workspace,
  path: Path,
  request: GetRequest,
  span: Span,
  workMs: number
): Promise<void> {
  await runInSpan(span, async () => {
    await sleep(workMs);
    console.log(`>> [Eval listener] received get with selector: ${request.selector}`);

    const name = await resolveName(workspace, request);
    const reply = `Eval from ${name}`;
    console.log(`   >> Returning string: "${reply}"`);
    await request.reply(path, Values.string(reply));
  });
}

export async function evalCommand(options: EvalCommandOptions, deps: CommandDeps = {}): Promise<void> {
  const path = Path.parse(options.path);
  const runtime = startCommand('eval', deps);
  let session: Session | undefined;

  try {
    const opened = await openWorkspace(options, runtime);
    session = opened.session;
    const { workspace } = opened;

    const requests = await workspace.registerEval(path);
    console.log(`Subscribe to '${path}'...`);
    console.log();
    const changes = await workspace.subscribe(Selector.fromPath(path));

    const stopWatching = watchForQuit(() => {
      Promise.all([changes.close(), requests.close()]).catch((err: unknown) =>
        runtime.logger.warn({ err }, 'Failed to close streams')
      );
    }, deps.input);

    try {
      let carrier: Carrier | undefined;
      for await (const change of changes) {
        console.log(
          `>> [Subscription listener] received ${change.kind} for ${change.path} : ${change.value ? formatValue(change.value) : 'None'} with timestamp ${formatTimestamp(change.timestamp)}`
        );
        carrier = carrierFromValue(change.value);
        break;
      }
      await changes.close();
      if (carrier === undefined) {
        return;
      }

      console.log(`Register eval for '${path}'...`);
      console.log();
      for await (const request of requests) {
        const span = startChildSpan(SpanNames.EVAL_REQUEST, extractParentContext(carrier));
        try {
          await serve(workspace, path, request, span, options.workMs);
        } finally {
          span.end();
        }
      }
    } finally {
      stopWatching();
      await changes.close();
      await requests.close();
    }
  } finally {
    await finishCommand(session);
  }
}
