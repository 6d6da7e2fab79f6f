/**
 * Put Command - pubtrace put
 *
 * Publishes a typed value inside a `Put data` span.
 *
 * @module commands/put
 */

import { ErrorCodes, ValueError } from '../errors.js';
import { getTracer } from '../infrastructure/tracing/Tracer.js';
import { SpanNames } from '../infrastructure/tracing/types.js';
import type { Session } from '../session/Session.js';
import { Values, formatValue, fromHex, type Value } from '../session/value.js';
import type { SessionCommandOptions, ValueType } from './options.js';
import { finishCommand, openWorkspace, startCommand, type CommandDeps } from './runtime.js';

export interface PutCommandOptions extends SessionCommandOptions {
  path: string;
  value: string;
  type: ValueType;
  /** Encoding descriptor for --type custom */
  encoding?: string;
}

function invalid(type: ValueType, text: string, cause?: unknown): ValueError {
  return new ValueError(`Cannot read "${text}" as ${type}`, {
    code: ErrorCodes.VALUE_ENCODE_ERROR,
    cause: cause instanceof Error ? cause : undefined,
  });
}

/**
 * Build a value of `type` from its command-line text. Raw and custom
 * values are hex.
 */
export function parseTypedValue(type: ValueType, text: string, encoding?: string): Value {
  switch (type) {
    case 'string':
      return Values.string(text);
    case 'json':
      try {
        JSON.parse(text);
      } catch (error) {
        throw invalid(type, text, error);
      }
      return Values.json(text);
    case 'integer':
      if (!/^[-+]?\d+$/.test(text.trim())) {
        throw invalid(type, text);
      }
      return Values.integer(BigInt(text.trim()));
    case 'float': {
      const parsed = Number(text);
      if (text.trim() === '' || !Number.isFinite(parsed)) {
        throw invalid(type, text);
      }
      return Values.float(parsed);
    }
    case 'properties':
      return Values.properties(text);
    case 'raw':
      return Values.raw(fromHex(text));
    case 'custom':
      if (!encoding) {
        throw new ValueError('A custom value needs an encoding', {
          code: ErrorCodes.VALUE_ENCODE_ERROR,
          suggestion: 'Pass --encoding <descriptor> with --type custom.',
        });
      }
      return Values.custom(encoding, fromHex(text));
  }
}

export async function putCommand(options: PutCommandOptions, deps: CommandDeps = {}): Promise<void> {
  const value = parseTypedValue(options.type, options.value, options.encoding);
  const runtime = startCommand('put', deps);
  let session: Session | undefined;

  try {
    await getTracer().startActiveSpan(SpanNames.SENSOR_PUT, async (span) => {
      try {
        const opened = await openWorkspace(options, runtime);
        session = opened.session;

        console.log(`Put Data ('${options.path}': ${formatValue(value)})...`);
        console.log();
        await opened.workspace.put(options.path, value);
      } finally {
        span.end();
      }
    });
  } finally {
    await finishCommand(session);
  }
}
