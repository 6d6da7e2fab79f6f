/**
 * Pub/Sub Instrumentation
 *
 * Spans around workspace operations and for processing received changes.
 */

import {
  SpanKind,
  SpanStatusCode,
  context,
  trace,
  type Attributes,
  type Context,
  type Span,
} from '@opentelemetry/api';
import { getTracer } from './Tracer.js';
import { AttributeKeys, MESSAGING_SYSTEM } from './types.js';

/**
 * Pub/sub message attributes for spans
 */
export interface PubSubMessageAttributes {
  /** Path or selector the operation addresses */
  destination: string;
  /** Encoding descriptor of the payload */
  encoding?: string;
  /** Change kind for published or received changes */
  kind?: string;
}

export type PubSubOperation = 'publish' | 'receive' | 'process';

/**
 * Create span attributes for a pub/sub operation
 */
export function createPubSubAttributes(
  attrs: PubSubMessageAttributes,
  operation: PubSubOperation
): Attributes {
  return {
    [AttributeKeys.MESSAGING_SYSTEM]: MESSAGING_SYSTEM,
    [AttributeKeys.MESSAGING_DESTINATION]: attrs.destination,
    [AttributeKeys.MESSAGING_OPERATION]: operation,
    ...(attrs.encoding ? { [AttributeKeys.ENCODING]: attrs.encoding } : {}),
    ...(attrs.kind ? { [AttributeKeys.CHANGE_KIND]: attrs.kind } : {}),
  };
}

export function recordFailure(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  } else {
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
  }
}

/**
 * Run `fn` inside a span parented on the active context. The span ends when
 * `fn` settles and records the failure if it throws.
 */
export async function withOperationSpan<T>(
  name: string,
  kind: SpanKind,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return getTracer().startActiveSpan(name, { kind, attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordFailure(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Start a consumer span for a received change under an extracted parent
 */
export function startReceiveSpan(
  name: string,
  parent: Context,
  attrs: PubSubMessageAttributes,
  tracerName?: string
): Span {
  return getTracer(tracerName).startSpan(
    name,
    { kind: SpanKind.CONSUMER, attributes: createPubSubAttributes(attrs, 'receive') },
    parent
  );
}

/**
 * Start a span under `parent` without pub/sub attributes
 */
export function startChildSpan(name: string, parent: Context, tracerName?: string): Span {
  return getTracer(tracerName).startSpan(name, { kind: SpanKind.INTERNAL }, parent);
}

/**
 * Run `fn` with `span` as the active span
 */
export function runInSpan<T>(span: Span, fn: () => T): T {
  return context.with(trace.setSpan(context.active(), span), fn);
}
