/**
 * Pub/sub transport seam
 *
 * The workspace speaks to the network through this interface. NatsTransport
 * is the production implementation; tests use an in-process one.
 *
 * Subject layout:
 * - data:    pubtrace.data.<chunk>.<chunk>...
 * - queries: pubtrace.query (broadcast, evals filter by selector)
 *
 * @module session/transport
 */

import type { WireMessage } from './change.js';
import type { Path, PathExpr } from './path.js';

export const SUBJECT_ROOT = 'pubtrace';
export const DATA_SUBJECT_PREFIX = `${SUBJECT_ROOT}.data`;
export const QUERY_SUBJECT = `${SUBJECT_ROOT}.query`;

export interface TransportMessage extends WireMessage {
  subject: string;
  /** Present when the sender expects replies */
  respond?: (reply: WireMessage) => void;
}

export interface TransportSubscription extends AsyncIterable<TransportMessage> {
  unsubscribe(): void;
}

export interface RequestOptions {
  /** How long replies are collected */
  maxWaitMs: number;
}

export interface PubSubTransport {
  publish(subject: string, message: WireMessage): void;
  subscribe(subject: string): TransportSubscription;
  /**
   * Publish a request and yield replies until `maxWaitMs` elapses or the
   * consumer stops iterating
   */
  requestMany(subject: string, message: WireMessage, options: RequestOptions): AsyncIterable<WireMessage>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export type TransportFactory = (options: TransportConnectOptions) => Promise<PubSubTransport>;

export interface TransportConnectOptions {
  servers: string[];
  name: string;
  user?: string;
  password?: string;
}

// --------------------------------------------------------------------------
// Subject mapping
// --------------------------------------------------------------------------

const RESERVED_SUBJECT_CHARS = /[.*>%\s]/gu;

/**
 * Percent-encode the characters NATS reserves inside a subject token
 */
export function encodeChunk(chunk: string): string {
  return chunk.replace(RESERVED_SUBJECT_CHARS, (c) =>
    Array.from(Buffer.from(c, 'utf8'), (b) => `%${b.toString(16).toUpperCase().padStart(2, '0')}`).join('')
  );
}

export function dataSubject(path: Path): string {
  return [DATA_SUBJECT_PREFIX, ...path.chunks.map(encodeChunk)].join('.');
}

/**
 * Narrowest NATS subject covering every path the expression can select.
 * A `**` chunk may select zero chunks, so the wildcard starts one token early.
 */
export function subscriptionSubject(expr: PathExpr): string {
  const tokens: string[] = [];
  for (const chunk of expr.chunks) {
    if (chunk === '**') {
      tokens.pop();
      return [DATA_SUBJECT_PREFIX, ...tokens, '>'].join('.');
    }
    tokens.push(chunk.includes('*') ? '*' : encodeChunk(chunk));
  }
  return [DATA_SUBJECT_PREFIX, ...tokens].join('.');
}
