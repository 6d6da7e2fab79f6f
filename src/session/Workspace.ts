/**
 * Workspace
 *
 * put / delete / subscribe / get / eval on top of the session transport.
 * Every operation runs in a span parented on the active OpenTelemetry
 * context, so callers scope it with `context.with` or an active span.
 *
 * @module session/Workspace
 */

import { SpanKind, SpanStatusCode, context } from '@opentelemetry/api';
import type { Logger } from 'pino';
import { SessionClosedError } from '../errors.js';
import {
  createPubSubAttributes,
  recordFailure,
  withOperationSpan,
} from '../infrastructure/tracing/PubSubInstrumentation.js';
import { getTracer } from '../infrastructure/tracing/Tracer.js';
import { AttributeKeys, SpanNames } from '../infrastructure/tracing/types.js';
import {
  ChangeKind,
  Headers,
  decodeChange,
  decodeData,
  encodeChange,
  encodeData,
  type Change,
  type Data,
  type Timestamp,
} from './change.js';
import { Path, PathExpr, Selector, resolvePath } from './path.js';
import type { Closable, Session } from './Session.js';
import {
  QUERY_SUBJECT,
  dataSubject,
  subscriptionSubject,
  type PubSubTransport,
  type TransportMessage,
  type TransportSubscription,
} from './transport.js';
import { encodingDescr, type Value } from './value.js';

/**
 * A get received by an eval
 */
export interface GetRequest {
  selector: Selector;
  /** Send one reply to the getter; may be called more than once */
  reply(path: Path | string, value: Value): Promise<void>;
}

/**
 * Async stream over a transport subscription. Iteration ends once the
 * stream is closed.
 */
export class SubscriptionStream<T> implements AsyncIterable<T>, Closable {
  private readonly subscription: TransportSubscription;
  private readonly map: (msg: TransportMessage) => T | undefined;
  private readonly onClose: () => void;
  private closed = false;

  constructor(
    subscription: TransportSubscription,
    map: (msg: TransportMessage) => T | undefined,
    onClose: () => void
  ) {
    this.subscription = subscription;
    this.map = map;
    this.onClose = onClose;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for await (const msg of this.subscription) {
      if (this.closed) {
        return;
      }
      const item = this.map(msg);
      if (item !== undefined) {
        yield item;
      }
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.subscription.unsubscribe();
    this.onClose();
  }
}

export type ChangeStream = SubscriptionStream<Change>;
export type GetRequestStream = SubscriptionStream<GetRequest>;

const EMPTY_PAYLOAD = new Uint8Array(0);

export class Workspace {
  readonly prefix?: Path;

  private readonly session: Session;
  private readonly log: Logger;

  constructor(session: Session, prefix?: Path) {
    this.session = session;
    this.prefix = prefix;
    this.log = session.logger.child({ component: 'Workspace', prefix: prefix?.toString() });
  }

  private resolvePath(path: Path | string): Path {
    return typeof path === 'string' ? Path.parse(resolvePath(path, this.prefix)) : path;
  }

  private resolveSelector(selector: Selector | string): Selector {
    return typeof selector === 'string' ? Selector.parse(selector, this.prefix) : selector;
  }

  private resolvePathExpr(expr: PathExpr | string): PathExpr {
    return typeof expr === 'string' ? PathExpr.parse(resolvePath(expr, this.prefix)) : expr;
  }

  private now(): Timestamp {
    return { time: new Date(), sourceId: this.session.id };
  }

  // --------------------------------------------------------------------------
  // Publication
  // --------------------------------------------------------------------------

  async put(path: Path | string, value: Value): Promise<void> {
    const target = this.resolvePath(path);
    await this.publishChange(SpanNames.PUT, { path: target, value, kind: ChangeKind.PUT, timestamp: this.now() });
  }

  async delete(path: Path | string): Promise<void> {
    const target = this.resolvePath(path);
    await this.publishChange(SpanNames.DELETE, { path: target, kind: ChangeKind.DELETE, timestamp: this.now() });
  }

  private async publishChange(spanName: string, change: Change): Promise<void> {
    const transport = this.session.transport;
    const attributes = createPubSubAttributes(
      {
        destination: change.path.toString(),
        encoding: change.value ? encodingDescr(change.value) : undefined,
        kind: change.kind,
      },
      'publish'
    );

    await withOperationSpan(spanName, SpanKind.PRODUCER, attributes, async () => {
      transport.publish(dataSubject(change.path), encodeChange(change));
      this.log.debug({ path: change.path.toString(), kind: change.kind }, 'Change published');
    });
  }

  // --------------------------------------------------------------------------
  // Subscription
  // --------------------------------------------------------------------------

  /**
   * Stream the changes published on paths the selector matches
   */
  async subscribe(selector: Selector | string): Promise<ChangeStream> {
    const sel = this.resolveSelector(selector);
    const expr = sel.pathExpr;
    const subject = subscriptionSubject(expr);
    const subscription = this.session.transport.subscribe(subject);
    this.log.debug({ selector: sel.toString(), subject }, 'Subscribed');

    const stream: ChangeStream = new SubscriptionStream<Change>(
      subscription,
      (msg) => {
        let change: Change;
        try {
          change = decodeChange(msg);
        } catch (error) {
          this.log.warn({ err: error, subject: msg.subject }, 'Dropping undecodable change');
          return undefined;
        }
        return expr.matches(change.path) ? change : undefined;
      },
      () => this.session.untrack(stream)
    );
    this.session.track(stream);
    return stream;
  }

  // --------------------------------------------------------------------------
  // Query / reply
  // --------------------------------------------------------------------------

  /**
   * Query the evals whose path expression intersects the selector.
   * Replies are yielded as they arrive until the get timeout elapses;
   * leaving the loop early stops collection.
   */
  get(selector: Selector | string): AsyncIterable<Data> {
    const sel = this.resolveSelector(selector);
    const transport = this.session.transport;
    return this.collectReplies(sel, transport);
  }

  private async *collectReplies(
    selector: Selector,
    transport: PubSubTransport
  ): AsyncGenerator<Data> {
    const span = getTracer().startSpan(
      SpanNames.GET,
      {
        kind: SpanKind.CLIENT,
        attributes: {
          ...createPubSubAttributes({ destination: QUERY_SUBJECT }, 'publish'),
          [AttributeKeys.SELECTOR]: selector.toString(),
        },
      },
      context.active()
    );

    let count = 0;
    try {
      const replies = transport.requestMany(
        QUERY_SUBJECT,
        { headers: { [Headers.SELECTOR]: selector.toString() }, payload: EMPTY_PAYLOAD },
        { maxWaitMs: this.session.getTimeoutMs }
      );
      for await (const reply of replies) {
        let data: Data;
        try {
          data = decodeData(reply);
        } catch (error) {
          this.log.warn({ err: error }, 'Dropping undecodable reply');
          continue;
        }
        count++;
        yield data;
      }
      span.setStatus({ code: SpanStatusCode.OK });
    } catch (error) {
      recordFailure(span, error);
      throw error;
    } finally {
      span.setAttribute(AttributeKeys.REPLY_COUNT, count);
      span.end();
      this.log.debug({ selector: selector.toString(), replies: count }, 'Get finished');
    }
  }

  /**
   * Receive the gets whose selector intersects `pathExpr`
   */
  async registerEval(pathExpr: PathExpr | Path | string): Promise<GetRequestStream> {
    const expr = pathExpr instanceof Path ? pathExpr.toPathExpr() : this.resolvePathExpr(pathExpr);
    const subscription = this.session.transport.subscribe(QUERY_SUBJECT);
    this.log.debug({ pathExpr: expr.toString() }, 'Eval registered');

    const stream: GetRequestStream = new SubscriptionStream<GetRequest>(
      subscription,
      (msg) => this.toGetRequest(msg, expr),
      () => this.session.untrack(stream)
    );
    this.session.track(stream);
    return stream;
  }

  private toGetRequest(msg: TransportMessage, expr: PathExpr): GetRequest | undefined {
    const respond = msg.respond;
    const rawSelector = msg.headers[Headers.SELECTOR];
    if (!respond || rawSelector === undefined) {
      return undefined;
    }

    let selector: Selector;
    try {
      selector = Selector.parse(rawSelector);
    } catch (error) {
      this.log.warn({ err: error, selector: rawSelector }, 'Dropping query with invalid selector');
      return undefined;
    }
    if (!expr.intersects(selector.pathExpr)) {
      return undefined;
    }

    return {
      selector,
      reply: async (path, value) => {
        const target = this.resolvePath(path);
        const attributes = createPubSubAttributes(
          { destination: target.toString(), encoding: encodingDescr(value) },
          'publish'
        );
        await withOperationSpan(SpanNames.REPLY, SpanKind.PRODUCER, attributes, async () => {
          if (this.session.isClosed) {
            throw new SessionClosedError();
          }
          respond(encodeData({ path: target, value, timestamp: this.now() }));
        });
      },
    };
  }
}
