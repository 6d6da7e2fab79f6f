/**
 * NATS transport
 *
 * Core NATS publish / subscribe with inbox replies for queries.
 *
 * @module session/NatsTransport
 */

import {
  connect,
  createInbox,
  headers as createHeaders,
  type Msg,
  type MsgHdrs,
  type NatsConnection,
  type Subscription,
} from 'nats';
import type { Logger } from 'pino';
import { ErrorCodes, SessionError } from '../errors.js';
import type { HeaderMap, WireMessage } from './change.js';
import type {
  PubSubTransport,
  RequestOptions,
  TransportConnectOptions,
  TransportMessage,
  TransportSubscription,
} from './transport.js';

function toNatsHeaders(map: HeaderMap): MsgHdrs {
  const hdrs = createHeaders();
  for (const [key, value] of Object.entries(map)) {
    hdrs.set(key, value);
  }
  return hdrs;
}

/**
 * Flatten NATS headers, keeping the first value of repeated keys
 */
function fromNatsHeaders(hdrs: MsgHdrs | undefined): HeaderMap {
  const map: HeaderMap = {};
  if (hdrs) {
    for (const [key, values] of hdrs) {
      if (values.length > 0) {
        map[key] = values[0];
      }
    }
  }
  return map;
}

function toWire(msg: Msg): WireMessage {
  return { headers: fromNatsHeaders(msg.headers), payload: msg.data };
}

function closeQuietly(sub: Subscription): void {
  if (!sub.isClosed()) {
    sub.unsubscribe();
  }
}

export class NatsTransport implements PubSubTransport {
  private readonly connection: NatsConnection;
  private readonly log: Logger;

  private constructor(connection: NatsConnection, logger: Logger) {
    this.connection = connection;
    this.log = logger;
  }

  /**
   * Connect to the first reachable server
   */
  static async connect(options: TransportConnectOptions, logger: Logger): Promise<NatsTransport> {
    const log = logger.child({ component: 'NatsTransport' });
    log.info({ servers: options.servers, name: options.name }, 'Connecting to NATS');

    let connection: NatsConnection;
    try {
      connection = await connect({
        servers: options.servers,
        name: options.name,
        user: options.user,
        pass: options.password,
        reconnect: true,
        maxReconnectAttempts: 10,
        reconnectTimeWait: 1000,
      });
    } catch (error) {
      throw new SessionError(`Unable to reach ${options.servers.join(', ')}`, {
        code: ErrorCodes.SESSION_OPEN_FAILED,
        suggestion: 'Start a NATS server or pass its locator with -e/--peer.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    connection
      .closed()
      .then((err) => {
        if (err) {
          log.error({ err }, 'NATS connection closed with error');
        } else {
          log.debug('NATS connection closed');
        }
      })
      .catch((err: unknown) => log.warn({ err }, 'NATS close notification failed'));

    (async () => {
      for await (const s of connection.status()) {
        log.debug({ type: s.type, data: s.data }, 'NATS status');
      }
    })().catch((err: unknown) => log.debug({ err }, 'NATS status stream ended'));

    log.info({ server: connection.getServer() }, 'Connected to NATS');
    return new NatsTransport(connection, log);
  }

  publish(subject: string, message: WireMessage): void {
    this.connection.publish(subject, message.payload, { headers: toNatsHeaders(message.headers) });
    this.log.debug({ subject }, 'Message published');
  }

  subscribe(subject: string): TransportSubscription {
    const sub = this.connection.subscribe(subject);
    this.log.debug({ subject }, 'Subscribed');

    return {
      unsubscribe: () => closeQuietly(sub),
      [Symbol.asyncIterator]: async function* (): AsyncGenerator<TransportMessage> {
        for await (const msg of sub) {
          const wire = toWire(msg);
          yield {
            subject: msg.subject,
            ...wire,
            respond: msg.reply
              ? (reply: WireMessage) => {
                  msg.respond(reply.payload, { headers: toNatsHeaders(reply.headers) });
                }
              : undefined,
          };
        }
      },
    };
  }

  async *requestMany(
    subject: string,
    message: WireMessage,
    options: RequestOptions
  ): AsyncGenerator<WireMessage> {
    const inbox = createInbox();
    const sub = this.connection.subscribe(inbox);
    const timer = setTimeout(() => closeQuietly(sub), options.maxWaitMs);

    try {
      this.connection.publish(subject, message.payload, {
        reply: inbox,
        headers: toNatsHeaders(message.headers),
      });
      for await (const msg of sub) {
        yield toWire(msg);
      }
    } finally {
      clearTimeout(timer);
      closeQuietly(sub);
    }
  }

  async flush(): Promise<void> {
    if (this.connection.isClosed()) {
      return;
    }
    await this.connection.flush();
  }

  async close(): Promise<void> {
    if (this.connection.isClosed()) {
      return;
    }
    this.log.debug('Draining NATS connection');
    await this.connection.drain();
    this.log.debug('NATS connection drained');
  }
}
