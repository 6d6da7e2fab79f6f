/**
 * Session
 *
 * Validates session properties, connects the transport and hands out
 * workspaces. Closing the session closes every stream opened through it.
 *
 * @module session/Session
 */

import { randomBytes } from 'node:crypto';
import type { Logger } from 'pino';
import { ConfigError, ErrorCodes, SessionClosedError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import { NatsTransport } from './NatsTransport.js';
import { Path } from './path.js';
import { Properties } from './properties.js';
import type { PubSubTransport, TransportFactory } from './transport.js';
import { Workspace } from './Workspace.js';

export type SessionMode = 'peer' | 'client';

export const DEFAULT_SERVER = 'nats://127.0.0.1:4222';
export const DEFAULT_GET_TIMEOUT_MS = 3000;

/**
 * Property keys understood by the session
 */
export const PropertyKeys = {
  MODE: 'mode',
  PEER: 'peer',
  LISTENER: 'listener',
  MULTICAST_SCOUTING: 'multicast_scouting',
  USER: 'user',
  PASSWORD: 'password',
} as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set(Object.values(PropertyKeys));

export interface SessionConfig {
  mode: SessionMode;
  /** Servers to dial, in order */
  servers: string[];
  multicastScouting: boolean;
  user?: string;
  password?: string;
  /** Keys the session does not interpret */
  extra: Record<string, string>;
}

export interface SessionOptions {
  logger?: Logger;
  /** Defaults to NATS */
  transportFactory?: TransportFactory;
  /** Reply collection window for get */
  getTimeoutMs?: number;
}

/** A stream the session closes on shutdown */
export interface Closable {
  close(): Promise<void>;
}

// ============================================================================
// Property validation
// ============================================================================

const LOCATOR_WITH_PROTOCOL = /^([a-z0-9]+)\/(.+)$/i;
const UNSPECIFIED_HOST = /^(\w+:\/\/)?(0\.0\.0\.0|\[::\])(?=:|\/|$)/;

function splitList(value: string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '');
}

/**
 * Map a locator onto a NATS server URL.
 * `tcp/host:port` and `tls/host:port` are rewritten; URLs and bare
 * `host:port` pass through.
 */
export function mapLocator(locator: string): string {
  if (locator.includes('://')) {
    return locator;
  }
  const match = LOCATOR_WITH_PROTOCOL.exec(locator);
  if (!match) {
    return locator;
  }
  const [, protocol, address] = match;
  switch (protocol.toLowerCase()) {
    case 'tcp':
      return `nats://${address}`;
    case 'tls':
      return `tls://${address}`;
    default:
      throw new ConfigError(`Unsupported locator protocol "${protocol}" in "${locator}"`, {
        code: ErrorCodes.CONFIG_NO_LOCATOR,
        suggestion: 'Use tcp/<host>:<port>, tls/<host>:<port> or a nats:// URL.',
      });
  }
}

/**
 * Listen addresses are dialled; an unspecified host means loopback
 */
export function dialableAddress(server: string): string {
  return server.replace(UNSPECIFIED_HOST, (_all: string, scheme: string | undefined, host: string) =>
    `${scheme ?? ''}${host === '[::]' ? '[::1]' : '127.0.0.1'}`
  );
}

function parseMode(value: string | undefined): SessionMode {
  switch (value) {
    case undefined:
    case 'peer':
      return 'peer';
    case 'client':
      return 'client';
    default:
      throw new ConfigError(`Invalid session mode "${value}"`, {
        code: ErrorCodes.CONFIG_INVALID_MODE,
        suggestion: 'Use -m peer or -m client.',
      });
  }
}

function parseScouting(value: string | undefined): boolean {
  switch (value) {
    case undefined:
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw new ConfigError(`Invalid multicast_scouting value "${value}"`, {
        code: ErrorCodes.CONFIG_PARSE_ERROR,
        suggestion: 'Use multicast_scouting=true or multicast_scouting=false.',
      });
  }
}

/**
 * Validate session properties
 */
export function resolveSessionConfig(properties: Properties): SessionConfig {
  const mode = parseMode(properties.get(PropertyKeys.MODE));
  const multicastScouting = parseScouting(properties.get(PropertyKeys.MULTICAST_SCOUTING));
  const peers = splitList(properties.get(PropertyKeys.PEER)).map(mapLocator);
  const listeners = splitList(properties.get(PropertyKeys.LISTENER)).map(mapLocator);

  if (mode === 'client' && listeners.length > 0) {
    throw new ConfigError('A client session cannot listen', {
      code: ErrorCodes.CONFIG_INVALID_MODE,
      suggestion: 'Drop -l/--listener or run in peer mode.',
    });
  }

  const servers = [...peers, ...listeners].map(dialableAddress);
  if (servers.length === 0) {
    if (!multicastScouting) {
      throw new ConfigError('No locator to connect to and scouting is disabled', {
        code: ErrorCodes.CONFIG_NO_LOCATOR,
        suggestion: 'Pass a locator with -e/--peer or enable multicast scouting.',
      });
    }
    servers.push(DEFAULT_SERVER);
  }

  const extra: Record<string, string> = {};
  for (const [key, value] of properties) {
    if (!KNOWN_KEYS.has(key)) {
      extra[key] = value;
    }
  }

  return {
    mode,
    servers,
    multicastScouting,
    user: properties.get(PropertyKeys.USER),
    password: properties.get(PropertyKeys.PASSWORD),
    extra,
  };
}

// ============================================================================
// Session
// ============================================================================

export class Session {
  /** Hex id stamped on every timestamp this session issues */
  readonly id: string;
  readonly config: SessionConfig;
  readonly getTimeoutMs: number;
  readonly logger: Logger;

  private readonly transportHandle: PubSubTransport;
  private readonly streams = new Set<Closable>();
  private closed = false;

  private constructor(
    id: string,
    config: SessionConfig,
    transport: PubSubTransport,
    logger: Logger,
    getTimeoutMs: number
  ) {
    this.id = id;
    this.config = config;
    this.transportHandle = transport;
    this.logger = logger;
    this.getTimeoutMs = getTimeoutMs;
  }

  static async open(properties: Properties, options: SessionOptions = {}): Promise<Session> {
    const log = (options.logger ?? createSilentLogger()).child({ component: 'Session' });
    const config = resolveSessionConfig(properties);
    const id = randomBytes(16).toString('hex');

    if (Object.keys(config.extra).length > 0) {
      log.debug({ keys: Object.keys(config.extra) }, 'Ignoring unknown session properties');
    }

    const factory: TransportFactory =
      options.transportFactory ?? ((connectOptions) => NatsTransport.connect(connectOptions, log));
    const transport = await factory({
      servers: config.servers,
      name: `pubtrace-${config.mode}-${id.slice(0, 8)}`,
      user: config.user,
      password: config.password,
    });

    log.info({ sessionId: id, mode: config.mode, servers: config.servers }, 'Session opened');
    return new Session(id, config, transport, log, options.getTimeoutMs ?? DEFAULT_GET_TIMEOUT_MS);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Transport for workspace operations; throws once the session is closed
   */
  get transport(): PubSubTransport {
    if (this.closed) {
      throw new SessionClosedError();
    }
    return this.transportHandle;
  }

  /**
   * Workspace rooted at `prefix`; relative paths resolve against it
   */
  workspace(prefix?: string): Workspace {
    if (this.closed) {
      throw new SessionClosedError();
    }
    return new Workspace(this, prefix !== undefined ? Path.parse(prefix) : undefined);
  }

  /**
   * Session id, mode, servers and the properties the session kept as-is
   */
  info(): Properties {
    const info = Properties.from({
      session_id: this.id,
      mode: this.config.mode,
      servers: this.config.servers.join(','),
    });
    for (const [key, value] of Object.entries(this.config.extra)) {
      info.set(key, value);
    }
    return info;
  }

  /** @internal */
  track(stream: Closable): void {
    this.streams.add(stream);
  }

  /** @internal */
  untrack(stream: Closable): void {
    this.streams.delete(stream);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    for (const stream of Array.from(this.streams)) {
      await stream.close();
    }
    this.closed = true;
    // Puts made just before closing must reach the server
    await this.transportHandle.flush();
    await this.transportHandle.close();
    this.logger.info({ sessionId: this.id }, 'Session closed');
  }
}
