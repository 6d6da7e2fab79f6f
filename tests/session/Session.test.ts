/**
 * Session Tests
 */

import { describe, expect, it } from 'vitest';
import { ConfigError, ErrorCodes, SessionClosedError } from '../../src/errors.js';
import { Properties } from '../../src/session/properties.js';
import {
  DEFAULT_SERVER,
  Session,
  dialableAddress,
  mapLocator,
  resolveSessionConfig,
} from '../../src/session/Session.js';
import { Values } from '../../src/session/value.js';
import { InMemoryBroker } from '../fakes/InMemoryTransport.js';

function configError(props: string): unknown {
  try {
    resolveSessionConfig(Properties.parse(props));
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('mapLocator', () => {
  it('should rewrite tcp and tls locators', () => {
    expect(mapLocator('tcp/10.0.0.1:7447')).toBe('nats://10.0.0.1:7447');
    expect(mapLocator('tls/broker.example.org:4443')).toBe('tls://broker.example.org:4443');
  });

  it('should pass URLs and host:port through', () => {
    expect(mapLocator('nats://10.0.0.1:4222')).toBe('nats://10.0.0.1:4222');
    expect(mapLocator('localhost:4222')).toBe('localhost:4222');
  });

  it('should reject protocols the transport cannot dial', () => {
    expect(() => mapLocator('udp/224.0.0.224:7447')).toThrow(ConfigError);
  });
});

describe('dialableAddress', () => {
  it('should dial unspecified hosts on loopback', () => {
    expect(dialableAddress('nats://0.0.0.0:7447')).toBe('nats://127.0.0.1:7447');
    expect(dialableAddress('nats://[::]:7447')).toBe('nats://[::1]:7447');
    expect(dialableAddress('0.0.0.0:4222')).toBe('127.0.0.1:4222');
  });

  it('should leave concrete hosts alone', () => {
    expect(dialableAddress('nats://10.0.0.1:7447')).toBe('nats://10.0.0.1:7447');
  });
});

describe('resolveSessionConfig', () => {
  it('should default to peer mode on the local server', () => {
    expect(resolveSessionConfig(new Properties())).toEqual({
      mode: 'peer',
      servers: [DEFAULT_SERVER],
      multicastScouting: true,
      user: undefined,
      password: undefined,
      extra: {},
    });
  });

  it('should dial peers then listeners in peer mode', () => {
    const config = resolveSessionConfig(
      Properties.from({
        peer: 'tcp/10.0.0.1:7447,tls/broker.example.org:4443',
        listener: 'tcp/0.0.0.0:7447',
      })
    );

    expect(config.servers).toEqual([
      'nats://10.0.0.1:7447',
      'tls://broker.example.org:4443',
      'nats://127.0.0.1:7447',
    ]);
  });

  it('should reject listeners in client mode', () => {
    const error = configError('mode=client;listener=tcp/0.0.0.0:7447');

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: ErrorCodes.CONFIG_INVALID_MODE });
  });

  it('should reject unknown modes', () => {
    expect(configError('mode=router')).toMatchObject({
      code: ErrorCodes.CONFIG_INVALID_MODE,
      message: 'Invalid session mode "router"',
    });
  });

  it('should require a locator when scouting is disabled', () => {
    expect(configError('multicast_scouting=false')).toMatchObject({ code: ErrorCodes.CONFIG_NO_LOCATOR });
  });

  it('should accept a locator when scouting is disabled', () => {
    const config = resolveSessionConfig(Properties.parse('multicast_scouting=false;peer=tcp/10.0.0.1:4222'));

    expect(config.multicastScouting).toBe(false);
    expect(config.servers).toEqual(['nats://10.0.0.1:4222']);
  });

  it('should reject a malformed scouting flag', () => {
    expect(configError('multicast_scouting=maybe')).toMatchObject({ code: ErrorCodes.CONFIG_PARSE_ERROR });
  });

  it('should keep credentials and unknown keys', () => {
    const config = resolveSessionConfig(
      Properties.parse('user=test-user;password=test-secret;timestamping=true')
    );

    expect(config.user).toBe('test-user');
    expect(config.password).toBe('test-secret');
    expect(config.extra).toEqual({ timestamping: 'true' });
  });
});

describe('Session', () => {
  it('should connect with the resolved servers and credentials', async () => {
    const broker = new InMemoryBroker();

    const session = await Session.open(
      Properties.parse('mode=client;peer=tcp/10.0.0.1:4222;user=test-user;password=test-secret'),
      { transportFactory: broker.factory }
    );

    expect(session.id).toMatch(/^[0-9a-f]{32}$/);
    expect(broker.connections).toHaveLength(1);
    expect(broker.connections[0]).toEqual({
      servers: ['nats://10.0.0.1:4222'],
      name: `pubtrace-client-${session.id.slice(0, 8)}`,
      user: 'test-user',
      password: 'test-secret',
    });

    await session.close();
  });

  it('should report its id, mode, servers and unknown properties', async () => {
    const broker = new InMemoryBroker();
    const session = await Session.open(Properties.parse('timestamping=true'), {
      transportFactory: broker.factory,
    });

    expect(session.info().toRecord()).toEqual({
      session_id: session.id,
      mode: 'peer',
      servers: DEFAULT_SERVER,
      timestamping: 'true',
    });

    await session.close();
  });

  it('should not connect when the properties are invalid', async () => {
    const broker = new InMemoryBroker();

    await expect(
      Session.open(Properties.parse('mode=router'), { transportFactory: broker.factory })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(broker.connections).toHaveLength(0);
  });

  it('should close its streams and refuse further use once closed', async () => {
    const broker = new InMemoryBroker();
    const session = await Session.open(new Properties(), { transportFactory: broker.factory });
    const stream = await session.workspace().subscribe('/demo/**');

    expect(broker.subscriptionCount).toBe(1);

    await session.close();
    await session.close();

    expect(stream.isClosed).toBe(true);
    expect(broker.subscriptionCount).toBe(0);
    expect(session.isClosed).toBe(true);
    expect(() => session.workspace()).toThrow(SessionClosedError);
  });

  it('should flush pending publications before closing the transport', async () => {
    const broker = new InMemoryBroker();
    const session = await Session.open(new Properties(), { transportFactory: broker.factory });

    await session.workspace().put('/demo/example/sensor', Values.string('last words'));
    await session.close();
    await session.close();

    expect(broker.lifecycle).toEqual(['flush', 'close']);
  });
});
