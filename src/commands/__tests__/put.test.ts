/**
 * Put Command Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ErrorCodes, ValueError } from '../../errors.js';
import { shutdownTracing } from '../../infrastructure/tracing/Tracer.js';
import { Properties } from '../../session/properties.js';
import type { Session } from '../../session/Session.js';
import { Values } from '../../session/value.js';
import { createCommandHarness, type CommandHarness } from '../../../tests/fakes/commandHarness.js';
import { parseTypedValue, putCommand } from '../put.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseTypedValue', () => {
  it('should build each value type', () => {
    expect(parseTypedValue('string', 'hello')).toEqual(Values.string('hello'));
    expect(parseTypedValue('json', '{"a":1}')).toEqual(Values.json('{"a":1}'));
    expect(parseTypedValue('integer', ' -12 ')).toEqual(Values.integer(-12n));
    expect(parseTypedValue('float', '2.5')).toEqual(Values.float(2.5));
    expect(parseTypedValue('properties', 'a=1;b=2')).toEqual(
      Values.properties(Properties.from({ a: '1', b: '2' }))
    );
    expect(parseTypedValue('raw', '0x0aff')).toEqual(Values.raw(Uint8Array.from([0x0a, 0xff])));
    expect(parseTypedValue('custom', '01', 'application/x-test')).toEqual(
      Values.custom('application/x-test', Uint8Array.from([1]))
    );
  });

  it('should keep integers beyond the safe range exact', () => {
    expect(parseTypedValue('integer', '9007199254740993')).toEqual(Values.integer(9007199254740993n));
  });

  it.each([
    ['json', '{a:1}'],
    ['integer', '1.5'],
    ['integer', ''],
    ['float', 'abc'],
    ['float', ''],
    ['float', 'Infinity'],
    ['raw', 'abc'],
  ] as const)('should reject %s value %j', (type, text) => {
    const error = thrownBy(() => parseTypedValue(type, text));

    expect(error).toBeInstanceOf(ValueError);
    expect(error).toMatchObject({ code: ErrorCodes.VALUE_ENCODE_ERROR });
  });

  it('should require an encoding for custom values', () => {
    expect(() => parseTypedValue('custom', '01')).toThrow('A custom value needs an encoding');
  });
});

describe('putCommand', () => {
  let harness: CommandHarness;
  let watcher: Session;

  beforeEach(async () => {
    harness = createCommandHarness();
    watcher = await harness.peer();
  });

  afterEach(async () => {
    await watcher.close();
    await shutdownTracing();
  });

  it('should put the typed value inside a Put data span', async () => {
    const changes = (await watcher.workspace().subscribe('/demo/example/**'))[Symbol.asyncIterator]();

    await putCommand({ path: '/demo/example/Integer', value: '3', type: 'integer' }, harness.deps);

    const change = await changes.next();
    expect(change.value?.value).toEqual(Values.integer(3));
    expect(harness.lines()).toContain("Put Data ('/demo/example/Integer': Integer(3))...");

    const [root] = harness.collector.named('Put data');
    const [put] = harness.collector.named('pubtrace.put');
    expect(put.parentSpanContext?.spanId).toBe(root.spanContext().spanId);
    expect(put.attributes['pubtrace.encoding']).toBeDefined();
  });

  it('should fail before connecting on an invalid value', async () => {
    await expect(
      putCommand({ path: '/demo/example/Float', value: 'abc', type: 'float' }, harness.deps)
    ).rejects.toThrow('Cannot read "abc" as float');
    expect(harness.broker.connections).toHaveLength(1);
  });
});
