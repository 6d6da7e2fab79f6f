/**
 * Sensor Command Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { shutdownTracing } from '../../infrastructure/tracing/Tracer.js';
import type { Session } from '../../session/Session.js';
import { Values } from '../../session/value.js';
import { createCommandHarness, type CommandHarness } from '../../../tests/fakes/commandHarness.js';
import { sensorCommand } from '../sensor.js';

describe('sensorCommand', () => {
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

  it('should put the traceparent of the Put data span', async () => {
    const changes = (await watcher.workspace().subscribe('/demo/example/**'))[Symbol.asyncIterator]();

    await sensorCommand({ path: '/demo/example/sensor', value: 'fallback' }, harness.deps);

    const [root] = harness.collector.named('Put data');
    const { traceId, spanId } = root.spanContext();
    const traceparent = `00-${traceId}-${spanId}-01`;

    const change = await changes.next();
    expect(change.done).toBe(false);
    expect(change.value?.path.toString()).toBe('/demo/example/sensor');
    expect(change.value?.value).toEqual(Values.string(traceparent));
    expect(harness.lines()).toEqual([
      'New session...',
      'New workspace...',
      `Put Data ('/demo/example/sensor': '${traceparent}')...`,
      '',
    ]);
  });

  it('should record the put as a child of the root span', async () => {
    await sensorCommand({ path: '/demo/example/sensor', value: 'fallback' }, harness.deps);

    const [root] = harness.collector.named('Put data');
    const [put] = harness.collector.named('pubtrace.put');

    expect(put.spanContext().traceId).toBe(root.spanContext().traceId);
    expect(put.parentSpanContext?.spanId).toBe(root.spanContext().spanId);
    expect(root.parentSpanContext).toBeUndefined();
  });

  it('should put the fallback value when tracing is disabled', async () => {
    const disabled = createCommandHarness({ TRACING_ENABLED: 'false' });
    const peer = await disabled.peer();
    const changes = (await peer.workspace().subscribe('/demo/example/sensor'))[Symbol.asyncIterator]();

    await sensorCommand({ path: '/demo/example/sensor', value: 'fallback' }, disabled.deps);

    const change = await changes.next();
    expect(change.value?.value).toEqual(Values.string('fallback'));
    expect(disabled.collector.spans).toEqual([]);
    await peer.close();
  });

  it('should close its session', async () => {
    await sensorCommand({ path: '/demo/example/sensor', value: 'fallback' }, harness.deps);

    expect(harness.broker.connections).toHaveLength(2);
    expect(harness.broker.subscriptionCount).toBe(0);
  });
});
