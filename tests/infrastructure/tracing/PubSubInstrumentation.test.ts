/**
 * PubSubInstrumentation Tests
 */

import { SpanKind, SpanStatusCode, trace } from '@opentelemetry/api';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createPubSubAttributes,
  runInSpan,
  startChildSpan,
  startReceiveSpan,
  withOperationSpan,
} from '../../../src/infrastructure/tracing/PubSubInstrumentation.js';
import { extractParentContext } from '../../../src/infrastructure/tracing/TraceContext.js';
import { initTracing, shutdownTracing } from '../../../src/infrastructure/tracing/Tracer.js';
import { SpanCollector } from '../../fakes/SpanCollector.js';

const TRACEPARENT = '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01';

describe('PubSubInstrumentation', () => {
  let collector: SpanCollector;

  beforeEach(() => {
    collector = new SpanCollector();
    initTracing({ serviceName: 'instrumentation-test', spanProcessors: [collector] });
  });

  afterEach(async () => {
    await shutdownTracing();
  });

  describe('createPubSubAttributes', () => {
    it('should include optional attributes only when given', () => {
      expect(createPubSubAttributes({ destination: '/demo/x' }, 'receive')).toEqual({
        'messaging.system': 'nats',
        'messaging.destination': '/demo/x',
        'messaging.operation': 'receive',
      });
      expect(createPubSubAttributes({ destination: '/demo/x', encoding: 'text/plain', kind: 'PUT' }, 'publish')).toEqual({
        'messaging.system': 'nats',
        'messaging.destination': '/demo/x',
        'messaging.operation': 'publish',
        'pubtrace.encoding': 'text/plain',
        'pubtrace.change.kind': 'PUT',
      });
    });
  });

  describe('withOperationSpan', () => {
    it('should end the span with OK status and return the result', async () => {
      const result = await withOperationSpan('op', SpanKind.PRODUCER, {}, async () => 42);

      expect(result).toBe(42);
      const [span] = collector.named('op');
      expect(span.status.code).toBe(SpanStatusCode.OK);
      expect(span.kind).toBe(SpanKind.PRODUCER);
    });

    it('should record the failure and rethrow', async () => {
      await expect(
        withOperationSpan('failing', SpanKind.INTERNAL, {}, async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      const [span] = collector.named('failing');
      expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'boom' });
      expect(span.events.map((e) => e.name)).toEqual(['exception']);
    });
  });

  describe('startReceiveSpan', () => {
    it('should start a consumer span under the remote parent', () => {
      const parent = extractParentContext({ traceparent: TRACEPARENT });

      startReceiveSpan('receive', parent, { destination: '/demo/example/sensor', kind: 'PUT' }).end();

      const [span] = collector.named('receive');
      expect(span.kind).toBe(SpanKind.CONSUMER);
      expect(span.parentSpanContext?.spanId).toBe('b7ad6b7169203331');
      expect(span.attributes['messaging.operation']).toBe('receive');
    });
  });

  describe('runInSpan', () => {
    it('should make the span active for the callback', () => {
      const span = startChildSpan('outer', extractParentContext({ traceparent: TRACEPARENT }));

      const active = runInSpan(span, () => trace.getActiveSpan());
      span.end();

      expect(active).toBe(span);
    });
  });
});
