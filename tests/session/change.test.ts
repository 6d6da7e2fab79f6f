/**
 * Change / Data wire mapping Tests
 */

import { describe, expect, it } from 'vitest';
import { ValueError } from '../../src/errors.js';
import {
  ChangeKind,
  Headers,
  decodeChange,
  decodeData,
  encodeChange,
  encodeData,
  formatTimestamp,
  parseTimestamp,
} from '../../src/session/change.js';
import { Path } from '../../src/session/path.js';
import { Values } from '../../src/session/value.js';

const timestamp = { time: new Date('2024-01-15T10:00:00.000Z'), sourceId: 'a1b2c3' };
const TS_TEXT = '2024-01-15T10:00:00.000Z/a1b2c3';

describe('timestamps', () => {
  it('should render time and source id', () => {
    expect(formatTimestamp(timestamp)).toBe(TS_TEXT);
  });

  it('should parse the rendered form', () => {
    expect(parseTimestamp(TS_TEXT)).toEqual(timestamp);
  });

  it('should reject an unparseable time', () => {
    expect(() => parseTimestamp('yesterday/a1b2c3')).toThrow(ValueError);
  });
});

describe('encodeChange', () => {
  it('should carry path, kind, encoding and timestamp in headers', () => {
    const message = encodeChange({
      path: Path.parse('/demo/example/sensor'),
      value: Values.string('hello'),
      kind: ChangeKind.PUT,
      timestamp,
    });

    expect(message.headers).toEqual({
      [Headers.PATH]: '/demo/example/sensor',
      [Headers.KIND]: 'PUT',
      [Headers.TIMESTAMP]: TS_TEXT,
      [Headers.ENCODING]: 'text/plain',
    });
    expect(new TextDecoder().decode(message.payload)).toBe('hello');
  });

  it('should send deletes without a payload or encoding', () => {
    const message = encodeChange({ path: Path.parse('/demo/x'), kind: ChangeKind.DELETE, timestamp });

    expect(message.headers[Headers.ENCODING]).toBeUndefined();
    expect(message.payload).toHaveLength(0);
    expect(decodeChange(message)).toEqual({
      path: Path.parse('/demo/x'),
      kind: ChangeKind.DELETE,
      value: undefined,
      timestamp,
    });
  });
});

describe('decodeChange', () => {
  it('should restore a put', () => {
    const change = decodeChange({
      headers: {
        [Headers.PATH]: '/demo/example/Integer',
        [Headers.KIND]: 'PUT',
        [Headers.ENCODING]: 'application/x-integer',
        [Headers.TIMESTAMP]: TS_TEXT,
      },
      payload: new TextEncoder().encode('3'),
    });

    expect(change.path.toString()).toBe('/demo/example/Integer');
    expect(change.kind).toBe(ChangeKind.PUT);
    expect(change.value).toEqual(Values.integer(3));
    expect(change.timestamp).toEqual(timestamp);
  });

  it('should reject a message without a kind', () => {
    expect(() =>
      decodeChange({ headers: { [Headers.PATH]: '/a', [Headers.TIMESTAMP]: TS_TEXT }, payload: new Uint8Array() })
    ).toThrow('Message is missing the Pubtrace-Kind header');
  });

  it('should reject an unknown kind', () => {
    expect(() =>
      decodeChange({
        headers: { [Headers.PATH]: '/a', [Headers.KIND]: 'MERGE', [Headers.TIMESTAMP]: TS_TEXT },
        payload: new Uint8Array(),
      })
    ).toThrow('Unknown change kind: "MERGE"');
  });
});

describe('data replies', () => {
  it('should map a reply onto headers and back', () => {
    const data = { path: Path.parse('/demo/example/eval'), value: Values.string('Eval from Bob'), timestamp };

    const message = encodeData(data);

    expect(message.headers[Headers.ENCODING]).toBe('text/plain');
    expect(decodeData(message)).toEqual(data);
  });

  it('should reject a reply without an encoding', () => {
    expect(() =>
      decodeData({ headers: { [Headers.PATH]: '/a', [Headers.TIMESTAMP]: TS_TEXT }, payload: new Uint8Array() })
    ).toThrow('Reply carries no encoding');
  });
});
