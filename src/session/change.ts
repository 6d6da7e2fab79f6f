/**
 * Changes, data replies and timestamps, plus their header mapping on the wire
 *
 * @module session/change
 */

import { ErrorCodes, ValueError } from '../errors.js';
import { Path } from './path.js';
import { decodeValue, encodeValue, type Value } from './value.js';

export enum ChangeKind {
  PUT = 'PUT',
  PATCH = 'PATCH',
  DELETE = 'DELETE',
}

export interface Timestamp {
  /** Wall-clock time of the publication */
  time: Date;
  /** Id of the issuing session */
  sourceId: string;
}

export interface Change {
  path: Path;
  value?: Value;
  kind: ChangeKind;
  timestamp: Timestamp;
}

export interface Data {
  path: Path;
  value: Value;
  timestamp: Timestamp;
}

/**
 * Header names used on the wire
 */
export const Headers = {
  PATH: 'Pubtrace-Path',
  KIND: 'Pubtrace-Kind',
  ENCODING: 'Pubtrace-Encoding',
  TIMESTAMP: 'Pubtrace-Timestamp',
  SELECTOR: 'Pubtrace-Selector',
} as const;

export type HeaderMap = Record<string, string>;

export interface WireMessage {
  headers: HeaderMap;
  payload: Uint8Array;
}

export function formatTimestamp(ts: Timestamp): string {
  return `${ts.time.toISOString()}/${ts.sourceId}`;
}

export function parseTimestamp(text: string): Timestamp {
  const slash = text.lastIndexOf('/');
  const time = new Date(slash === -1 ? text : text.slice(0, slash));
  if (Number.isNaN(time.getTime())) {
    throw new ValueError(`Invalid timestamp: "${text}"`);
  }
  return { time, sourceId: slash === -1 ? '' : text.slice(slash + 1) };
}

function requireHeader(headers: HeaderMap, name: string): string {
  const value = headers[name];
  if (value === undefined) {
    throw new ValueError(`Message is missing the ${name} header`);
  }
  return value;
}

function parseKind(text: string): ChangeKind {
  switch (text) {
    case ChangeKind.PUT:
      return ChangeKind.PUT;
    case ChangeKind.PATCH:
      return ChangeKind.PATCH;
    case ChangeKind.DELETE:
      return ChangeKind.DELETE;
    default:
      throw new ValueError(`Unknown change kind: "${text}"`);
  }
}

export function encodeChange(change: Change): WireMessage {
  const headers: HeaderMap = {
    [Headers.PATH]: change.path.toString(),
    [Headers.KIND]: change.kind,
    [Headers.TIMESTAMP]: formatTimestamp(change.timestamp),
  };
  if (!change.value) {
    return { headers, payload: new Uint8Array(0) };
  }
  const { encoding, bytes } = encodeValue(change.value);
  headers[Headers.ENCODING] = encoding;
  return { headers, payload: bytes };
}

export function decodeChange(message: WireMessage): Change {
  const { headers, payload } = message;
  const kind = parseKind(requireHeader(headers, Headers.KIND));
  const encoding = headers[Headers.ENCODING];
  return {
    path: Path.parse(requireHeader(headers, Headers.PATH)),
    kind,
    value:
      kind === ChangeKind.DELETE || encoding === undefined
        ? undefined
        : decodeValue({ encoding, bytes: payload }),
    timestamp: parseTimestamp(requireHeader(headers, Headers.TIMESTAMP)),
  };
}

export function encodeData(data: Data): WireMessage {
  const { encoding, bytes } = encodeValue(data.value);
  return {
    headers: {
      [Headers.PATH]: data.path.toString(),
      [Headers.ENCODING]: encoding,
      [Headers.TIMESTAMP]: formatTimestamp(data.timestamp),
    },
    payload: bytes,
  };
}

export function decodeData(message: WireMessage): Data {
  const { headers, payload } = message;
  const encoding = headers[Headers.ENCODING];
  if (encoding === undefined) {
    throw new ValueError('Reply carries no encoding', { code: ErrorCodes.VALUE_DECODE_ERROR });
  }
  return {
    path: Path.parse(requireHeader(headers, Headers.PATH)),
    value: decodeValue({ encoding, bytes: payload }),
    timestamp: parseTimestamp(requireHeader(headers, Headers.TIMESTAMP)),
  };
}
