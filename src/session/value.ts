/**
 * Values carried by put / get / reply
 *
 * @module session/value
 */

import { ErrorCodes, ValueError } from '../errors.js';
import { Properties } from './properties.js';

export const Encodings = {
  STRING: 'text/plain',
  JSON: 'application/json',
  INTEGER: 'application/x-integer',
  FLOAT: 'application/x-float',
  PROPERTIES: 'application/properties',
  RAW: 'application/octet-stream',
} as const;

export type Value =
  | { kind: 'StringUtf8'; value: string }
  | { kind: 'Json'; value: string }
  | { kind: 'Integer'; value: bigint }
  | { kind: 'Float'; value: number }
  | { kind: 'Properties'; value: Properties }
  | { kind: 'Raw'; value: Uint8Array }
  | { kind: 'Custom'; encoding: string; value: Uint8Array };

export type ValueKind = Value['kind'];

export interface EncodedValue {
  encoding: string;
  bytes: Uint8Array;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

// ----------------------------------------------------------------------------
// Constructors
// ----------------------------------------------------------------------------

export const Values = {
  string: (value: string): Value => ({ kind: 'StringUtf8', value }),
  json: (value: string): Value => ({ kind: 'Json', value }),
  integer: (value: bigint | number): Value => ({ kind: 'Integer', value: BigInt(value) }),
  float: (value: number): Value => ({ kind: 'Float', value }),
  properties: (value: Properties | string): Value => ({
    kind: 'Properties',
    value: typeof value === 'string' ? Properties.parse(value) : value,
  }),
  raw: (value: Uint8Array): Value => ({ kind: 'Raw', value }),
  custom: (encoding: string, value: Uint8Array): Value => ({ kind: 'Custom', encoding, value }),
};

export function isStringValue(value: Value | undefined): value is { kind: 'StringUtf8'; value: string } {
  return value?.kind === 'StringUtf8';
}

// ----------------------------------------------------------------------------
// Encoding
// ----------------------------------------------------------------------------

export function encodingDescr(value: Value): string {
  switch (value.kind) {
    case 'StringUtf8':
      return Encodings.STRING;
    case 'Json':
      return Encodings.JSON;
    case 'Integer':
      return Encodings.INTEGER;
    case 'Float':
      return Encodings.FLOAT;
    case 'Properties':
      return Encodings.PROPERTIES;
    case 'Raw':
      return Encodings.RAW;
    case 'Custom':
      return value.encoding;
  }
}

export function encodeValue(value: Value): EncodedValue {
  const encoding = encodingDescr(value);
  switch (value.kind) {
    case 'StringUtf8':
    case 'Json':
      return { encoding, bytes: encoder.encode(value.value) };
    case 'Integer':
      return { encoding, bytes: encoder.encode(value.value.toString()) };
    case 'Float':
      if (!Number.isFinite(value.value)) {
        throw new ValueError(`Float value is not finite: ${value.value}`, {
          code: ErrorCodes.VALUE_ENCODE_ERROR,
          encoding,
        });
      }
      return { encoding, bytes: encoder.encode(String(value.value)) };
    case 'Properties':
      return { encoding, bytes: encoder.encode(value.value.toString()) };
    case 'Raw':
    case 'Custom':
      return { encoding, bytes: value.value };
  }
}

function decodeText(bytes: Uint8Array, encoding: string): string {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new ValueError(`Payload is not valid UTF-8 for encoding ${encoding}`, {
      encoding,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export function decodeValue({ encoding, bytes }: EncodedValue): Value {
  switch (encoding) {
    case Encodings.STRING:
      return Values.string(decodeText(bytes, encoding));
    case Encodings.JSON:
      return Values.json(decodeText(bytes, encoding));
    case Encodings.INTEGER: {
      const text = decodeText(bytes, encoding).trim();
      if (!/^[-+]?\d+$/.test(text)) {
        throw new ValueError(`Invalid integer payload: "${text}"`, { encoding });
      }
      return Values.integer(BigInt(text));
    }
    case Encodings.FLOAT: {
      const text = decodeText(bytes, encoding).trim();
      const parsed = Number(text);
      if (text === '' || Number.isNaN(parsed)) {
        throw new ValueError(`Invalid float payload: "${text}"`, { encoding });
      }
      return Values.float(parsed);
    }
    case Encodings.PROPERTIES:
      return Values.properties(decodeText(bytes, encoding));
    case Encodings.RAW:
      return Values.raw(bytes);
    default:
      return Values.custom(encoding, bytes);
  }
}

// ----------------------------------------------------------------------------
// Display
// ----------------------------------------------------------------------------

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function fromHex(text: string): Uint8Array {
  const clean = text.startsWith('0x') ? text.slice(2) : text;
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new ValueError(`Invalid hex bytes: "${text}"`, { code: ErrorCodes.VALUE_ENCODE_ERROR });
  }
  return Uint8Array.from(Buffer.from(clean, 'hex'));
}

/**
 * Whole numbers print with one decimal place, e.g. `3.0`
 */
function formatFloat(n: number): string {
  return Number.isInteger(n) && Math.abs(n) < 1e21 ? n.toFixed(1) : String(n);
}

/**
 * Render a value for console output, e.g. `StringUtf8("hello")`
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'StringUtf8':
      return `StringUtf8(${JSON.stringify(value.value)})`;
    case 'Json':
      return `Json(${value.value})`;
    case 'Integer':
      return `Integer(${value.value.toString()})`;
    case 'Float':
      return `Float(${formatFloat(value.value)})`;
    case 'Properties':
      return `Properties(${value.value.toString()})`;
    case 'Raw':
      return `Raw(0x${toHex(value.value)})`;
    case 'Custom':
      return `Custom(${value.encoding}, 0x${toHex(value.value)})`;
  }
}
