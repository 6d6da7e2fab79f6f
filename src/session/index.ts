/**
 * Session layer: addressing, values, workspaces and the transport seam
 */

export { Properties } from './properties.js';
export { Path, PathExpr, Selector, resolvePath } from './path.js';
export {
  Encodings,
  Values,
  isStringValue,
  encodingDescr,
  encodeValue,
  decodeValue,
  formatValue,
  toHex,
  fromHex,
} from './value.js';
export type { Value, ValueKind, EncodedValue } from './value.js';
export {
  ChangeKind,
  Headers,
  formatTimestamp,
  parseTimestamp,
  encodeChange,
  decodeChange,
  encodeData,
  decodeData,
} from './change.js';
export type { Change, Data, Timestamp, HeaderMap, WireMessage } from './change.js';
export {
  SUBJECT_ROOT,
  DATA_SUBJECT_PREFIX,
  QUERY_SUBJECT,
  encodeChunk,
  dataSubject,
  subscriptionSubject,
} from './transport.js';
export type {
  PubSubTransport,
  TransportFactory,
  TransportConnectOptions,
  TransportMessage,
  TransportSubscription,
  RequestOptions,
} from './transport.js';
export { NatsTransport } from './NatsTransport.js';
export {
  Session,
  DEFAULT_SERVER,
  DEFAULT_GET_TIMEOUT_MS,
  PropertyKeys,
  mapLocator,
  dialableAddress,
  resolveSessionConfig,
} from './Session.js';
export type { SessionConfig, SessionMode, SessionOptions, Closable } from './Session.js';
export { Workspace, SubscriptionStream } from './Workspace.js';
export type { ChangeStream, GetRequest, GetRequestStream } from './Workspace.js';
