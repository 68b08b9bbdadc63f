// Client
export { TsdbClient, createClient } from './core/TsdbClient';
export type { ClientDependencies, SubscribeOptions, TableResult, TopicMode } from './core/TsdbClient';
export {
  TsdbError,
  ConfigurationError,
  InvalidArgumentError,
  TransportError,
  DecodeError,
  ApplicationError,
  TableNotExistError,
  ERR_TABLE_NOT_EXIST,
  TABLE_NOT_EXIST_CODES,
  isTableNotExist,
} from './core/errors';
export { createLogger, redact } from './core/Logger';

// Configuration
export { ConfigLoader, CONFIG_FILE_NAME } from './config/ConfigLoader';
export { ClientConfigSchema, HttpConfigSchema } from './config/schemas/config.schema';
export type { ClientConfig, ClientConfigInput, HttpConfig } from './config/schemas/config.schema';

// Line protocol
export { Point, asFloat, asUnsigned, parsePoint, parsePoints } from './protocol/Point';
export { BatchPoints } from './protocol/BatchPoints';
export type { BatchPointsConfig } from './protocol/BatchPoints';
export {
  escapeString,
  unescapeString,
  escapeMeasurement,
  escapeTag,
  escapeStringField,
} from './protocol/escape';
export { PRECISIONS, DEFAULT_PRECISION, parsePrecision, isPrecision } from './protocol/precision';
export type { Precision } from './protocol/precision';

// Transport
export { HttpTransport, WRITE_PATH, SQL_PATH, DEFAULT_USER_AGENT } from './transport/HttpTransport';
export { QueryResponse } from './transport/QueryResponse';
export { decodeRows, resolveColumnKind, parseTimestampSeconds } from './transport/ResultDecoder';
export type { Row, DecodeOptions, ColumnKind } from './transport/ResultDecoder';

// Subscription
export { Channel, ChannelClosedError } from './subscription/Channel';
export { SubscriptionBridge, POLL_TIMEOUT_MS, buildConsumerConfig } from './subscription/SubscriptionBridge';
export type { BridgeState, RunOptions } from './subscription/SubscriptionBridge';

// Types
export * from './types/point.types';
export * from './types/http.types';
export * from './types/subscription.types';
