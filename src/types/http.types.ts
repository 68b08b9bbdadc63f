import type { AgentOptions } from 'https';
import type { BatchPoints } from '../protocol/BatchPoints';
import type { QueryResponse } from '../transport/QueryResponse';

/**
 * Body encodings the write endpoint accepts
 */
export const CONTENT_ENCODINGS = ['', 'gzip'] as const;

export type ContentEncoding = (typeof CONTENT_ENCODINGS)[number];

/**
 * Forward proxy used for every request
 */
export interface ProxyConfig {
  protocol?: string;
  host: string;
  port: number;
  auth?: {
    username: string;
    password: string;
  };
}

/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  baseURL: string;
  /** Milliseconds, 0 disables the timeout */
  timeout?: number;
  headers?: Record<string, string>;
  auth?: {
    username: string;
    password: string;
  };
  proxy?: ProxyConfig;
}

/**
 * Keep-alive connection pool configuration
 */
export interface ConnectionPoolConfig {
  /** Skip https certificate verification */
  insecureSkipVerify?: boolean;
  /** Agent TLS options, applied over insecureSkipVerify */
  tls?: AgentOptions;
}

/**
 * Configuration of the HTTP transport
 */
export interface TransportConfig extends ConnectionPoolConfig {
  /** Base address of the form "http://host:port" */
  address: string;
  username?: string;
  password?: string;
  /** Defaults to "TSDBClient" */
  userAgent?: string;
  /** Milliseconds, defaults to no timeout */
  timeout?: number;
  proxy?: ProxyConfig;
  /** Encoding of write request bodies */
  writeEncoding?: ContentEncoding;
}

/**
 * A command to send to the SQL endpoint.
 * The database and precision may be left out when not needed.
 */
export interface Query {
  command: string;
  database?: string;
  precision?: string;
}

export interface PingResult {
  /** Round-trip time in milliseconds */
  durationMs: number;
  version: string;
}

/**
 * Writing and querying the database
 */
export interface Transport {
  ping(): Promise<PingResult>;
  write(batch: BatchPoints): Promise<void>;
  query(query: Query): Promise<QueryResponse>;
  close(): Promise<void>;
}
