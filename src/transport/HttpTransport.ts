import type { AxiosInstance, AxiosResponse } from 'axios';
import { promisify } from 'util';
import * as zlib from 'zlib';
import { createLogger } from '../core/Logger';
import { ConfigurationError, DecodeError, TransportError } from '../core/errors';
import type { BatchPoints } from '../protocol/BatchPoints';
import {
  CONTENT_ENCODINGS,
  type ContentEncoding,
  type PingResult,
  type Query,
  type Transport,
  type TransportConfig,
} from '../types/http.types';
import {
  type ConnectionPool,
  createConnectionPool,
  createHttpClient,
  formatHttpError,
  releaseConnectionPool,
} from '../utils/http';
import { QueryResponse } from './QueryResponse';

const logger = createLogger('HttpTransport');
const gzip = promisify(zlib.gzip);

export const WRITE_PATH = 'influxdb/v1/write';
export const SQL_PATH = 'rest/sql';
export const DEFAULT_USER_AGENT = 'TSDBClient';

const MAX_DIAGNOSTIC_BODY_BYTES = 1024;
const PING_COMMAND = 'select server_version() as version';

/**
 * Media type of a Content-Type header, without parameters
 */
function mediaType(header: unknown): string {
  if (typeof header !== 'string') return '';
  return header.split(';')[0].trim().toLowerCase();
}

function truncateBytes(body: string, limit: number): string {
  const bytes = Buffer.from(body, 'utf8');
  return bytes.length <= limit ? body : bytes.subarray(0, limit).toString('utf8');
}

function isContentEncoding(value: unknown): value is ContentEncoding {
  return CONTENT_ENCODINGS.some((encoding) => encoding === value);
}

/**
 * HTTP transport for the write and SQL endpoints.
 * Immutable once built and safe for concurrent callers; all requests share
 * one keep-alive connection pool.
 */
export class HttpTransport implements Transport {
  readonly address: URL;
  readonly writeEncoding: ContentEncoding;

  private readonly pool: ConnectionPool;
  private readonly http: AxiosInstance;

  /**
   * @throws ConfigurationError for a non-http(s) address or an unsupported encoding
   */
  constructor(config: TransportConfig) {
    let address: URL;
    try {
      address = new URL(config.address);
    } catch {
      throw new ConfigurationError(`invalid address: ${config.address}`);
    }

    const scheme = address.protocol.replace(/:$/, '');
    if (scheme !== 'http' && scheme !== 'https') {
      throw new ConfigurationError(
        `Unsupported protocol scheme: ${scheme}, your address must start with http:// or https://`
      );
    }

    const encoding: unknown = config.writeEncoding ?? '';
    if (!isContentEncoding(encoding)) {
      throw new ConfigurationError(`unsupported encoding ${String(encoding)}`);
    }

    this.address = address;
    this.writeEncoding = encoding;
    this.pool = createConnectionPool(config);
    this.http = createHttpClient(
      {
        baseURL: address.toString(),
        timeout: config.timeout ?? 0,
        headers: { 'User-Agent': config.userAgent || DEFAULT_USER_AGENT },
        auth: config.username
          ? { username: config.username, password: config.password ?? '' }
          : undefined,
        proxy: config.proxy,
      },
      this.pool
    );
  }

  /**
   * Check that the server is up
   * @returns round-trip time and server version
   */
  async ping(): Promise<PingResult> {
    const started = Date.now();
    const response = await this.query({ command: PING_COMMAND });

    const lastRow = response.data[response.rows - 1] ?? response.data[response.data.length - 1];
    const version = lastRow?.[0];
    if (typeof version !== 'string') {
      throw new DecodeError('get server version response empty');
    }

    return { durationMs: Date.now() - started, version };
  }

  /**
   * Write every point of a batch. A failed write is not retried.
   * @throws TransportError on any status other than 200 or 204
   */
  async write(batch: BatchPoints): Promise<void> {
    const lines = batch.toLineProtocol();
    const body = this.writeEncoding === 'gzip' ? await gzip(Buffer.from(lines, 'utf8')) : lines;

    const headers: Record<string, string> = { 'Content-Type': '' };
    if (this.writeEncoding) {
      headers['Content-Encoding'] = this.writeEncoding;
    }

    const response = await this.send(WRITE_PATH, body, {
      headers,
      params: { db: batch.database, precision: batch.precision },
    });

    if (response.status !== 200 && response.status !== 204) {
      throw new TransportError(response.data, { status: response.status, body: response.data });
    }

    logger.debug(`Wrote ${batch.points.length} points to ${batch.database || 'default database'}`);
  }

  /**
   * Send a command to the SQL endpoint. Application errors carried by the
   * payload are left to the caller (see {@link QueryResponse.error}).
   */
  async query(query: Query): Promise<QueryResponse> {
    const path = query.database ? `${SQL_PATH}/${encodeURIComponent(query.database)}` : SQL_PATH;
    const response = await this.send(path, query.command, { headers: { 'Content-Type': '' } });

    this.checkResponse(response);

    const { status, data: body } = response;
    let decoded: QueryResponse;
    if (body.trim() === '') {
      // An empty body only counts as an empty result off the 200 path; this can mask a truncated body
      if (status === 200) {
        throw new DecodeError(`unable to decode json: received status code ${status} err: unexpected end of input`);
      }
      decoded = new QueryResponse();
    } else {
      try {
        decoded = QueryResponse.decode(body);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        throw new DecodeError(`unable to decode json: received status code ${status} err: ${message}`);
      }
    }

    if (status !== 200 && decoded.error() === undefined) {
      throw new TransportError(`received status code ${status} from server`, {
        status,
        body,
        response: decoded,
      });
    }

    return decoded;
  }

  /**
   * Release idle connections
   */
  async close(): Promise<void> {
    releaseConnectionPool(this.pool);
  }

  private async send(
    path: string,
    body: string | Buffer,
    options: { headers: Record<string, string>; params?: Record<string, string> }
  ): Promise<AxiosResponse<string>> {
    try {
      return await this.http.post<string>(path, body, {
        headers: options.headers,
        params: options.params,
        responseType: 'text',
        transformResponse: [(data: unknown) => (typeof data === 'string' ? data : '')],
        validateStatus: () => true,
      });
    } catch (error) {
      logger.error(`POST ${path} failed: ${formatHttpError(error)}`);
      throw error;
    }
  }

  /**
   * Reject server failures and bodies that did not come from the database,
   * such as an error page from an intermediary
   */
  private checkResponse(response: AxiosResponse<string>): void {
    const { status, data: body } = response;

    if (status >= 500) {
      if (body.length === 0) {
        throw new TransportError(`received status code ${status} from downstream server`, { status });
      }
      throw new TransportError(
        `received status code ${status} from downstream server, with response body: ${JSON.stringify(body)}`,
        { status, body }
      );
    }

    const contentType = mediaType(response.headers['content-type']);
    if (contentType !== 'application/json') {
      const snippet = truncateBytes(body, MAX_DIAGNOSTIC_BODY_BYTES);
      if (snippet.length === 0) {
        throw new TransportError(`expected json response, got empty body, with status: ${status}`, { status });
      }
      throw new TransportError(
        `expected json response, got ${JSON.stringify(contentType)}, with status: ${status} and response body: ${JSON.stringify(snippet)}`,
        { status, body: snippet }
      );
    }
  }
}
