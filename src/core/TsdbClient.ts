import { isLosslessNumber } from 'lossless-json';
import { ClientConfigSchema, type ClientConfig, type ClientConfigInput } from '../config/schemas/config.schema';
import { BatchPoints } from '../protocol/BatchPoints';
import { Point } from '../protocol/Point';
import { type Precision, toNanoseconds } from '../protocol/precision';
import type { Channel } from '../subscription/Channel';
import { SubscriptionBridge } from '../subscription/SubscriptionBridge';
import { HttpTransport } from '../transport/HttpTransport';
import { decodeRows, type Row } from '../transport/ResultDecoder';
import type { FieldValue, Tags } from '../types/point.types';
import type { PingResult, Transport } from '../types/http.types';
import type { ConsumerFactory, SubscribedMessage } from '../types/subscription.types';
import { createLogger } from './Logger';
import {
  ConfigurationError,
  DecodeError,
  InvalidArgumentError,
  isTableNotExist,
  toError,
} from './errors';

const logger = createLogger('TsdbClient');

/**
 * How a topic is defined: a whole database, one super table, or a query
 */
export type TopicMode = 'database' | 'stable' | 'sql';

export interface ClientDependencies {
  /** Replaces the HTTP transport built from the configuration */
  transport?: Transport;
  /** Creates topic consumers; required to subscribe */
  consumerFactory?: ConsumerFactory;
}

export interface TableResult {
  columns: string[];
  rows: unknown[][];
}

export interface SubscribeOptions {
  signal?: AbortSignal;
}

/**
 * Precisions a raw write timestamp can be given in; anything else is read as milliseconds
 */
function timestampUnit(precision: Precision): Precision {
  return precision === 's' || precision === 'us' || precision === 'ns' ? precision : 'ms';
}

/**
 * Database client bound to one server, database and precision.
 *
 * @example
 * ```typescript
 * const client = createClient({ address: 'http://127.0.0.1:6041', database: 'iot' });
 * await client.writeData('sensor', { room: 'a' }, { temperature: 21.5 });
 * const rows = await client.queryData('select * from sensor', { convertNumber: true });
 * await client.close();
 * ```
 */
export class TsdbClient {
  readonly transport: Transport;
  readonly config: ClientConfig;

  private readonly consumerFactory?: ConsumerFactory;

  constructor(config: ClientConfig, dependencies: ClientDependencies = {}) {
    this.config = config;
    this.consumerFactory = dependencies.consumerFactory;
    this.transport =
      dependencies.transport ??
      new HttpTransport({
        address: config.address,
        username: config.username,
        password: config.password,
        userAgent: config.http.userAgent,
        timeout: config.http.timeout,
        insecureSkipVerify: config.http.insecureSkipVerify,
        writeEncoding: config.http.writeEncoding,
      });
  }

  get databaseName(): string {
    return this.config.database;
  }

  /**
   * Run a query against the configured database, one record per row.
   * A missing table gives no rows.
   * @throws ApplicationError for any other error reported by the server
   */
  async queryData(sql: string, options: { convertNumber?: boolean } = {}): Promise<Row[]> {
    const response = await this.transport.query({
      command: sql,
      database: this.config.database,
      precision: this.config.precision,
    });

    const error = response.error();
    if (error) {
      if (isTableNotExist(error)) {
        return [];
      }
      throw error;
    }

    return decodeRows(response, {
      convertNumber: options.convertNumber ?? this.config.convertNumber,
      defaultNumberValue: this.config.defaultNumberValue,
    });
  }

  /**
   * Run a query and return column names and raw rows
   */
  async queryTable(sql: string, options: { database?: string; precision?: string } = {}): Promise<TableResult> {
    const response = await this.transport.query({
      command: sql,
      database: options.database,
      precision: options.precision,
    });

    const error = response.error();
    if (error) {
      if (isTableNotExist(error)) {
        return { columns: [], rows: [] };
      }
      throw error;
    }

    const columns = response.columnMeta.map((entry, index) => {
      const [name] = entry;
      if (typeof name !== 'string') {
        throw new DecodeError(`column meta data must start with a name (column ${index})`);
      }
      return name;
    });

    return { columns, rows: response.data };
  }

  /**
   * Write one point to the configured database.
   * A positive `timestamp` is read in the configured precision; without one
   * the server assigns the time.
   */
  async writeData(
    name: string,
    tags: Tags,
    fields: Record<string, FieldValue | null | undefined>,
    options: { timestamp?: number | bigint } = {}
  ): Promise<void> {
    const batch = new BatchPoints({
      precision: this.config.precision,
      database: this.config.database,
    });

    const { timestamp } = options;
    const time =
      timestamp !== undefined && timestamp > 0
        ? toNanoseconds(timestamp, timestampUnit(this.config.precision))
        : undefined;

    batch.addPoint(Point.create(name, tags, fields, time));
    await this.transport.write(batch);
  }

  /**
   * Count the non-null values of `field` in `table`, as an int64
   * @param filter - Condition, with or without a leading `where`
   * @throws DecodeError if the result has no count column
   */
  async queryCount(field: string, table: string, filter = ''): Promise<bigint> {
    let sql = `select count(\`${field}\`) as \`count\` from \`${table}\` `;
    if (filter.length > 0) {
      sql += filter.startsWith('where') ? filter : `where ${filter}`;
    }
    sql += ';';

    const rows = await this.queryData(sql, { convertNumber: false });
    if (rows.length === 0) {
      return 0n;
    }

    const value = rows[0].count;
    if (isLosslessNumber(value) && /^-?\d+$/.test(value.value)) {
      return BigInt(value.value);
    }
    if (typeof value === 'bigint') {
      return value;
    }
    if (typeof value === 'number' && Number.isInteger(value)) {
      return BigInt(value);
    }
    throw new DecodeError('not result field: count');
  }

  /**
   * Whether a table (or super table) with this name exists.
   * Query failures are logged and reported as false.
   */
  async tableExists(name: string, options: { superTable?: boolean } = {}): Promise<boolean> {
    if (name.length === 0) {
      return false;
    }

    const sql = options.superTable ? `show stables like '${name}';` : `show tables like '${name}';`;
    try {
      const rows = await this.queryData(sql, { convertNumber: false });
      return rows.length > 0;
    } catch (error) {
      logger.warn(`Table lookup for ${name} failed: ${toError(error).message}`);
      return false;
    }
  }

  /**
   * Create a topic if it does not exist yet
   * @param content - Database name, super table name or query, depending on `mode`
   */
  async createTopic(topic: string, content: string, mode: TopicMode): Promise<void> {
    if (topic.length === 0 || content.length === 0) {
      throw new InvalidArgumentError('miss args: `topic` or `content`');
    }

    let sql: string;
    switch (mode) {
      case 'database':
        sql = `create topic if not exists ${topic} as database ${content}`;
        break;
      case 'stable':
        sql = `create topic if not exists ${topic} as stable ${content}`;
        break;
      case 'sql':
        sql = `create topic if not exists ${topic} as ${content}`;
        break;
      default:
        throw new InvalidArgumentError(`not support mode: ${String(mode)}`);
    }

    await this.queryData(sql);
    logger.info(`Topic ${topic} ready`);
  }

  async dropTopic(topic: string): Promise<void> {
    if (topic.length === 0) {
      throw new InvalidArgumentError('invalid args: `topic` is empty');
    }
    await this.queryData(`drop topic if exists ${topic}`);
  }

  /**
   * Deliver messages of `topic` to `messages` until `signal` aborts
   * @see SubscriptionBridge.run
   */
  async subscribe(
    topic: string,
    messages: Channel<SubscribedMessage>,
    options: SubscribeOptions = {}
  ): Promise<void> {
    if (!this.consumerFactory) {
      throw new ConfigurationError('no consumer factory configured, cannot subscribe');
    }

    const bridge = new SubscriptionBridge(this.consumerFactory, {
      address: this.config.address,
      username: this.config.username,
      password: this.config.password,
    });
    await bridge.run(topic, messages, options);
  }

  /**
   * Start a subscription and return immediately. Its outcome, `null` after a
   * cancellation or the error that stopped it, is sent to `errors`.
   */
  subscribeInBackground(
    topic: string,
    messages: Channel<SubscribedMessage>,
    errors: Channel<Error | null>,
    options: SubscribeOptions = {}
  ): void {
    this.subscribe(topic, messages, options)
      .then(
        () => null,
        (error: unknown) => toError(error)
      )
      .then((outcome) => errors.send(outcome))
      .catch((error: unknown) => {
        logger.error(`Could not report subscription outcome for ${topic}: ${toError(error).message}`);
      });
  }

  ping(): Promise<PingResult> {
    return this.transport.ping();
  }

  /**
   * Release the transport's connections
   */
  close(): Promise<void> {
    return this.transport.close();
  }
}

/**
 * Build a client from settings, applying defaults
 * @throws ConfigurationError if a setting is invalid
 */
export function createClient(config: ClientConfigInput = {}, dependencies: ClientDependencies = {}): TsdbClient {
  const result = ClientConfigSchema.safeParse(config);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid client configuration: ${errors}`);
  }
  return new TsdbClient(result.data, dependencies);
}
