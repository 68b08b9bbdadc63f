/**
 * Topic subscription types.
 * The consumer itself is supplied by a message-queue driver.
 */

/**
 * A message delivered on a subscribed topic
 */
export interface SubscribedMessage {
  topic: string;
  /** Database the topic belongs to */
  database: string;
  /** Decoded payload, as produced by the driver */
  value: unknown;
  offset: number;
}

/**
 * Result of one poll
 */
export type ConsumerEvent =
  | { type: 'message'; message: SubscribedMessage }
  | { type: 'error'; error: Error }
  | { type: 'none' }
  /** Driver notification the bridge does not act on (offsets, rebalances...) */
  | { type: 'other'; value: unknown };

/**
 * Poll-based topic consumer
 */
export interface Consumer {
  subscribe(topic: string): Promise<void>;
  /** Wait up to `timeoutMs` for the next event */
  poll(timeoutMs: number): Promise<ConsumerEvent>;
  unsubscribe(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Settings handed to the driver when a consumer is created
 */
export interface ConsumerConfig {
  'ws.url': string;
  'td.connect.user': string;
  'td.connect.pass': string;
  'group.id': string;
  'client.id': string;
  'auto.offset.reset': 'earliest' | 'latest';
  'enable.auto.commit': 'true' | 'false';
}

export type ConsumerFactory = (config: ConsumerConfig) => Consumer | Promise<Consumer>;

/**
 * Connection settings the bridge derives consumer configs from
 */
export interface ConsumerSettings {
  address: string;
  username: string;
  password: string;
  /** Prefix of the generated client id */
  clientIdPrefix?: string;
}
