import { randomInt } from 'crypto';
import { hostname } from 'os';
import { setImmediate as nextTurn } from 'timers/promises';
import { createLogger } from '../core/Logger';
import { InvalidArgumentError } from '../core/errors';
import type {
  Consumer,
  ConsumerConfig,
  ConsumerFactory,
  ConsumerSettings,
  SubscribedMessage,
} from '../types/subscription.types';
import type { Channel } from './Channel';

const logger = createLogger('SubscriptionBridge');

/** Upper bound of one poll, and so of the cancellation latency */
export const POLL_TIMEOUT_MS = 5000;

const DEFAULT_CLIENT_ID_PREFIX = 'tsdb';

export type BridgeState =
  | 'created'
  | 'subscribed'
  | 'polling'
  | 'delivering'
  | 'unsubscribing'
  | 'closed';

export interface RunOptions {
  /** Aborting unsubscribes, closes the destination and resolves */
  signal?: AbortSignal;
}

/**
 * Consumer settings for a topic: the websocket endpoint of the server,
 * one consumer group per topic, latest offsets, automatic commits.
 */
export function buildConsumerConfig(settings: ConsumerSettings, topic: string): ConsumerConfig {
  const url = new URL(settings.address);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  const base = url.toString().replace(/\/$/, '');
  const prefix = settings.clientIdPrefix ?? DEFAULT_CLIENT_ID_PREFIX;

  return {
    'ws.url': `${base}/rest/tmq`,
    'td.connect.user': settings.username,
    'td.connect.pass': settings.password,
    'group.id': topic,
    'client.id': `${prefix}_${hostname()}-${randomInt(86400)}`,
    'auto.offset.reset': 'latest',
    'enable.auto.commit': 'true',
  };
}

/**
 * Turns a poll-based topic consumer into a channel of messages.
 *
 * One bridge runs one loop: create the consumer, subscribe, poll until the
 * signal aborts or the consumer reports an error. Messages go to the
 * destination without waiting; when its buffer is full they are dropped.
 * The consumer is always unsubscribed and closed on exit.
 */
export class SubscriptionBridge {
  private current: BridgeState = 'created';
  private started = false;

  constructor(
    private readonly createConsumer: ConsumerFactory,
    private readonly settings: ConsumerSettings
  ) {}

  get state(): BridgeState {
    return this.current;
  }

  /**
   * Run until `signal` aborts (resolves, destination closed) or the consumer
   * fails (rejects, destination left open)
   * @throws InvalidArgumentError for an empty topic or a missing destination
   */
  async run(topic: string, destination: Channel<SubscribedMessage>, options: RunOptions = {}): Promise<void> {
    if (topic.length === 0) {
      throw new InvalidArgumentError('invalid args: topic is empty');
    }
    if (!destination) {
      throw new InvalidArgumentError('invalid args: destination channel is missing');
    }
    if (this.started) {
      throw new InvalidArgumentError('subscription bridge already started');
    }
    this.started = true;

    let consumer: Consumer | undefined;
    let subscribed = false;
    let unsubscribed = false;

    try {
      consumer = await this.createConsumer(buildConsumerConfig(this.settings, topic));
      await consumer.subscribe(topic);
      subscribed = true;
      this.current = 'subscribed';
      logger.info(`Subscribed to topic ${topic}`);

      while (true) {
        if (options.signal?.aborted) {
          logger.info(`Subscription to ${topic} cancelled, unsubscribing...`);
          this.current = 'unsubscribing';
          await consumer.unsubscribe();
          unsubscribed = true;
          logger.info(`Unsubscribed from ${topic}`);
          destination.close();
          logger.debug(`Destination channel for ${topic} closed`);
          return;
        }

        this.current = 'polling';
        const event = await consumer.poll(POLL_TIMEOUT_MS);

        switch (event.type) {
          case 'message':
            this.current = 'delivering';
            if (!destination.trySend(event.message)) {
              logger.warn(`Channel full, dropped message from ${topic} at offset ${event.message.offset}`);
            }
            break;
          case 'error':
            logger.error(`Subscription to ${topic} failed: ${event.error.message}`);
            throw event.error;
          case 'none':
            break;
          case 'other':
            logger.debug(`Ignoring unexpected event on ${topic}: ${typeof event.value}`);
            break;
        }

        // Polls may resolve at once; let timers and I/O run so an abort is seen
        await nextTurn();
      }
    } finally {
      this.current = 'closed';
      if (consumer) {
        await this.release(consumer, topic, subscribed && !unsubscribed);
      }
    }
  }

  /**
   * Best-effort unsubscribe, then close
   */
  private async release(consumer: Consumer, topic: string, unsubscribe: boolean): Promise<void> {
    if (unsubscribe) {
      try {
        await consumer.unsubscribe();
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.warn(`Unsubscribe from ${topic} failed: ${message}`);
      }
    }

    try {
      await consumer.close();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`Closing consumer for ${topic} failed: ${message}`);
    }
  }
}
