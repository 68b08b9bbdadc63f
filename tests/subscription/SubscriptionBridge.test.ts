import { describe, it, expect, vi, beforeEach } from 'vitest';
import { hostname } from 'os';
import { Channel } from '../../src/subscription/Channel';
import { POLL_TIMEOUT_MS, SubscriptionBridge, buildConsumerConfig } from '../../src/subscription/SubscriptionBridge';
import { InvalidArgumentError } from '../../src/core/errors';
import type {
  Consumer,
  ConsumerConfig,
  ConsumerEvent,
  ConsumerSettings,
  SubscribedMessage,
} from '../../src/types/subscription.types';

// Mock the logger
vi.mock('../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

function message(offset: number): SubscribedMessage {
  return { topic: 'sensors', database: 'iot', value: { offset }, offset };
}

/**
 * Replays scripted poll results, then runs `onIdle` and reports nothing
 */
class FakeConsumer implements Consumer {
  readonly calls: string[] = [];
  readonly pollTimeouts: number[] = [];
  unsubscribeError?: Error;

  constructor(
    private readonly events: ConsumerEvent[],
    private readonly onIdle: () => void = () => undefined
  ) {}

  async subscribe(topic: string): Promise<void> {
    this.calls.push(`subscribe:${topic}`);
  }

  async poll(timeoutMs: number): Promise<ConsumerEvent> {
    this.pollTimeouts.push(timeoutMs);
    const next = this.events.shift();
    if (next) return next;
    this.onIdle();
    return { type: 'none' };
  }

  async unsubscribe(): Promise<void> {
    this.calls.push('unsubscribe');
    if (this.unsubscribeError) throw this.unsubscribeError;
  }

  async close(): Promise<void> {
    this.calls.push('close');
  }
}

const settings: ConsumerSettings = {
  address: 'http://127.0.0.1:6041',
  username: 'root',
  password: 'test-secret',
};

describe('buildConsumerConfig', () => {
  it('should derive the websocket endpoint and consumer group', () => {
    const config = buildConsumerConfig(settings, 'sensors');

    expect(config['ws.url']).toBe('ws://127.0.0.1:6041/rest/tmq');
    expect(config['td.connect.user']).toBe('root');
    expect(config['td.connect.pass']).toBe('test-secret');
    expect(config['group.id']).toBe('sensors');
    expect(config['auto.offset.reset']).toBe('latest');
    expect(config['enable.auto.commit']).toBe('true');
    expect(config['client.id'].startsWith(`tsdb_${hostname()}-`)).toBe(true);
  });

  it('should use wss for https addresses and the given client prefix', () => {
    const config = buildConsumerConfig({ ...settings, address: 'https://db.local:6041', clientIdPrefix: 'iot' }, 't');

    expect(config['ws.url']).toBe('wss://db.local:6041/rest/tmq');
    expect(config['client.id'].startsWith('iot_')).toBe(true);
  });
});

describe('SubscriptionBridge', () => {
  let controller: AbortController;

  beforeEach(() => {
    controller = new AbortController();
  });

  it('should validate its arguments', async () => {
    const bridge = new SubscriptionBridge(() => new FakeConsumer([]), settings);

    await expect(bridge.run('', new Channel<SubscribedMessage>(1))).rejects.toThrow(InvalidArgumentError);
  });

  it('should deliver messages, then unsubscribe and close the channel on abort', async () => {
    const consumer = new FakeConsumer(
      [
        { type: 'message', message: message(1) },
        { type: 'message', message: message(2) },
      ],
      () => controller.abort()
    );
    let received: ConsumerConfig | undefined;
    const bridge = new SubscriptionBridge((config) => {
      received = config;
      return consumer;
    }, settings);
    const channel = new Channel<SubscribedMessage>(4);

    await bridge.run('sensors', channel, { signal: controller.signal });

    const offsets: number[] = [];
    for await (const item of channel) {
      offsets.push(item.offset);
    }
    expect(offsets).toEqual([1, 2]);
    expect(channel.closed).toBe(true);
    expect(consumer.calls).toEqual(['subscribe:sensors', 'unsubscribe', 'close']);
    expect(consumer.pollTimeouts.every((timeout) => timeout === POLL_TIMEOUT_MS)).toBe(true);
    expect(received?.['group.id']).toBe('sensors');
    expect(bridge.state).toBe('closed');
  });

  it('should drop messages when the channel is full', async () => {
    const consumer = new FakeConsumer(
      [
        { type: 'message', message: message(1) },
        { type: 'message', message: message(2) },
        { type: 'message', message: message(3) },
      ],
      () => controller.abort()
    );
    const bridge = new SubscriptionBridge(() => consumer, settings);
    const channel = new Channel<SubscribedMessage>(1);

    await bridge.run('sensors', channel, { signal: controller.signal });

    await expect(channel.receive()).resolves.toEqual({ done: false, value: message(1) });
    await expect(channel.receive()).resolves.toEqual({ done: true, value: undefined });
  });

  it('should ignore empty polls and unexpected events', async () => {
    const consumer = new FakeConsumer(
      [{ type: 'none' }, { type: 'other', value: 'rebalance' }, { type: 'message', message: message(5) }],
      () => controller.abort()
    );
    const bridge = new SubscriptionBridge(() => consumer, settings);
    const channel = new Channel<SubscribedMessage>(2);

    await bridge.run('sensors', channel, { signal: controller.signal });

    expect(channel.size).toBe(1);
    expect(consumer.pollTimeouts).toHaveLength(4);
  });

  it('should see an abort fired from a timer while polls return at once', async () => {
    const consumer = new FakeConsumer([]);
    const bridge = new SubscriptionBridge(() => consumer, settings);
    const channel = new Channel<SubscribedMessage>(1);
    setTimeout(() => controller.abort(), 5);

    await bridge.run('sensors', channel, { signal: controller.signal });

    expect(channel.closed).toBe(true);
    expect(consumer.pollTimeouts.length).toBeGreaterThan(0);
    expect(consumer.calls).toEqual(['subscribe:sensors', 'unsubscribe', 'close']);
  });

  it('should fail on a consumer error and leave the channel open', async () => {
    const consumer = new FakeConsumer([{ type: 'error', error: new Error('broker lost') }]);
    const bridge = new SubscriptionBridge(() => consumer, settings);
    const channel = new Channel<SubscribedMessage>(1);

    await expect(bridge.run('sensors', channel, { signal: controller.signal })).rejects.toThrow('broker lost');

    expect(channel.closed).toBe(false);
    expect(consumer.calls).toEqual(['subscribe:sensors', 'unsubscribe', 'close']);
  });

  it('should fail when unsubscribing fails and leave the channel open', async () => {
    const consumer = new FakeConsumer([], () => controller.abort());
    consumer.unsubscribeError = new Error('unsubscribe refused');
    const bridge = new SubscriptionBridge(() => consumer, settings);
    const channel = new Channel<SubscribedMessage>(1);

    await expect(bridge.run('sensors', channel, { signal: controller.signal })).rejects.toThrow(
      'unsubscribe refused'
    );

    expect(channel.closed).toBe(false);
    expect(consumer.calls).toEqual(['subscribe:sensors', 'unsubscribe', 'unsubscribe', 'close']);
  });

  it('should stop right away when already aborted', async () => {
    controller.abort();
    const consumer = new FakeConsumer([{ type: 'message', message: message(1) }]);
    const bridge = new SubscriptionBridge(() => consumer, settings);
    const channel = new Channel<SubscribedMessage>(1);

    await bridge.run('sensors', channel, { signal: controller.signal });

    expect(consumer.pollTimeouts).toHaveLength(0);
    expect(channel.closed).toBe(true);
  });

  it('should run only once', async () => {
    controller.abort();
    const bridge = new SubscriptionBridge(() => new FakeConsumer([]), settings);

    await bridge.run('sensors', new Channel<SubscribedMessage>(1), { signal: controller.signal });

    await expect(
      bridge.run('sensors', new Channel<SubscribedMessage>(1), { signal: controller.signal })
    ).rejects.toThrow('subscription bridge already started');
  });
});
