import { abortError, BackendUnavailableError } from "../errors.js";
import type {
  BackendClient,
  BackendMessage,
  ConsumerHandle,
  ProducerHandle,
} from "../interfaces/backend.js";

type Waiter = {
  consumer: MemoryConsumer;
  resolve: (message: BackendMessage) => void;
  reject: (reason: unknown) => void;
};

/**
 * One durable subscription on a topic. Consumers on the same subscription share
 * its backlog; messages they received but never acknowledged return to the
 * front of the backlog when they close.
 */
class Subscription {
  readonly backlog: BackendMessage[] = [];
  private waiters: Waiter[] = [];

  enqueue(message: BackendMessage): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.consumer.track(message);
      waiter.resolve(message);
      return;
    }
    this.backlog.push(message);
  }

  /** Put messages back at the head of the backlog, in their original order. */
  redeliver(messages: BackendMessage[]): void {
    this.backlog.unshift(...messages);
    while (this.waiters.length > 0) {
      const message = this.backlog.shift();
      if (!message) return;
      const waiter = this.waiters.shift();
      if (!waiter) return;
      waiter.consumer.track(message);
      waiter.resolve(message);
    }
  }

  take(consumer: MemoryConsumer, signal: AbortSignal): Promise<BackendMessage> {
    if (signal.aborted) return Promise.reject(abortError(signal));

    const next = this.backlog.shift();
    if (next) {
      consumer.track(next);
      return Promise.resolve(next);
    }

    return new Promise<BackendMessage>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(waiter);
        reject(abortError(signal));
      };
      const waiter: Waiter = {
        consumer,
        resolve: (message) => {
          signal.removeEventListener("abort", onAbort);
          resolve(message);
        },
        reject: (reason) => {
          signal.removeEventListener("abort", onAbort);
          reject(reason);
        },
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Reject pending receives of one consumer. */
  rejectWaiters(consumer: MemoryConsumer, reason: Error): void {
    const [mine, others] = partition(this.waiters, (w) => w.consumer === consumer);
    this.waiters = others;
    for (const waiter of mine) waiter.reject(reason);
  }

  private removeWaiter(waiter: Waiter): void {
    this.waiters = this.waiters.filter((w) => w !== waiter);
  }
}

class Topic {
  private nextOffset = 0;
  readonly subscriptions = new Map<string, Subscription>();

  constructor(readonly name: string) {}

  append(payload: Uint8Array): string {
    const id = `${this.name}:${this.nextOffset++}`;
    const message: BackendMessage = { id, topicName: this.name, payload: Uint8Array.from(payload) };
    for (const subscription of this.subscriptions.values()) {
      subscription.enqueue({ ...message });
    }
    return id;
  }

  subscription(name: string): Subscription {
    let subscription = this.subscriptions.get(name);
    if (!subscription) {
      subscription = new Subscription();
      this.subscriptions.set(name, subscription);
    }
    return subscription;
  }

  get published(): number {
    return this.nextOffset;
  }
}

class MemoryProducer implements ProducerHandle {
  private closed = false;

  constructor(
    private readonly topic: Topic,
    private readonly onClose: (producer: MemoryProducer) => void,
  ) {}

  get topicName(): string {
    return this.topic.name;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(payload: Uint8Array): Promise<string> {
    if (this.closed) {
      throw new BackendUnavailableError("Producer is closed", { topicName: this.topicName });
    }
    return this.topic.append(payload);
  }

  sendAsync(payload: Uint8Array): Promise<string> {
    return this.send(payload);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.onClose(this);
  }
}

class MemoryConsumer implements ConsumerHandle {
  private closed = false;
  private readonly unacked = new Map<string, BackendMessage>();

  constructor(
    private readonly topic: Topic,
    private readonly subscription: Subscription,
    private readonly onClose: (consumer: MemoryConsumer) => void,
  ) {}

  get topicName(): string {
    return this.topic.name;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get unackedCount(): number {
    return this.unacked.size;
  }

  track(message: BackendMessage): void {
    this.unacked.set(message.id, message);
  }

  receive(signal: AbortSignal): Promise<BackendMessage> {
    if (this.closed) {
      return Promise.reject(
        new BackendUnavailableError("Consumer is closed", { topicName: this.topicName }),
      );
    }
    return this.subscription.take(this, signal);
  }

  async acknowledge(messageId: string): Promise<void> {
    if (this.closed) {
      throw new BackendUnavailableError("Consumer is closed", { topicName: this.topicName });
    }
    this.unacked.delete(messageId);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.subscription.rejectWaiters(
      this,
      new BackendUnavailableError("Consumer is closed", { topicName: this.topicName }),
    );
    this.subscription.redeliver([...this.unacked.values()]);
    this.unacked.clear();
    this.onClose(this);
  }
}

/**
 * In-process log backend for tests and single-node use.
 *
 * Topics are append-only. A subscription starts at the tail when first joined
 * and keeps its backlog while no consumer is attached.
 */
export class MemoryBackend implements BackendClient {
  private readonly topics = new Map<string, Topic>();
  private readonly openProducers = new Set<MemoryProducer>();
  private readonly openConsumers = new Set<MemoryConsumer>();
  private closed = false;

  async createProducer(topicName: string): Promise<ProducerHandle> {
    this.assertOpen(topicName);
    const producer = new MemoryProducer(this.topic(topicName), (p) => this.openProducers.delete(p));
    this.openProducers.add(producer);
    return producer;
  }

  async createConsumer(topicName: string, subscriptionName: string): Promise<ConsumerHandle> {
    this.assertOpen(topicName);
    const topic = this.topic(topicName);
    const consumer = new MemoryConsumer(topic, topic.subscription(subscriptionName), (c) =>
      this.openConsumers.delete(c),
    );
    this.openConsumers.add(consumer);
    return consumer;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all([...this.openConsumers].map((c) => c.close()));
    await Promise.all([...this.openProducers].map((p) => p.close()));
  }

  /** Append directly to a topic, bypassing producers. */
  publish(topicName: string, payload: Uint8Array | string): string {
    const bytes = typeof payload === "string" ? new TextEncoder().encode(payload) : payload;
    return this.topic(topicName).append(bytes);
  }

  /** Messages waiting in a subscription's backlog. */
  backlog(topicName: string, subscriptionName: string): BackendMessage[] {
    return [...(this.topics.get(topicName)?.subscriptions.get(subscriptionName)?.backlog ?? [])];
  }

  publishedCount(topicName: string): number {
    return this.topics.get(topicName)?.published ?? 0;
  }

  get openProducerCount(): number {
    return this.openProducers.size;
  }

  get openConsumerCount(): number {
    return this.openConsumers.size;
  }

  private topic(name: string): Topic {
    let topic = this.topics.get(name);
    if (!topic) {
      topic = new Topic(name);
      this.topics.set(name, topic);
    }
    return topic;
  }

  private assertOpen(topicName: string): void {
    if (this.closed) {
      throw new BackendUnavailableError("Backend client is closed", { topicName });
    }
  }
}

function partition<T>(items: T[], predicate: (item: T) => boolean): [T[], T[]] {
  const yes: T[] = [];
  const no: T[] = [];
  for (const item of items) (predicate(item) ? yes : no).push(item);
  return [yes, no];
}
