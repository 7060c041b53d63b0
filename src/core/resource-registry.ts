/**
 * ResourceRegistry owns every backend handle and forwarding task the bridge
 * holds on behalf of client sessions.
 *
 * State is five maps treated as one unit behind a {@link ReadWriteLock}:
 * - session → producer bindings, session → consumer bindings
 * - binding → producer handle, binding → consumer handle
 * - subscription binding → forwarding task
 *
 * Invariants:
 * - every handle key is also listed in its session's binding set;
 * - at most one producer and one consumer exist per TopicBinding;
 * - at most one forwarding task runs per SubscriptionBinding.
 *
 * Get-or-create holds exclusive access for the whole check-then-create so two
 * concurrent callers can never create two handles for one binding.
 *
 * @module SessionControl
 */

import { BackendUnavailableError } from "../errors.js";
import type { BackendClient, ConsumerHandle, ProducerHandle } from "../interfaces/backend.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { ForwardingTask } from "./forwarding-task.js";
import {
  type SessionIdentity,
  type SubscriptionBinding,
  sameSession,
  sessionKey,
  subscriptionKey,
  type TopicBinding,
  topicBinding,
  topicBindingKey,
} from "./keys.js";
import { ReadWriteLock } from "./rw-lock.js";

type BindingSet = Map<string, TopicBinding>;

interface Closable {
  readonly topicName: string;
  close(): Promise<void>;
}

export interface ResourceRegistryOptions {
  backend: BackendClient;
  logger?: Logger;
  /** Durable subscription name used for a consumer binding. Defaults to the client id. */
  subscriptionName?: (binding: TopicBinding) => string;
}

export interface RegistryStats {
  sessions: number;
  producers: number;
  consumers: number;
  forwardingTasks: number;
}

export class ResourceRegistry {
  private readonly backend: BackendClient;
  private readonly logger: Logger;
  private readonly subscriptionName: (binding: TopicBinding) => string;
  private readonly lock = new ReadWriteLock();

  private readonly sessions = new Map<string, SessionIdentity>();
  private readonly sessionProducers = new Map<string, BindingSet>();
  private readonly sessionConsumers = new Map<string, BindingSet>();
  private readonly producers = new Map<string, ProducerHandle>();
  private readonly consumers = new Map<string, ConsumerHandle>();
  private readonly forwardingTasks = new Map<string, ForwardingTask>();
  private readonly closing = new Map<string, Promise<boolean>>();
  /** Handles already closed by any path; a handle is never closed twice. */
  private readonly closed = new WeakSet<Closable>();

  constructor(options: ResourceRegistryOptions) {
    this.backend = options.backend;
    this.logger = options.logger ?? noopLogger;
    this.subscriptionName = options.subscriptionName ?? ((binding) => binding.session.clientId);
  }

  /**
   * Start tracking a session with empty producer and consumer sets. Existing sets
   * are kept. A teardown still running for the same session finishes first, so
   * it can never release handles the reopened session creates.
   */
  async openSession(session: SessionIdentity): Promise<void> {
    const closing = this.closing.get(sessionKey(session));
    if (closing) await closing;
    await this.lock.write(() => {
      this.track(session);
    });
  }

  async getOrCreateProducer(session: SessionIdentity, topicName: string): Promise<ProducerHandle> {
    const binding = topicBinding(session, topicName);
    const key = topicBindingKey(binding);

    return this.lock.write(async () => {
      const existing = this.producers.get(key);
      if (existing) return existing;

      const producer = await this.create("producer", topicName, () =>
        this.backend.createProducer(topicName),
      );
      this.track(session).producers.set(key, binding);
      this.producers.set(key, producer);
      this.logger.debug?.("Producer created", {
        component: "registry",
        clientId: session.clientId,
        topic: topicName,
      });
      return producer;
    });
  }

  async getOrCreateConsumer(session: SessionIdentity, topicName: string): Promise<ConsumerHandle> {
    const binding = topicBinding(session, topicName);
    const key = topicBindingKey(binding);

    return this.lock.write(async () => {
      let consumer = this.consumers.get(key);
      if (!consumer) {
        const subscription = this.subscriptionName(binding);
        consumer = await this.create("consumer", topicName, () =>
          this.backend.createConsumer(topicName, subscription),
        );
        this.consumers.set(key, consumer);
        this.logger.debug?.("Consumer created", {
          component: "registry",
          clientId: session.clientId,
          topic: topicName,
          subscription,
        });
      }
      this.track(session).consumers.set(key, binding);
      return consumer;
    });
  }

  /**
   * Register `task` under `binding`. A different task already registered there
   * is cancelled and replaced. Returns the replaced task, if any.
   */
  async registerForwardingTask(
    binding: SubscriptionBinding,
    task: ForwardingTask,
  ): Promise<ForwardingTask | undefined> {
    const key = subscriptionKey(binding);
    return this.lock.write(() => {
      const previous = this.forwardingTasks.get(key);
      if (previous && previous !== task) {
        previous.cancel();
      }
      this.forwardingTasks.set(key, task);
      return previous === task ? undefined : previous;
    });
  }

  /** Cancel and forget the task for `binding`. No-op when none is registered. */
  async cancelForwardingTask(binding: SubscriptionBinding): Promise<ForwardingTask | undefined> {
    const key = subscriptionKey(binding);
    return this.lock.write(() => {
      const task = this.forwardingTasks.get(key);
      if (!task) return undefined;
      task.cancel();
      this.forwardingTasks.delete(key);
      return task;
    });
  }

  /**
   * Drop a consumer binding from the session and the consumer map, closing the
   * handle. Returns whether a binding was removed.
   */
  async releaseConsumer(session: SessionIdentity, topicName: string): Promise<boolean> {
    const key = topicBindingKey(topicBinding(session, topicName));
    return this.lock.write(async () => {
      const removed = this.sessionConsumers.get(sessionKey(session))?.delete(key) ?? false;
      const consumer = this.consumers.get(key);
      this.consumers.delete(key);
      if (consumer) {
        await this.closeOnce(consumer, "consumer");
      }
      return removed || consumer !== undefined;
    });
  }

  /**
   * Release everything a session owns: cancel its forwarding tasks, close each
   * producer and consumer exactly once, then purge the session from every map.
   * Unknown sessions are a no-op. Returns whether the session was known.
   */
  closeSession(session: SessionIdentity): Promise<boolean> {
    const sKey = sessionKey(session);
    const inFlight = this.closing.get(sKey);
    if (inFlight) return inFlight;

    const closing = this.teardown(session).finally(() => {
      this.closing.delete(sKey);
    });
    this.closing.set(sKey, closing);
    return closing;
  }

  private async teardown(session: SessionIdentity): Promise<boolean> {
    const sKey = sessionKey(session);

    const snapshot = await this.lock.read(() => {
      if (!this.sessions.has(sKey)) return null;
      return {
        producers: this.handlesOf(this.sessionProducers.get(sKey), this.producers),
        consumers: this.handlesOf(this.sessionConsumers.get(sKey), this.consumers),
        tasks: [...this.forwardingTasks.values()].filter((t) => sameSession(t.session, session)),
      };
    });
    if (!snapshot) return false;

    for (const task of snapshot.tasks) task.cancel();
    await Promise.all(snapshot.tasks.map((t) => t.finished));

    await Promise.all([
      ...snapshot.producers.map((p) => this.closeOnce(p, "producer")),
      ...snapshot.consumers.map((c) => this.closeOnce(c, "consumer")),
    ]);

    await this.lock.write(async () => {
      for (const [key, task] of this.forwardingTasks) {
        if (!sameSession(task.session, session)) continue;
        task.cancel();
        this.forwardingTasks.delete(key);
      }
      // Bindings created while the handles were closing are released here too.
      for (const key of this.sessionProducers.get(sKey)?.keys() ?? []) {
        const producer = this.producers.get(key);
        this.producers.delete(key);
        if (producer) await this.closeOnce(producer, "producer");
      }
      for (const key of this.sessionConsumers.get(sKey)?.keys() ?? []) {
        const consumer = this.consumers.get(key);
        this.consumers.delete(key);
        if (consumer) await this.closeOnce(consumer, "consumer");
      }
      this.sessionProducers.delete(sKey);
      this.sessionConsumers.delete(sKey);
      this.sessions.delete(sKey);
    });

    this.logger.debug?.("Session resources released", {
      component: "registry",
      clientId: session.clientId,
      producers: snapshot.producers.length,
      consumers: snapshot.consumers.length,
    });
    return true;
  }

  /** Close every session. Used on process shutdown. */
  async shutdown(): Promise<void> {
    const sessions = await this.lock.read(() => [...this.sessions.values()]);
    await Promise.all(sessions.map((s) => this.closeSession(s)));
  }

  // ── Introspection ──

  hasSession(session: SessionIdentity): boolean {
    return this.sessions.has(sessionKey(session));
  }

  /** Topic names the session currently produces to and consumes from. */
  sessionTopics(session: SessionIdentity): { producers: string[]; consumers: string[] } {
    const sKey = sessionKey(session);
    const topics = (set: BindingSet | undefined) =>
      [...(set?.values() ?? [])].map((b) => b.topicName);
    return {
      producers: topics(this.sessionProducers.get(sKey)),
      consumers: topics(this.sessionConsumers.get(sKey)),
    };
  }

  forwardingTask(binding: SubscriptionBinding): ForwardingTask | undefined {
    return this.forwardingTasks.get(subscriptionKey(binding));
  }

  stats(): RegistryStats {
    return {
      sessions: this.sessions.size,
      producers: this.producers.size,
      consumers: this.consumers.size,
      forwardingTasks: this.forwardingTasks.size,
    };
  }

  // ── Internals (callers hold the lock) ──

  private track(session: SessionIdentity): { producers: BindingSet; consumers: BindingSet } {
    const sKey = sessionKey(session);
    if (!this.sessions.has(sKey)) this.sessions.set(sKey, session);

    let producers = this.sessionProducers.get(sKey);
    if (!producers) {
      producers = new Map();
      this.sessionProducers.set(sKey, producers);
    }
    let consumers = this.sessionConsumers.get(sKey);
    if (!consumers) {
      consumers = new Map();
      this.sessionConsumers.set(sKey, consumers);
    }
    return { producers, consumers };
  }

  private handlesOf<T>(bindings: BindingSet | undefined, handles: Map<string, T>): T[] {
    const result: T[] = [];
    for (const key of bindings?.keys() ?? []) {
      const handle = handles.get(key);
      if (handle) result.push(handle);
    }
    return result;
  }

  private async create<T>(
    kind: "producer" | "consumer",
    topicName: string,
    factory: () => Promise<T>,
  ): Promise<T> {
    try {
      return await factory();
    } catch (err) {
      if (err instanceof BackendUnavailableError) throw err;
      throw new BackendUnavailableError(`Failed to create ${kind} for topic ${topicName}`, {
        cause: err,
        topicName,
      });
    }
  }

  private async closeOnce(handle: Closable, kind: "producer" | "consumer"): Promise<void> {
    if (this.closed.has(handle)) return;
    this.closed.add(handle);
    try {
      await handle.close();
    } catch (err) {
      this.logger.warn(`Failed to close ${kind}`, {
        component: "registry",
        topic: handle.topicName,
        error: err,
      });
    }
  }
}
