/**
 * ForwardingTask moves backend messages to one client connection for one
 * active subscription.
 *
 * Each iteration blocks on `receive`, writes a PUBLISH delivery to the
 * connection, then acknowledges the message to the backend. Delivery always
 * precedes acknowledgement, so a message is acknowledged only after its write
 * was issued (at-least-once forwarding).
 *
 * Cancellation is cooperative through an AbortSignal, observed at the top of
 * the loop and while blocked on receive. A receive failure that was not caused
 * by cancellation is terminal: the task moves to "failed" and is not restarted.
 *
 * @module MessagePlane
 */

import { errorMessage } from "../errors.js";
import type { BackendMessage, ConsumerHandle } from "../interfaces/backend.js";
import type { ConnectionHandle } from "../interfaces/connection.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector } from "../interfaces/metrics.js";
import type { QoSLevel } from "../types/mqtt-messages.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { SessionIdentity, SubscriptionBinding } from "./keys.js";
import { delivery } from "./replies.js";

export const FORWARDING_STATES = ["idle", "running", "stopped", "failed"] as const;

export type ForwardingState = (typeof FORWARDING_STATES)[number];

const ALLOWED_TRANSITIONS: Record<ForwardingState, ReadonlySet<ForwardingState>> = {
  idle: new Set(["running", "stopped"]),
  running: new Set(["stopped", "failed"]),
  stopped: new Set(),
  failed: new Set(),
};

export function isForwardingTransitionAllowed(from: ForwardingState, to: ForwardingState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

export interface ForwardingTaskOptions {
  session: SessionIdentity;
  binding: SubscriptionBinding;
  consumer: ConsumerHandle;
  /** QoS granted to the subscription; every delivery carries it. */
  qos: QoSLevel;
  logger?: Logger;
  metrics?: MetricsCollector;
  onFailed?: (task: ForwardingTask, error: unknown) => void;
}

export class ForwardingTask {
  readonly session: SessionIdentity;
  readonly binding: SubscriptionBinding;
  readonly qos: QoSLevel;
  private readonly consumer: ConsumerHandle;
  private readonly connection: ConnectionHandle;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector | null;
  private readonly onFailed: ForwardingTaskOptions["onFailed"];
  private readonly controller = new AbortController();
  private current: ForwardingState = "idle";
  private loop: Promise<void> = Promise.resolve();
  private forwarded = 0;

  constructor(options: ForwardingTaskOptions) {
    this.session = options.session;
    this.binding = options.binding;
    this.connection = options.binding.connection;
    this.consumer = options.consumer;
    this.qos = options.qos;
    this.logger = options.logger ?? noopLogger;
    this.metrics = options.metrics ?? null;
    this.onFailed = options.onFailed;
  }

  get state(): ForwardingState {
    return this.current;
  }

  /** Number of deliveries written to the connection so far. */
  get forwardedCount(): number {
    return this.forwarded;
  }

  /** Resolves once the loop has exited. Never rejects. */
  get finished(): Promise<void> {
    return this.loop;
  }

  start(): void {
    if (this.current !== "idle") return;
    this.transition("running");
    this.loop = this.run();
  }

  /** Signal cancellation. Safe to call in any state. */
  cancel(): void {
    if (this.current === "idle") {
      this.transition("stopped");
    }
    this.controller.abort();
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;

    while (!signal.aborted) {
      let message: BackendMessage;
      try {
        message = await this.consumer.receive(signal);
      } catch (err) {
        if (signal.aborted) break;
        this.fail(err);
        return;
      }

      // Cancelled while the receive was settling: leave the message unacknowledged.
      if (signal.aborted) break;

      this.deliver(message);
      await this.acknowledge(message);
    }

    this.transition("stopped");
  }

  private deliver(message: BackendMessage): void {
    try {
      this.connection.write(delivery(message.topicName, message.payload, this.qos));
      this.forwarded++;
      this.metrics?.recordEvent({
        type: "message:forwarded",
        timestamp: Date.now(),
        clientId: this.session.clientId,
        topicName: message.topicName,
        bytes: message.payload.byteLength,
      });
    } catch (err) {
      this.logger.warn("Delivery write failed", {
        component: "forwarding-task",
        topic: this.binding.topicName,
        connection: this.connection.id,
        messageId: message.id,
        error: err,
      });
    }
  }

  private async acknowledge(message: BackendMessage): Promise<void> {
    try {
      await this.consumer.acknowledge(message.id);
    } catch (err) {
      this.logger.warn("Backend acknowledge failed", {
        component: "forwarding-task",
        topic: this.binding.topicName,
        messageId: message.id,
        error: err,
      });
    }
  }

  private fail(err: unknown): void {
    this.transition("failed");
    this.logger.error("Backend receive failed; forwarding stopped", {
      component: "forwarding-task",
      clientId: this.session.clientId,
      topic: this.binding.topicName,
      connection: this.connection.id,
      error: err,
    });
    this.metrics?.recordEvent({
      type: "error",
      timestamp: Date.now(),
      source: "forwarding-task",
      error: errorMessage(err),
      severity: "error",
    });
    try {
      this.onFailed?.(this, err);
    } catch (hookErr) {
      this.logger.error("Forwarding failure hook threw", {
        component: "forwarding-task",
        error: hookErr,
      });
    }
  }

  private transition(next: ForwardingState): void {
    if (!isForwardingTransitionAllowed(this.current, next)) return;
    this.current = next;
  }
}
