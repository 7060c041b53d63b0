/**
 * Metrics collection interface for observability and monitoring.
 * Allows tracking of session lifecycle, message flow and errors.
 */

export interface MetricsEvent {
  timestamp: number; // Unix timestamp in milliseconds
  type: string;
  clientId?: string;
  [key: string]: unknown;
}

/** Session lifecycle events */
export interface SessionCreatedEvent extends MetricsEvent {
  type: "session:created";
  clientId: string;
  username: string;
}

export interface SessionClosedEvent extends MetricsEvent {
  type: "session:closed";
  clientId: string;
  reason: "disconnect" | "connection_lost" | "takeover" | "shutdown";
}

export interface AuthenticationFailedEvent extends MetricsEvent {
  type: "auth:failed";
  clientId: string;
  reason: string;
}

/** Message events */
export interface MessagePublishedEvent extends MetricsEvent {
  type: "message:published";
  clientId: string;
  topicName: string;
  qos: number;
  bytes: number;
}

export interface PublishFailedEvent extends MetricsEvent {
  type: "publish:failed";
  clientId: string;
  topicName: string;
  reason: string;
}

export interface MessageForwardedEvent extends MetricsEvent {
  type: "message:forwarded";
  topicName: string;
  bytes: number;
}

/** Subscription events */
export interface SubscriptionStartedEvent extends MetricsEvent {
  type: "subscription:started";
  clientId: string;
  topicName: string;
}

export interface SubscriptionStoppedEvent extends MetricsEvent {
  type: "subscription:stopped";
  clientId: string;
  topicName: string;
}

export interface ErrorEvent extends MetricsEvent {
  type: "error";
  source: string; // Component that emitted the error
  error: string;
  severity: "warning" | "error" | "critical";
}

/** Union of all metrics events */
export type MetricsEventType =
  | SessionCreatedEvent
  | SessionClosedEvent
  | AuthenticationFailedEvent
  | MessagePublishedEvent
  | PublishFailedEvent
  | MessageForwardedEvent
  | SubscriptionStartedEvent
  | SubscriptionStoppedEvent
  | ErrorEvent;

/**
 * Metrics collector interface.
 * Implementations can collect, aggregate, export metrics.
 */
export interface MetricsCollector {
  recordEvent(event: MetricsEventType): void;

  /** Current statistics (optional). */
  getStats?(): Record<string, unknown>;

  reset?(): void;
}
