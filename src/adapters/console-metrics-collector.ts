import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector, MetricsEventType } from "../interfaces/metrics.js";

function emptyTotals() {
  return {
    published: 0,
    publishedBytes: 0,
    publishFailures: 0,
    forwarded: 0,
    forwardedBytes: 0,
    authFailures: 0,
    errors: 0,
  };
}

interface ClientCounters {
  published: number;
  subscriptions: number;
}

/**
 * Logging metrics collector for observability.
 * Logs key events and keeps running totals for {@link getStats}.
 */
export class ConsoleMetricsCollector implements MetricsCollector {
  private clients = new Map<string, ClientCounters>();
  private totals = emptyTotals();

  constructor(private logger: Logger) {}

  recordEvent(event: MetricsEventType): void {
    switch (event.type) {
      case "session:created":
        this.clients.set(event.clientId, { published: 0, subscriptions: 0 });
        this.logger.info("Session created", {
          component: "metrics",
          clientId: event.clientId,
          username: event.username,
        });
        break;

      case "session:closed":
        this.clients.delete(event.clientId);
        this.logger.info("Session closed", {
          component: "metrics",
          clientId: event.clientId,
          reason: event.reason,
        });
        break;

      case "auth:failed":
        this.totals.authFailures++;
        this.logger.warn("Authentication failed", {
          component: "metrics",
          clientId: event.clientId,
          reason: event.reason,
        });
        break;

      case "message:published":
        {
          this.totals.published++;
          this.totals.publishedBytes += event.bytes;
          const client = this.clients.get(event.clientId);
          if (client) client.published++;
          this.logger.debug?.("Message published", {
            component: "metrics",
            clientId: event.clientId,
            topic: event.topicName,
            qos: event.qos,
            bytes: event.bytes,
          });
        }
        break;

      case "publish:failed":
        this.totals.publishFailures++;
        this.logger.warn("Publish failed", {
          component: "metrics",
          clientId: event.clientId,
          topic: event.topicName,
          reason: event.reason,
        });
        break;

      case "message:forwarded":
        this.totals.forwarded++;
        this.totals.forwardedBytes += event.bytes;
        this.logger.debug?.("Message forwarded", {
          component: "metrics",
          clientId: event.clientId,
          topic: event.topicName,
          bytes: event.bytes,
        });
        break;

      case "subscription:started":
        {
          const client = this.clients.get(event.clientId);
          if (client) client.subscriptions++;
          this.logger.debug?.("Subscription started", {
            component: "metrics",
            clientId: event.clientId,
            topic: event.topicName,
          });
        }
        break;

      case "subscription:stopped":
        {
          const client = this.clients.get(event.clientId);
          if (client && client.subscriptions > 0) client.subscriptions--;
          this.logger.debug?.("Subscription stopped", {
            component: "metrics",
            clientId: event.clientId,
            topic: event.topicName,
          });
        }
        break;

      case "error":
        this.totals.errors++;
        this.logger.warn("Error recorded", {
          component: "metrics",
          source: event.source,
          clientId: event.clientId,
          error: event.error,
          severity: event.severity,
        });
        break;
    }
  }

  getStats(options?: { clientId?: string }): Record<string, unknown> {
    if (options?.clientId) {
      const client = this.clients.get(options.clientId);
      return {
        clientId: options.clientId,
        connected: client !== undefined,
        published: client?.published ?? 0,
        subscriptions: client?.subscriptions ?? 0,
      };
    }

    return {
      activeSessions: this.clients.size,
      activeSubscriptions: Array.from(this.clients.values()).reduce(
        (sum, c) => sum + c.subscriptions,
        0,
      ),
      ...this.totals,
    };
  }

  reset(): void {
    this.clients.clear();
    this.totals = emptyTotals();
  }
}
