/**
 * Domain event map for the bridge engine.
 *
 * Events flow through {@link TypedEventEmitter}; the bootstrap and tests
 * subscribe to them. Metrics are recorded separately through MetricsCollector.
 * @module
 */

export type SessionCloseReason = "disconnect" | "connection_lost" | "takeover" | "shutdown";

/** Events emitted by {@link BridgeEngine}. */
export interface BridgeEventMap {
  "session:opened": { clientId: string; username: string; connectionId: string };
  "session:closed": {
    clientId: string;
    username: string;
    connectionId: string;
    reason: SessionCloseReason;
  };
  "forwarder:failed": {
    clientId: string;
    topicName: string;
    connectionId: string;
    error: unknown;
  };
}
