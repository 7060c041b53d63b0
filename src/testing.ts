/**
 * Public test utilities, exported from the `"mqtt-log-bridge/testing"` entry point.
 * Consumers can import these helpers to test handlers and backends in process.
 */
export { MemoryBackend } from "./adapters/memory-backend.js";
export { FailureInjectionBackend } from "./testing/failure-injection-backend.js";
export { createMockConnection, MockConnection } from "./testing/mock-connection.js";
export { MqttTestClient, waitUntil } from "./testing/mqtt-test-client.js";
export { noopLogger } from "./utils/noop-logger.js";
