/**
 * mqtt-log-bridge public API barrel.
 *
 * Re-exports the engine, registry, transports, backends and configuration
 * helpers that make up the public surface of the package.
 * @module
 */

// Adapters
export { ConsoleMetricsCollector } from "./adapters/console-metrics-collector.js";
export { MemoryBackend } from "./adapters/memory-backend.js";
export type { MqttDecoderHandlers, MqttDecoderOptions } from "./adapters/mqtt-codec.js";
export {
  classifyParseError,
  decodePacket,
  encodeFrame,
  MqttStreamDecoder,
} from "./adapters/mqtt-codec.js";
export type { MqttConnectionHandler, NodeMqttServerOptions } from "./adapters/node-mqtt-server.js";
export { NodeMqttServer } from "./adapters/node-mqtt-server.js";
export type {
  RedisStreamBackendOptions,
  StreamCommands,
  StreamEntry,
} from "./adapters/redis-stream-backend.js";
export {
  IoredisStreamCommands,
  parseReadGroupReply,
  RedisStreamBackend,
} from "./adapters/redis-stream-backend.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export type { CliOptions } from "./config/cli-options.js";
export { mergeCliOptions, parseArgs } from "./config/cli-options.js";
export { bridgeConfigFileSchema, bridgeConfigSchema } from "./config/config-schema.js";
export { loadConfigFile } from "./config/load-config.js";
// Core
export type { BridgeEngineOptions } from "./core/bridge-engine.js";
export { BridgeEngine } from "./core/bridge-engine.js";
export type { ForwardingState, ForwardingTaskOptions } from "./core/forwarding-task.js";
export {
  FORWARDING_STATES,
  ForwardingTask,
  isForwardingTransitionAllowed,
} from "./core/forwarding-task.js";
export type { SessionIdentity, SubscriptionBinding, TopicBinding } from "./core/keys.js";
export {
  sameSession,
  sessionIdentity,
  sessionKey,
  subscriptionBinding,
  subscriptionKey,
  topicBinding,
  topicBindingKey,
} from "./core/keys.js";
export type { RegistryStats, ResourceRegistryOptions } from "./core/resource-registry.js";
export { ResourceRegistry } from "./core/resource-registry.js";
export { ReadWriteLock } from "./core/rw-lock.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Daemon
export type { SignalHandlerOptions, SignalTarget } from "./daemon/signal-handler.js";
export { registerSignalHandlers } from "./daemon/signal-handler.js";
// Errors
export {
  abortError,
  BackendUnavailableError,
  BridgeError,
  ConfigError,
  errorMessage,
  ProtocolViolationError,
  toBridgeError,
} from "./errors.js";
// Interfaces
export type {
  BackendClient,
  BackendMessage,
  ConsumerHandle,
  ProducerHandle,
} from "./interfaces/backend.js";
export type { ConnectionHandle } from "./interfaces/connection.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
export type { MetricsCollector, MetricsEventType } from "./interfaces/metrics.js";
export type { Authenticator, TopicResolver } from "./interfaces/policy.js";
// Server
export type { CredentialAuthenticatorOptions } from "./server/credential-authenticator.js";
export { CredentialAuthenticator } from "./server/credential-authenticator.js";
export type { RunningBridge, StartBridgeOptions } from "./server/bridge-server.js";
export { createBackend, startBridge } from "./server/bridge-server.js";
export { DEFAULT_TOPIC_TEMPLATE, TemplateTopicResolver } from "./server/topic-resolver.js";
// Types
export type {
  BackendConfig,
  BridgeConfig,
  ResolvedConfig,
} from "./types/config.js";
export { DEFAULT_CONFIG, DEFAULT_REDIS_URL, resolveConfig } from "./types/config.js";
export type { BridgeEventMap, SessionCloseReason } from "./types/events.js";
export type {
  ConnectMessage,
  DecodeFailure,
  InboundMessage,
  OutboundFrame,
  PublishMessage,
  QoSLevel,
  SubscribeMessage,
  UnsubscribeMessage,
} from "./types/mqtt-messages.js";
export { ConnectReturnCode, MqttQoS } from "./types/mqtt-messages.js";
// Utils
export { noopLogger } from "./utils/noop-logger.js";
