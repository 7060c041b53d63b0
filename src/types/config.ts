import { bridgeConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

export type BackendConfig =
  | { type: "memory" }
  | {
      type: "redis";
      url?: string; // default: "redis://127.0.0.1:6379"
      blockTimeoutMs?: number; // default: 1000
    };

/** Bridge configuration with sensible defaults */
export interface BridgeConfig {
  /** Port the MQTT listener binds (required) */
  port: number;
  host?: string; // default: "0.0.0.0"

  // MQTT transport
  maxPacketSize?: number; // default: 1 MiB
  keepAliveGraceFactor?: number; // default: 1.5

  // Policy
  topicTemplate?: string; // default: "{username}/{topic}"
  allowAnonymous?: boolean; // default: false
  credentials?: Record<string, string>; // default: {}
  subscriptionPrefix?: string; // default: "mqtt-bridge-"

  // Backend
  backend?: BackendConfig; // default: { type: "memory" }
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<BridgeConfig>;

export const DEFAULT_REDIS_URL = "redis://127.0.0.1:6379";

export const DEFAULT_CONFIG: ResolvedConfig = {
  port: 1883,
  host: "0.0.0.0",
  maxPacketSize: 1_048_576,
  keepAliveGraceFactor: 1.5,
  topicTemplate: "{username}/{topic}",
  allowAnonymous: false,
  credentials: {},
  subscriptionPrefix: "mqtt-bridge-",
  backend: { type: "memory" },
};

export function resolveConfig(config: BridgeConfig): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = bridgeConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }

  const backend = config.backend ?? DEFAULT_CONFIG.backend;
  return {
    port: config.port,
    host: config.host ?? DEFAULT_CONFIG.host,
    maxPacketSize: config.maxPacketSize ?? DEFAULT_CONFIG.maxPacketSize,
    keepAliveGraceFactor: config.keepAliveGraceFactor ?? DEFAULT_CONFIG.keepAliveGraceFactor,
    topicTemplate: config.topicTemplate ?? DEFAULT_CONFIG.topicTemplate,
    allowAnonymous: config.allowAnonymous ?? DEFAULT_CONFIG.allowAnonymous,
    credentials: { ...DEFAULT_CONFIG.credentials, ...config.credentials },
    subscriptionPrefix: config.subscriptionPrefix ?? DEFAULT_CONFIG.subscriptionPrefix,
    backend:
      backend.type === "redis"
        ? {
            type: "redis",
            url: backend.url ?? DEFAULT_REDIS_URL,
            blockTimeoutMs: backend.blockTimeoutMs ?? 1000,
          }
        : backend,
  };
}
