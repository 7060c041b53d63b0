import { MemoryBackend } from "../adapters/memory-backend.js";
import { NodeMqttServer } from "../adapters/node-mqtt-server.js";
import { RedisStreamBackend } from "../adapters/redis-stream-backend.js";
import { BridgeEngine } from "../core/bridge-engine.js";
import { ResourceRegistry } from "../core/resource-registry.js";
import type { BackendClient } from "../interfaces/backend.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector } from "../interfaces/metrics.js";
import type { Authenticator, TopicResolver } from "../interfaces/policy.js";
import { type BackendConfig, DEFAULT_REDIS_URL, type ResolvedConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { CredentialAuthenticator } from "./credential-authenticator.js";
import { TemplateTopicResolver } from "./topic-resolver.js";

export interface StartBridgeOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Overrides the backend built from `config.backend`. */
  backend?: BackendClient;
  authenticator?: Authenticator;
  topicResolver?: TopicResolver;
}

export interface RunningBridge {
  readonly engine: BridgeEngine;
  readonly registry: ResourceRegistry;
  readonly server: NodeMqttServer;
  readonly backend: BackendClient;
  /** Stop accepting connections, release every session, then close the backend. */
  close(): Promise<void>;
}

export function createBackend(config: BackendConfig, logger: Logger = noopLogger): BackendClient {
  switch (config.type) {
    case "memory":
      return new MemoryBackend();
    case "redis":
      return RedisStreamBackend.fromUrl(config.url ?? DEFAULT_REDIS_URL, {
        blockTimeoutMs: config.blockTimeoutMs,
        logger,
      });
  }
}

/** Wire backend, registry, policy, engine and listener, and start listening. */
export async function startBridge(
  config: ResolvedConfig,
  options: StartBridgeOptions = {},
): Promise<RunningBridge> {
  const logger = options.logger ?? noopLogger;
  const backend = options.backend ?? createBackend(config.backend, logger);
  const registry = new ResourceRegistry({
    backend,
    logger,
    subscriptionName: (binding) => `${config.subscriptionPrefix}${binding.session.clientId}`,
  });
  const engine = new BridgeEngine({
    registry,
    authenticator:
      options.authenticator ??
      new CredentialAuthenticator({
        credentials: config.credentials,
        allowAnonymous: config.allowAnonymous,
      }),
    topicResolver: options.topicResolver ?? new TemplateTopicResolver(config.topicTemplate),
    logger,
    metrics: options.metrics,
  });
  const server = new NodeMqttServer({
    port: config.port,
    host: config.host,
    maxPacketSize: config.maxPacketSize,
    keepAliveGraceFactor: config.keepAliveGraceFactor,
    logger,
  });

  try {
    await server.listen(engine);
  } catch (err) {
    await backend.close();
    throw err;
  }

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        await server.close();
        await engine.shutdown();
        await backend.close();
        logger.info("Bridge stopped", { component: "bridge" });
      })();
    }
    return closing;
  };

  return { engine, registry, server, backend, close };
}
