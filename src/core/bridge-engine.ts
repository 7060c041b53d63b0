/**
 * BridgeEngine: protocol-operation handlers for the MQTT ↔ backend bridge.
 *
 * One handler per MQTT operation, each taking the originating connection and
 * the decoded message. Handlers own reply construction and failure responses;
 * backend handles and forwarding tasks live in the {@link ResourceRegistry} and
 * are only borrowed here.
 *
 * Replies to a request are written before the handler returns, so a transport
 * that awaits handlers in arrival order keeps per-connection reply ordering.
 * Deliveries from forwarding tasks are written independently and may
 * interleave with those replies.
 *
 * No handler rejects: every failure is logged, answered with a reply frame, or
 * turned into a connection close at the boundary where it happens.
 *
 * @module SessionControl
 */

import { errorMessage } from "../errors.js";
import type { ConsumerHandle, ProducerHandle } from "../interfaces/backend.js";
import type { ConnectionHandle } from "../interfaces/connection.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsCollector, MetricsEventType } from "../interfaces/metrics.js";
import type { Authenticator, TopicResolver } from "../interfaces/policy.js";
import type { BridgeEventMap, SessionCloseReason } from "../types/events.js";
import {
  type ConnectMessage,
  ConnectReturnCode,
  type InboundMessage,
  MqttQoS,
  type PacketIdMessage,
  type PublishMessage,
  type SubscribeMessage,
  type TopicSubscription,
  type UnsubscribeMessage,
} from "../types/mqtt-messages.js";
import { noopLogger } from "../utils/noop-logger.js";
import { ForwardingTask } from "./forwarding-task.js";
import { type SessionIdentity, sessionIdentity, sessionKey, subscriptionBinding } from "./keys.js";
import { connAck, pingResp, pubAck, subAck, unsubAck } from "./replies.js";
import type { ResourceRegistry } from "./resource-registry.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface BridgeEngineOptions {
  registry: ResourceRegistry;
  authenticator: Authenticator;
  topicResolver: TopicResolver;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class BridgeEngine extends TypedEventEmitter<BridgeEventMap> {
  private readonly registry: ResourceRegistry;
  private readonly authenticator: Authenticator;
  private readonly topicResolver: TopicResolver;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector | null;

  /** Session attached to each connection, kept out-of-band of the connection object. */
  private readonly attachments = new WeakMap<ConnectionHandle, SessionIdentity>();
  /** Connection currently holding each session, for client-id takeover. */
  private readonly liveConnections = new Map<string, ConnectionHandle>();

  constructor(options: BridgeEngineOptions) {
    super();
    this.registry = options.registry;
    this.authenticator = options.authenticator;
    this.topicResolver = options.topicResolver;
    this.logger = options.logger ?? noopLogger;
    this.metrics = options.metrics ?? null;
  }

  /** Route a decoded message to its handler. */
  async dispatch(connection: ConnectionHandle, message: InboundMessage): Promise<void> {
    try {
      switch (message.type) {
        case "connect":
          return await this.processConnect(connection, message);
        case "publish":
          return await this.processPublish(connection, message);
        case "subscribe":
          return await this.processSubscribe(connection, message);
        case "unsubscribe":
          return await this.processUnsubscribe(connection, message);
        case "pingreq":
          return this.processPingReq(connection);
        case "disconnect":
          return await this.processDisconnect(connection);
        case "puback":
          return this.processPubAck(connection, message);
        case "pubrec":
          return this.processPubRec(connection, message);
        case "pubrel":
          return this.processPubRel(connection, message);
        case "pubcomp":
          return this.processPubComp(connection, message);
      }
    } catch (err) {
      this.logger.error("Unhandled error in protocol handler", {
        component: "bridge-engine",
        messageType: message.type,
        connection: connection.id,
        error: err,
      });
      this.closeConnection(connection);
    }
  }

  async processConnect(connection: ConnectionHandle, msg: ConnectMessage): Promise<void> {
    if (msg.decodeFailure) {
      const { category, cause } = msg.decodeFailure;
      if (category === "unsupported-protocol-version") {
        this.reply(connection, connAck(ConnectReturnCode.UNACCEPTABLE_PROTOCOL_VERSION));
        this.logger.error("Connection refused: unsupported protocol version", {
          component: "bridge-engine",
          remoteAddress: connection.remoteAddress,
          error: cause,
        });
      } else if (category === "identifier-rejected") {
        this.reply(connection, connAck(ConnectReturnCode.IDENTIFIER_REJECTED));
        this.logger.error("Connection refused: ineligible client id", {
          component: "bridge-engine",
          remoteAddress: connection.remoteAddress,
          error: cause,
        });
      } else {
        this.logger.warn("Malformed CONNECT; closing without reply", {
          component: "bridge-engine",
          remoteAddress: connection.remoteAddress,
          error: cause,
        });
      }
      this.closeConnection(connection);
      return;
    }

    if (this.attachments.has(connection)) {
      this.logger.error("Second CONNECT on an established connection", {
        component: "bridge-engine",
        remoteAddress: connection.remoteAddress,
      });
      await this.releaseConnection(connection, "disconnect");
      this.closeConnection(connection);
      return;
    }

    const clientId = msg.clientId;
    const username = msg.username ?? "";
    if (isBlank(clientId) || isBlank(username)) {
      this.reply(connection, connAck(ConnectReturnCode.IDENTIFIER_REJECTED));
      this.logger.error("Client id and username must not be empty", {
        component: "bridge-engine",
        remoteAddress: connection.remoteAddress,
      });
      this.closeConnection(connection);
      return;
    }

    if (!(await this.authenticate(username, msg.password, clientId))) {
      this.record({
        type: "auth:failed",
        timestamp: Date.now(),
        clientId,
        reason: "credentials rejected",
      });
      this.reply(connection, connAck(ConnectReturnCode.USE_ANOTHER_SERVER));
      this.closeConnection(connection);
      return;
    }

    const session = sessionIdentity(clientId, username);
    const sKey = sessionKey(session);

    const previous = this.liveConnections.get(sKey);
    if (previous && previous !== connection) {
      this.logger.info("Client id taken over by a new connection", {
        component: "bridge-engine",
        clientId,
        username,
        previousConnection: previous.id,
      });
      await this.releaseConnection(previous, "takeover");
      this.closeConnection(previous);
    }

    await this.registry.openSession(session);
    this.attachments.set(connection, session);
    this.liveConnections.set(sKey, connection);

    this.record({ type: "session:created", timestamp: Date.now(), clientId, username });
    this.notify("session:opened", { clientId, username, connectionId: connection.id });
    this.logger.info("Client connected", {
      component: "bridge-engine",
      clientId,
      username,
      remoteAddress: connection.remoteAddress,
    });
    this.reply(connection, connAck(ConnectReturnCode.ACCEPTED));
  }

  async processPublish(connection: ConnectionHandle, msg: PublishMessage): Promise<void> {
    const session = this.requireSession(connection, "PUBLISH");
    if (!session) return;

    if (msg.qos === MqttQoS.EXACTLY_ONCE) {
      this.logger.error("QoS 2 is not supported; PUBLISH ignored", {
        component: "bridge-engine",
        clientId: session.clientId,
        username: session.username,
      });
      return;
    }
    if (msg.qos === MqttQoS.FAILURE) {
      this.logger.error("Invalid QoS on PUBLISH; ignored", {
        component: "bridge-engine",
        clientId: session.clientId,
        username: session.username,
      });
      return;
    }

    const topicName = this.resolve(session, msg.topicName);
    if (topicName === null) {
      this.closeConnection(connection);
      return;
    }

    let producer: ProducerHandle;
    try {
      producer = await this.registry.getOrCreateProducer(session, topicName);
    } catch (err) {
      this.logger.error("Create backend producer failed", {
        component: "bridge-engine",
        clientId: session.clientId,
        username: session.username,
        topic: topicName,
        error: err,
      });
      this.recordPublishFailure(session, topicName, err);
      this.closeConnection(connection);
      return;
    }

    const payload = msg.payload;
    if (msg.qos === MqttQoS.AT_MOST_ONCE) {
      this.sendFireAndForget(session, producer, payload);
      return;
    }

    try {
      const messageId = await producer.send(payload);
      this.logger.info("Sent message to backend", {
        component: "bridge-engine",
        clientId: session.clientId,
        username: session.username,
        topic: topicName,
        messageId,
      });
      this.recordPublished(session, topicName, msg.qos, payload.byteLength);
      this.reply(connection, pubAck(msg.packetId ?? 0));
    } catch (err) {
      // No PUBACK: the client retransmits after its own timeout.
      this.logger.error("Send message to backend failed", {
        component: "bridge-engine",
        clientId: session.clientId,
        username: session.username,
        topic: topicName,
        error: errorMessage(err),
      });
      this.recordPublishFailure(session, topicName, err);
    }
  }

  async processSubscribe(connection: ConnectionHandle, msg: SubscribeMessage): Promise<void> {
    const session = this.requireSession(connection, "SUBSCRIBE");
    if (!session) return;

    // Granted QoS mirrors the request; there is no downgrade policy.
    this.reply(
      connection,
      subAck(
        msg.packetId,
        msg.subscriptions.map((s) => s.qos),
      ),
    );

    for (const subscription of msg.subscriptions) {
      // Refused in the SUBACK; nothing to forward.
      if (subscription.qos === MqttQoS.FAILURE) continue;
      await this.startForwarding(connection, session, subscription);
    }
  }

  async processUnsubscribe(connection: ConnectionHandle, msg: UnsubscribeMessage): Promise<void> {
    const session = this.requireSession(connection, "UNSUBSCRIBE");
    if (!session) return;

    for (const topicFilter of msg.topicFilters) {
      const topicName = this.resolve(session, topicFilter);
      if (topicName === null) continue;

      const task = await this.registry.cancelForwardingTask(
        subscriptionBinding(connection, topicName),
      );
      if (task) {
        await task.finished;
        this.record({
          type: "subscription:stopped",
          timestamp: Date.now(),
          clientId: session.clientId,
          topicName,
        });
      }
      await this.registry.releaseConsumer(session, topicName);
    }

    this.reply(connection, unsubAck(msg.packetId));
  }

  processPingReq(connection: ConnectionHandle): void {
    this.reply(connection, pingResp());
  }

  // QoS 2 is not supported, so acknowledgement and continuation packets have no effect.

  processPubAck(connection: ConnectionHandle, msg: PacketIdMessage): void {
    this.ignore(connection, msg);
  }

  processPubRec(connection: ConnectionHandle, msg: PacketIdMessage): void {
    this.ignore(connection, msg);
  }

  processPubRel(connection: ConnectionHandle, msg: PacketIdMessage): void {
    this.ignore(connection, msg);
  }

  processPubComp(connection: ConnectionHandle, msg: PacketIdMessage): void {
    this.ignore(connection, msg);
  }

  async processDisconnect(connection: ConnectionHandle): Promise<void> {
    await this.releaseConnection(connection, "disconnect");
    this.logger.info("Client disconnected", {
      component: "bridge-engine",
      connection: connection.id,
    });
    this.closeConnection(connection);
  }

  /** Transport lost the connection without a DISCONNECT. Same cleanup as DISCONNECT. */
  async processConnectionLost(connection: ConnectionHandle): Promise<void> {
    await this.releaseConnection(connection, "connection_lost");
    this.closeConnection(connection);
  }

  /** Release every live session and close its connection. */
  async shutdown(): Promise<void> {
    const connections = [...this.liveConnections.values()];
    await Promise.all(
      connections.map(async (connection) => {
        await this.releaseConnection(connection, "shutdown");
        this.closeConnection(connection);
      }),
    );
    await this.registry.shutdown();
  }

  /** Session attached to `connection`, if CONNECT succeeded on it. */
  sessionOf(connection: ConnectionHandle): SessionIdentity | undefined {
    return this.attachments.get(connection);
  }

  get activeSessionCount(): number {
    return this.liveConnections.size;
  }

  // ── Internals ──

  private async startForwarding(
    connection: ConnectionHandle,
    session: SessionIdentity,
    subscription: TopicSubscription,
  ): Promise<void> {
    const topicName = this.resolve(session, subscription.topicFilter);
    if (topicName === null) return;

    let consumer: ConsumerHandle;
    try {
      consumer = await this.registry.getOrCreateConsumer(session, topicName);
    } catch (err) {
      this.logger.error("Create backend consumer failed; subscription not forwarded", {
        component: "bridge-engine",
        clientId: session.clientId,
        username: session.username,
        topic: topicName,
        error: err,
      });
      return;
    }

    const binding = subscriptionBinding(connection, topicName);
    const task = new ForwardingTask({
      session,
      binding,
      consumer,
      qos: subscription.qos,
      logger: this.logger,
      metrics: this.metrics ?? undefined,
      onFailed: (failed, error) => {
        this.notify("forwarder:failed", {
          clientId: failed.session.clientId,
          topicName: failed.binding.topicName,
          connectionId: failed.binding.connection.id,
          error,
        });
      },
    });

    const replaced = await this.registry.registerForwardingTask(binding, task);
    if (replaced) await replaced.finished;
    task.start();

    this.record({
      type: "subscription:started",
      timestamp: Date.now(),
      clientId: session.clientId,
      topicName,
    });
  }

  /** QoS 0 path: never blocks the handler; the outcome is only logged. */
  private sendFireAndForget(
    session: SessionIdentity,
    producer: ProducerHandle,
    payload: Uint8Array,
  ): void {
    const topicName = producer.topicName;
    const onFailure = (err: unknown) => {
      this.logger.error("Send message to backend failed", {
        component: "bridge-engine",
        clientId: session.clientId,
        username: session.username,
        topic: topicName,
        error: err,
      });
      this.recordPublishFailure(session, topicName, err);
    };

    let pending: Promise<string>;
    try {
      pending = producer.sendAsync(payload);
    } catch (err) {
      onFailure(err);
      return;
    }
    pending
      .then((messageId) => {
        this.logger.info("Sent message to backend", {
          component: "bridge-engine",
          clientId: session.clientId,
          username: session.username,
          topic: topicName,
          messageId,
        });
        this.recordPublished(session, topicName, MqttQoS.AT_MOST_ONCE, payload.byteLength);
      }, onFailure)
      .catch((err: unknown) => {
        this.logger.error("Publish outcome handler threw", { component: "bridge-engine", error: err });
      });
  }

  private async releaseConnection(
    connection: ConnectionHandle,
    reason: SessionCloseReason,
  ): Promise<void> {
    const session = this.attachments.get(connection);
    if (!session) return;

    this.attachments.delete(connection);
    const sKey = sessionKey(session);
    if (this.liveConnections.get(sKey) === connection) {
      this.liveConnections.delete(sKey);
    }

    await this.registry.closeSession(session);

    this.record({
      type: "session:closed",
      timestamp: Date.now(),
      clientId: session.clientId,
      reason,
    });
    this.notify("session:closed", {
      clientId: session.clientId,
      username: session.username,
      connectionId: connection.id,
      reason,
    });
  }

  private requireSession(
    connection: ConnectionHandle,
    operation: string,
  ): SessionIdentity | undefined {
    const session = this.attachments.get(connection);
    if (!session) {
      this.logger.error(`${operation} before CONNECT; closing connection`, {
        component: "bridge-engine",
        remoteAddress: connection.remoteAddress,
      });
      this.closeConnection(connection);
    }
    return session;
  }

  private async authenticate(
    username: string,
    password: Uint8Array | undefined,
    clientId: string,
  ): Promise<boolean> {
    try {
      return await this.authenticator.authenticate(username, password, clientId);
    } catch (err) {
      this.logger.error("Authenticator failed; treating as rejection", {
        component: "bridge-engine",
        clientId,
        username,
        error: err,
      });
      return false;
    }
  }

  private resolve(session: SessionIdentity, requestedTopic: string): string | null {
    try {
      return this.topicResolver.resolveTopic(session.username, session.clientId, requestedTopic);
    } catch (err) {
      this.logger.error("Topic resolution failed", {
        component: "bridge-engine",
        clientId: session.clientId,
        username: session.username,
        requestedTopic,
        error: err,
      });
      return null;
    }
  }

  private reply(connection: ConnectionHandle, frame: Parameters<ConnectionHandle["write"]>[0]): void {
    try {
      connection.write(frame);
    } catch (err) {
      this.logger.warn("Reply write failed", {
        component: "bridge-engine",
        frame: frame.type,
        connection: connection.id,
        error: err,
      });
    }
  }

  private closeConnection(connection: ConnectionHandle): void {
    try {
      connection.close();
    } catch (err) {
      this.logger.warn("Connection close failed", {
        component: "bridge-engine",
        connection: connection.id,
        error: err,
      });
    }
  }

  private ignore(connection: ConnectionHandle, msg: PacketIdMessage): void {
    this.logger.debug?.("Ignoring acknowledgement packet", {
      component: "bridge-engine",
      messageType: msg.type,
      packetId: msg.packetId,
      connection: connection.id,
    });
  }

  private notify<K extends keyof BridgeEventMap & string>(event: K, payload: BridgeEventMap[K]): void {
    try {
      this.emit(event, payload);
    } catch (err) {
      this.logger.error("Event listener threw", { component: "bridge-engine", event, error: err });
    }
  }

  private record(event: MetricsEventType): void {
    this.metrics?.recordEvent(event);
  }

  private recordPublished(
    session: SessionIdentity,
    topicName: string,
    qos: number,
    bytes: number,
  ): void {
    this.record({
      type: "message:published",
      timestamp: Date.now(),
      clientId: session.clientId,
      topicName,
      qos,
      bytes,
    });
  }

  private recordPublishFailure(session: SessionIdentity, topicName: string, err: unknown): void {
    this.record({
      type: "publish:failed",
      timestamp: Date.now(),
      clientId: session.clientId,
      topicName,
      reason: errorMessage(err),
    });
  }
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}
