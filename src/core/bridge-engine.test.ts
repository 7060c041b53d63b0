import { beforeEach, describe, expect, it, vi } from "vitest";
import type { MetricsEventType } from "../interfaces/metrics.js";
import { CredentialAuthenticator } from "../server/credential-authenticator.js";
import { TemplateTopicResolver } from "../server/topic-resolver.js";
import { FailureInjectionBackend } from "../testing/failure-injection-backend.js";
import { createMockConnection, type MockConnection } from "../testing/mock-connection.js";
import type { BridgeEventMap } from "../types/events.js";
import { ConnectReturnCode, MqttQoS, type QoSLevel } from "../types/mqtt-messages.js";
import { BridgeEngine } from "./bridge-engine.js";
import { sessionIdentity, subscriptionBinding } from "./keys.js";
import { ResourceRegistry } from "./resource-registry.js";

const encoder = new TextEncoder();
const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("BridgeEngine", () => {
  let backend: FailureInjectionBackend;
  let registry: ResourceRegistry;
  let engine: BridgeEngine;
  let metrics: MetricsEventType[];
  let events: Array<{ name: keyof BridgeEventMap; payload: unknown }>;

  beforeEach(() => {
    backend = new FailureInjectionBackend();
    registry = new ResourceRegistry({ backend });
    metrics = [];
    events = [];
    engine = new BridgeEngine({
      registry,
      authenticator: new CredentialAuthenticator({
        credentials: { alice: "test-secret", bob: "other-secret" },
      }),
      topicResolver: new TemplateTopicResolver(),
      metrics: { recordEvent: (event) => metrics.push(event) },
    });
    engine.on("session:opened", (payload) => events.push({ name: "session:opened", payload }));
    engine.on("session:closed", (payload) => events.push({ name: "session:closed", payload }));
    engine.on("forwarder:failed", (payload) => events.push({ name: "forwarder:failed", payload }));
  });

  async function connect(
    clientId = "c1",
    username = "alice",
    password = "test-secret",
  ): Promise<MockConnection> {
    const connection = createMockConnection();
    await engine.dispatch(connection, {
      type: "connect",
      clientId,
      username,
      password: encoder.encode(password),
    });
    return connection;
  }

  async function publish(
    connection: MockConnection,
    topicName: string,
    text: string,
    qos: QoSLevel = MqttQoS.AT_LEAST_ONCE,
    packetId = 7,
  ): Promise<void> {
    await engine.dispatch(connection, {
      type: "publish",
      topicName,
      qos,
      packetId,
      payload: encoder.encode(text),
    });
  }

  async function subscribe(
    connection: MockConnection,
    topicFilter: string,
    qos: QoSLevel = MqttQoS.AT_MOST_ONCE,
    packetId = 3,
  ): Promise<void> {
    await engine.dispatch(connection, {
      type: "subscribe",
      packetId,
      subscriptions: [{ topicFilter, qos }],
    });
  }

  const metricTypes = () => metrics.map((m) => m.type);

  // ---------------------------------------------------------------------------
  // CONNECT
  // ---------------------------------------------------------------------------

  describe("CONNECT", () => {
    it("accepts valid credentials", async () => {
      const connection = await connect();

      expect(connection.frames).toEqual([
        { type: "connack", returnCode: ConnectReturnCode.ACCEPTED, sessionPresent: false },
      ]);
      expect(connection.closed).toBe(false);
      expect(engine.sessionOf(connection)).toEqual(sessionIdentity("c1", "alice"));
      expect(engine.activeSessionCount).toBe(1);
      expect(registry.hasSession(sessionIdentity("c1", "alice"))).toBe(true);
      expect(events).toEqual([
        {
          name: "session:opened",
          payload: { clientId: "c1", username: "alice", connectionId: connection.id },
        },
      ]);
      expect(metricTypes()).toEqual(["session:created"]);
    });

    it("answers bad credentials with 0x9C and closes", async () => {
      const connection = await connect("c1", "alice", "wrong");

      expect(connection.framesOfType("connack")).toEqual([
        { type: "connack", returnCode: 0x9c, sessionPresent: false },
      ]);
      expect(connection.closed).toBe(true);
      expect(engine.sessionOf(connection)).toBeUndefined();
      expect(registry.stats().sessions).toBe(0);
      expect(metrics[0]).toMatchObject({ type: "auth:failed", clientId: "c1" });
    });

    it("treats an authenticator that throws as a rejection", async () => {
      const throwing = new BridgeEngine({
        registry,
        authenticator: {
          authenticate: () => {
            throw new Error("directory down");
          },
        },
        topicResolver: new TemplateTopicResolver(),
      });
      const connection = createMockConnection();

      await throwing.dispatch(connection, { type: "connect", clientId: "c1", username: "alice" });

      expect(connection.frames).toEqual([
        { type: "connack", returnCode: ConnectReturnCode.USE_ANOTHER_SERVER, sessionPresent: false },
      ]);
      expect(connection.closed).toBe(true);
    });

    it.each([
      ["blank client id", "  ", "alice"],
      ["empty username", "c1", ""],
    ])("rejects a %s with IDENTIFIER_REJECTED", async (_label, clientId, username) => {
      const connection = await connect(clientId, username);

      expect(connection.frames).toEqual([
        {
          type: "connack",
          returnCode: ConnectReturnCode.IDENTIFIER_REJECTED,
          sessionPresent: false,
        },
      ]);
      expect(connection.closed).toBe(true);
    });

    it("answers an unsupported protocol version with return code 1", async () => {
      const connection = createMockConnection();

      await engine.dispatch(connection, {
        type: "connect",
        clientId: "",
        decodeFailure: { category: "unsupported-protocol-version" },
      });

      expect(connection.frames).toEqual([
        {
          type: "connack",
          returnCode: ConnectReturnCode.UNACCEPTABLE_PROTOCOL_VERSION,
          sessionPresent: false,
        },
      ]);
      expect(connection.closed).toBe(true);
    });

    it("answers a rejected identifier decode failure with return code 2", async () => {
      const connection = createMockConnection();

      await engine.dispatch(connection, {
        type: "connect",
        clientId: "",
        decodeFailure: { category: "identifier-rejected" },
      });

      expect(connection.framesOfType("connack")[0]?.returnCode).toBe(
        ConnectReturnCode.IDENTIFIER_REJECTED,
      );
      expect(connection.closed).toBe(true);
    });

    it("closes without reply on other decode failures", async () => {
      const connection = createMockConnection();

      await engine.dispatch(connection, {
        type: "connect",
        clientId: "",
        decodeFailure: { category: "malformed" },
      });

      expect(connection.frames).toEqual([]);
      expect(connection.closed).toBe(true);
    });

    it("closes a connection that sends CONNECT twice and releases its session", async () => {
      const connection = await connect();
      await publish(connection, "t", "x");

      await engine.dispatch(connection, {
        type: "connect",
        clientId: "c1",
        username: "alice",
        password: encoder.encode("test-secret"),
      });

      expect(connection.closed).toBe(true);
      expect(registry.hasSession(sessionIdentity("c1", "alice"))).toBe(false);
      expect(backend.closedProducers).toBe(1);
      expect(connection.framesOfType("connack")).toHaveLength(1);
    });

    it("takes over a client id held by another connection", async () => {
      const first = await connect();
      await publish(first, "t", "x");
      const second = await connect();

      expect(first.closed).toBe(true);
      expect(second.closed).toBe(false);
      expect(second.framesOfType("connack")[0]?.returnCode).toBe(ConnectReturnCode.ACCEPTED);
      expect(backend.closedProducers).toBe(1);
      expect(engine.activeSessionCount).toBe(1);
      expect(events.map((e) => e.name)).toEqual([
        "session:opened",
        "session:closed",
        "session:opened",
      ]);
      expect(events[1]?.payload).toMatchObject({ reason: "takeover", connectionId: first.id });
    });
  });

  // ---------------------------------------------------------------------------
  // PUBLISH
  // ---------------------------------------------------------------------------

  describe("PUBLISH", () => {
    it("closes a connection that publishes before CONNECT", async () => {
      const connection = createMockConnection();

      await publish(connection, "t", "x");

      expect(connection.closed).toBe(true);
      expect(connection.frames).toEqual([]);
      expect(backend.producersCreated).toBe(0);
    });

    it("QoS 1 sends to the resolved topic and answers PUBACK", async () => {
      const connection = await connect();
      connection.clear();

      await publish(connection, "sensors/temp", "21.5", MqttQoS.AT_LEAST_ONCE, 42);

      expect(connection.frames).toEqual([{ type: "puback", packetId: 42 }]);
      expect(backend.inner.publishedCount("alice/sensors/temp")).toBe(1);
      expect(registry.sessionTopics(sessionIdentity("c1", "alice")).producers).toEqual([
        "alice/sensors/temp",
      ]);
      expect(metrics.at(-1)).toMatchObject({
        type: "message:published",
        clientId: "c1",
        topicName: "alice/sensors/temp",
        qos: 1,
        bytes: 4,
      });
    });

    it("reuses one producer for repeated publishes", async () => {
      const connection = await connect();

      await publish(connection, "t", "a");
      await publish(connection, "t", "b");

      expect(backend.producersCreated).toBe(1);
      expect(backend.inner.publishedCount("alice/t")).toBe(2);
    });

    it("QoS 0 sends without PUBACK", async () => {
      const connection = await connect();
      connection.clear();

      await publish(connection, "t", "fire", MqttQoS.AT_MOST_ONCE);
      await flush();

      expect(connection.frames).toEqual([]);
      expect(backend.inner.publishedCount("alice/t")).toBe(1);
    });

    it("ignores QoS 2 without closing the connection", async () => {
      const connection = await connect();
      connection.clear();

      await publish(connection, "t", "x", MqttQoS.EXACTLY_ONCE);

      expect(connection.frames).toEqual([]);
      expect(connection.closed).toBe(false);
      expect(backend.producersCreated).toBe(0);
    });

    it("ignores a PUBLISH with an invalid QoS without closing the connection", async () => {
      const connection = await connect();
      connection.clear();

      await publish(connection, "t", "x", MqttQoS.FAILURE);

      expect(connection.frames).toEqual([]);
      expect(connection.closed).toBe(false);
      expect(backend.producersCreated).toBe(0);
      expect(engine.sessionOf(connection)).toEqual(sessionIdentity("c1", "alice"));
    });

    it("withholds PUBACK when the QoS 1 send fails", async () => {
      const connection = await connect();
      connection.clear();
      backend.sendFailure = new Error("disk full");

      await publish(connection, "t", "x");

      expect(connection.frames).toEqual([]);
      expect(connection.closed).toBe(false);
      expect(metrics.at(-1)).toMatchObject({
        type: "publish:failed",
        topicName: "alice/t",
        reason: "disk full",
      });
    });

    it("logs a failed QoS 0 send without replying", async () => {
      const connection = await connect();
      connection.clear();
      backend.sendFailure = new Error("disk full");

      await publish(connection, "t", "x", MqttQoS.AT_MOST_ONCE);
      await flush();

      expect(connection.frames).toEqual([]);
      expect(metricTypes()).toContain("publish:failed");
    });

    it("closes the connection when the producer cannot be created", async () => {
      const connection = await connect();
      backend.producerFailure = new Error("broker unreachable");

      await publish(connection, "t", "x");

      expect(connection.closed).toBe(true);
      expect(connection.framesOfType("puback")).toEqual([]);
    });
  });

  // ---------------------------------------------------------------------------
  // SUBSCRIBE / UNSUBSCRIBE
  // ---------------------------------------------------------------------------

  describe("SUBSCRIBE", () => {
    it("answers SUBACK before any delivery, then forwards backend messages", async () => {
      const connection = await connect();
      connection.clear();

      await subscribe(connection, "news", MqttQoS.AT_LEAST_ONCE, 9);
      backend.publish("alice/news", "hello");
      await flush();

      expect(connection.frames.map((f) => f.type)).toEqual(["suback", "publish"]);
      expect(connection.frames[0]).toEqual({ type: "suback", packetId: 9, granted: [1] });
      expect(connection.framesOfType("publish")[0]).toMatchObject({
        topicName: "alice/news",
        qos: 1,
        packetId: 0,
      });
      expect(connection.deliveredText()).toEqual(["hello"]);
    });

    it("grants each requested QoS in order", async () => {
      const connection = await connect();
      connection.clear();

      await engine.dispatch(connection, {
        type: "subscribe",
        packetId: 4,
        subscriptions: [
          { topicFilter: "a", qos: MqttQoS.AT_LEAST_ONCE },
          { topicFilter: "b", qos: MqttQoS.AT_MOST_ONCE },
        ],
      });

      expect(connection.frames[0]).toEqual({ type: "suback", packetId: 4, granted: [1, 0] });
      expect(registry.stats().forwardingTasks).toBe(2);
    });

    it("refuses a subscription with an invalid QoS without forwarding it", async () => {
      const connection = await connect();
      connection.clear();

      await engine.dispatch(connection, {
        type: "subscribe",
        packetId: 4,
        subscriptions: [
          { topicFilter: "a", qos: MqttQoS.FAILURE },
          { topicFilter: "b", qos: MqttQoS.AT_MOST_ONCE },
        ],
      });

      expect(connection.frames).toEqual([{ type: "suback", packetId: 4, granted: [0x80, 0] }]);
      expect(backend.consumersCreated).toBe(1);
      expect(registry.forwardingTask(subscriptionBinding(connection, "alice/a"))).toBeUndefined();
      expect(registry.sessionTopics(sessionIdentity("c1", "alice")).consumers).toEqual(["alice/b"]);
    });

    it("delivers messages another client publishes on the same resolved topic", async () => {
      const subscriber = await connect("sub-1");
      await subscribe(subscriber, "chat");
      const publisher = await connect("pub-1");

      await publish(publisher, "chat", "hi there");
      await flush();

      expect(subscriber.deliveredText()).toEqual(["hi there"]);
    });

    it("replaces the task on a repeated subscription so each message arrives once", async () => {
      const connection = await connect();
      await subscribe(connection, "news");
      await subscribe(connection, "news");

      backend.publish("alice/news", "once");
      await flush();

      expect(connection.deliveredText()).toEqual(["once"]);
      expect(registry.stats().forwardingTasks).toBe(1);
      expect(backend.consumersCreated).toBe(1);
    });

    it("still sends SUBACK when the consumer cannot be created", async () => {
      const connection = await connect();
      connection.clear();
      backend.consumerFailure = new Error("broker unreachable");

      await subscribe(connection, "news");

      expect(connection.frames).toEqual([{ type: "suback", packetId: 3, granted: [0] }]);
      expect(connection.closed).toBe(false);
      expect(registry.stats().forwardingTasks).toBe(0);
    });

    it("emits forwarder:failed when the backend receive breaks", async () => {
      const connection = await connect();
      await subscribe(connection, "news");
      await flush();

      backend.failReceive("alice/news");
      await flush();

      expect(events.at(-1)).toEqual({
        name: "forwarder:failed",
        payload: {
          clientId: "c1",
          topicName: "alice/news",
          connectionId: connection.id,
          error: expect.any(Error),
        },
      });
      expect(registry.forwardingTask(subscriptionBinding(connection, "alice/news"))?.state).toBe(
        "failed",
      );
    });
  });

  describe("UNSUBSCRIBE", () => {
    it("stops forwarding, closes the consumer and answers UNSUBACK", async () => {
      const connection = await connect();
      await subscribe(connection, "news");
      const task = registry.forwardingTask(subscriptionBinding(connection, "alice/news"));
      connection.clear();

      await engine.dispatch(connection, { type: "unsubscribe", packetId: 5, topicFilters: ["news"] });
      backend.publish("alice/news", "late");
      await flush();

      expect(connection.frames).toEqual([{ type: "unsuback", packetId: 5 }]);
      expect(task?.state).toBe("stopped");
      expect(backend.closedConsumers).toBe(1);
      expect(registry.stats().forwardingTasks).toBe(0);
      expect(registry.sessionTopics(sessionIdentity("c1", "alice")).consumers).toEqual([]);
      expect(metricTypes()).toContain("subscription:stopped");
    });

    it("answers UNSUBACK for a topic never subscribed", async () => {
      const connection = await connect();
      connection.clear();

      await engine.dispatch(connection, { type: "unsubscribe", packetId: 6, topicFilters: ["x"] });

      expect(connection.frames).toEqual([{ type: "unsuback", packetId: 6 }]);
    });
  });

  // ---------------------------------------------------------------------------
  // Keep-alive and acknowledgements
  // ---------------------------------------------------------------------------

  it("answers PINGREQ with PINGRESP", async () => {
    const connection = await connect();
    connection.clear();

    await engine.dispatch(connection, { type: "pingreq" });

    expect(connection.frames).toEqual([{ type: "pingresp" }]);
  });

  it.each(["puback", "pubrec", "pubrel", "pubcomp"] as const)(
    "ignores %s from the client",
    async (type) => {
      const connection = await connect();
      connection.clear();

      await engine.dispatch(connection, { type, packetId: 1 });

      expect(connection.frames).toEqual([]);
      expect(connection.closed).toBe(false);
    },
  );

  // ---------------------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------------------

  describe("teardown", () => {
    it("DISCONNECT releases every session resource", async () => {
      const connection = await connect();
      await publish(connection, "a", "x");
      await subscribe(connection, "b");

      await engine.dispatch(connection, { type: "disconnect" });

      expect(connection.closed).toBe(true);
      expect(backend.closedProducers).toBe(1);
      expect(backend.closedConsumers).toBe(1);
      expect(registry.stats()).toEqual({
        sessions: 0,
        producers: 0,
        consumers: 0,
        forwardingTasks: 0,
      });
      expect(engine.activeSessionCount).toBe(0);
      expect(events.at(-1)).toMatchObject({
        name: "session:closed",
        payload: { clientId: "c1", reason: "disconnect" },
      });
    });

    it("connection loss performs the same cleanup", async () => {
      const connection = await connect();
      await publish(connection, "a", "x");
      await subscribe(connection, "b");

      await engine.processConnectionLost(connection);

      expect(backend.closedProducers).toBe(1);
      expect(backend.closedConsumers).toBe(1);
      expect(registry.stats().sessions).toBe(0);
      expect(events.at(-1)).toMatchObject({
        name: "session:closed",
        payload: { reason: "connection_lost" },
      });
    });

    it("a client reconnecting while its old session tears down keeps the new session", async () => {
      const first = await connect();
      await subscribe(first, "t1");
      backend.closeLatency = () => new Promise((resolve) => setTimeout(resolve, 20));

      const lost = engine.processConnectionLost(first);
      const second = await connect();
      await subscribe(second, "t1");
      await lost;
      backend.publish("alice/t1", "hello");
      await flush();

      expect(second.deliveredText()).toEqual(["hello"]);
      expect(registry.hasSession(sessionIdentity("c1", "alice"))).toBe(true);
      expect(registry.stats()).toEqual({
        sessions: 1,
        producers: 0,
        consumers: 1,
        forwardingTasks: 1,
      });
      expect(backend.closedConsumers).toBe(1);
    });

    it("connection loss before CONNECT only closes", async () => {
      const connection = createMockConnection();

      await engine.processConnectionLost(connection);

      expect(connection.closed).toBe(true);
      expect(events).toEqual([]);
    });

    it("a second teardown of the same connection is a no-op", async () => {
      const connection = await connect();
      await engine.dispatch(connection, { type: "disconnect" });
      await engine.processConnectionLost(connection);

      expect(events.filter((e) => e.name === "session:closed")).toHaveLength(1);
    });

    it("leaves other sessions running", async () => {
      const alice = await connect("c1", "alice");
      const bob = await connect("c2", "bob", "other-secret");
      await subscribe(bob, "news");

      await engine.dispatch(alice, { type: "disconnect" });
      backend.publish("bob/news", "still here");
      await flush();

      expect(bob.deliveredText()).toEqual(["still here"]);
      expect(engine.activeSessionCount).toBe(1);
    });

    it("shutdown releases and closes every live connection", async () => {
      const alice = await connect("c1", "alice");
      const bob = await connect("c2", "bob", "other-secret");

      await engine.shutdown();

      expect(alice.closed).toBe(true);
      expect(bob.closed).toBe(true);
      expect(engine.activeSessionCount).toBe(0);
      expect(registry.stats().sessions).toBe(0);
    });
  });

  it("closes the connection when a handler throws unexpectedly", async () => {
    const error = vi.fn();
    const faulty = new BridgeEngine({
      registry,
      authenticator: { authenticate: () => true },
      topicResolver: new TemplateTopicResolver(),
      logger: { info: vi.fn(), warn: vi.fn(), error },
    });
    const connection = createMockConnection();
    vi.spyOn(registry, "openSession").mockRejectedValueOnce(new Error("lock poisoned"));

    await faulty.dispatch(connection, { type: "connect", clientId: "c1", username: "alice" });

    expect(connection.closed).toBe(true);
    expect(error).toHaveBeenCalledWith(
      "Unhandled error in protocol handler",
      expect.objectContaining({ messageType: "connect" }),
    );
  });
});
