import { describe, expect, it, vi } from "vitest";
import { MemoryBackend } from "../adapters/memory-backend.js";
import type { BackendMessage, ConsumerHandle } from "../interfaces/backend.js";
import { FailureInjectionBackend } from "../testing/failure-injection-backend.js";
import { createMockConnection } from "../testing/mock-connection.js";
import { MqttQoS } from "../types/mqtt-messages.js";
import { ForwardingTask, isForwardingTransitionAllowed } from "./forwarding-task.js";
import { sessionIdentity, subscriptionBinding } from "./keys.js";

const session = sessionIdentity("c1", "alice");
const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function setup(consumer: ConsumerHandle, qos: 0 | 1 = MqttQoS.AT_LEAST_ONCE) {
  const connection = createMockConnection();
  const task = new ForwardingTask({
    session,
    binding: subscriptionBinding(connection, consumer.topicName),
    consumer,
    qos,
  });
  return { connection, task };
}

describe("ForwardingTask", () => {
  it("allows only the documented transitions", () => {
    expect(isForwardingTransitionAllowed("idle", "running")).toBe(true);
    expect(isForwardingTransitionAllowed("running", "failed")).toBe(true);
    expect(isForwardingTransitionAllowed("stopped", "running")).toBe(false);
    expect(isForwardingTransitionAllowed("failed", "stopped")).toBe(false);
  });

  it("delivers backend messages with the subscription QoS and packet id 0", async () => {
    const backend = new MemoryBackend();
    const consumer = await backend.createConsumer("alice/t", "sub");
    const { connection, task } = setup(consumer);

    task.start();
    backend.publish("alice/t", "hello");
    await flush();

    expect(connection.framesOfType("publish")).toEqual([
      {
        type: "publish",
        topicName: "alice/t",
        qos: 1,
        packetId: 0,
        payload: new TextEncoder().encode("hello"),
        dup: false,
        retain: false,
      },
    ]);
    expect(task.state).toBe("running");
    expect(task.forwardedCount).toBe(1);

    task.cancel();
    await task.finished;
    expect(task.state).toBe("stopped");
  });

  it("writes the delivery before acknowledging", async () => {
    const order: string[] = [];
    const message: BackendMessage = {
      id: "m-1",
      topicName: "alice/t",
      payload: new Uint8Array([1]),
    };
    let served = false;
    const consumer: ConsumerHandle = {
      topicName: "alice/t",
      receive: (signal) => {
        if (!served) {
          served = true;
          return Promise.resolve(message);
        }
        return new Promise((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        });
      },
      acknowledge: async (id) => {
        order.push(`ack:${id}`);
      },
      close: async () => {},
    };
    const { connection, task } = setup(consumer);
    const write = connection.write.bind(connection);
    connection.write = (frame) => {
      order.push(`write:${frame.type}`);
      write(frame);
    };

    task.start();
    await flush();
    task.cancel();
    await task.finished;

    expect(order).toEqual(["write:publish", "ack:m-1"]);
  });

  it("keeps forwarding when a write fails, still acknowledging", async () => {
    const backend = new FailureInjectionBackend();
    const consumer = await backend.createConsumer("alice/t", "sub");
    const { connection, task } = setup(consumer);
    connection.failWrites();

    task.start();
    backend.publish("alice/t", "a");
    await flush();
    connection.failWrites(null);
    backend.publish("alice/t", "b");
    await flush();

    expect(connection.deliveredText()).toEqual(["b"]);
    expect(backend.acknowledged).toEqual(["alice/t:0", "alice/t:1"]);
    task.cancel();
    await task.finished;
  });

  it("keeps forwarding when an acknowledge fails", async () => {
    const backend = new FailureInjectionBackend();
    const consumer = await backend.createConsumer("alice/t", "sub");
    const { connection, task } = setup(consumer);
    backend.ackFailure = new Error("ack failed");

    task.start();
    backend.publish("alice/t", "a");
    backend.publish("alice/t", "b");
    await flush();

    expect(connection.deliveredText()).toEqual(["a", "b"]);
    expect(task.state).toBe("running");
    task.cancel();
    await task.finished;
  });

  it("stops promptly when cancelled while blocked on receive", async () => {
    const backend = new MemoryBackend();
    const consumer = await backend.createConsumer("alice/t", "sub");
    const { connection, task } = setup(consumer);

    task.start();
    await flush();
    task.cancel();
    await task.finished;
    backend.publish("alice/t", "late");
    await flush();

    expect(task.state).toBe("stopped");
    expect(connection.frames).toEqual([]);
    expect(backend.backlog("alice/t", "sub")).toHaveLength(1);
  });

  it("does not deliver or acknowledge a message received after cancellation", async () => {
    const acknowledge = vi.fn(async () => {});
    let release: (message: BackendMessage) => void = () => {};
    const consumer: ConsumerHandle = {
      topicName: "alice/t",
      receive: () =>
        new Promise<BackendMessage>((resolve) => {
          release = resolve;
        }),
      acknowledge,
      close: async () => {},
    };
    const { connection, task } = setup(consumer);

    task.start();
    await flush();
    task.cancel();
    release({ id: "m-1", topicName: "alice/t", payload: new Uint8Array([1]) });
    await task.finished;

    expect(connection.frames).toEqual([]);
    expect(acknowledge).not.toHaveBeenCalled();
  });

  it("moves to failed on a receive error and reports it once", async () => {
    const backend = new FailureInjectionBackend();
    const consumer = await backend.createConsumer("alice/t", "sub");
    const connection = createMockConnection();
    const onFailed = vi.fn();
    const task = new ForwardingTask({
      session,
      binding: subscriptionBinding(connection, "alice/t"),
      consumer,
      qos: MqttQoS.AT_MOST_ONCE,
      onFailed,
    });

    task.start();
    await flush();
    const error = new Error("broker gone");
    backend.failReceive("alice/t", error);
    await task.finished;

    expect(task.state).toBe("failed");
    expect(onFailed).toHaveBeenCalledOnce();
    expect(onFailed).toHaveBeenCalledWith(task, error);
  });

  it("finished resolves even when the failure hook throws", async () => {
    const backend = new FailureInjectionBackend();
    const consumer = await backend.createConsumer("alice/t", "sub");
    const connection = createMockConnection();
    const task = new ForwardingTask({
      session,
      binding: subscriptionBinding(connection, "alice/t"),
      consumer,
      qos: MqttQoS.AT_MOST_ONCE,
      onFailed: () => {
        throw new Error("hook failed");
      },
    });

    task.start();
    await flush();
    backend.failReceive("alice/t");

    await expect(task.finished).resolves.toBeUndefined();
    expect(task.state).toBe("failed");
  });

  it("cancel before start leaves the task stopped and start a no-op", async () => {
    const backend = new MemoryBackend();
    const consumer = await backend.createConsumer("alice/t", "sub");
    const { task } = setup(consumer);

    task.cancel();
    task.start();
    await task.finished;

    expect(task.state).toBe("stopped");
  });

  it("records a forwarded metric per delivery", async () => {
    const backend = new MemoryBackend();
    const consumer = await backend.createConsumer("alice/t", "sub");
    const connection = createMockConnection();
    const recordEvent = vi.fn();
    const task = new ForwardingTask({
      session,
      binding: subscriptionBinding(connection, "alice/t"),
      consumer,
      qos: MqttQoS.AT_MOST_ONCE,
      metrics: { recordEvent },
    });

    task.start();
    backend.publish("alice/t", "abc");
    await flush();
    task.cancel();
    await task.finished;

    expect(recordEvent).toHaveBeenCalledWith(
      expect.objectContaining({
        type: "message:forwarded",
        clientId: "c1",
        topicName: "alice/t",
        bytes: 3,
      }),
    );
  });
});
