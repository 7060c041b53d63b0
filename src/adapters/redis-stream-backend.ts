/**
 * Redis Streams backend.
 *
 * Each backend topic is a stream. Producers append with XADD; consumers join a
 * consumer group named after the durable subscription and read with
 * XREADGROUP. Entries stay in the group's pending list until XACK, so a
 * consumer recreated under the same subscription first re-reads its own
 * pending entries, then switches to new ones.
 *
 * Blocking reads use a bounded BLOCK timeout and are raced against the
 * caller's AbortSignal; each consumer owns a duplicated connection so a
 * blocked read never stalls producers.
 * @module
 */

import { Redis, type RedisOptions } from "ioredis";
import { z } from "zod";
import { abortError, BackendUnavailableError, errorMessage } from "../errors.js";
import type {
  BackendClient,
  BackendMessage,
  ConsumerHandle,
  ProducerHandle,
} from "../interfaces/backend.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

const PAYLOAD_FIELD = "data";

export interface StreamEntry {
  id: string;
  payload: Uint8Array;
}

/** The Redis stream commands the backend needs. */
export interface StreamCommands {
  ping(): Promise<void>;
  append(stream: string, payload: Uint8Array): Promise<string>;
  /** XGROUP CREATE ... $ MKSTREAM; an existing group is not an error. */
  ensureGroup(stream: string, group: string): Promise<void>;
  /**
   * Read one entry for `consumer`. `from` is ">" for new entries or an entry id
   * to page through the consumer's own pending entries. Resolves null when
   * nothing arrived within `blockMs`.
   */
  readGroup(
    stream: string,
    group: string,
    consumer: string,
    from: string,
    blockMs?: number,
  ): Promise<StreamEntry | null>;
  ack(stream: string, group: string, id: string): Promise<void>;
  /** A separate connection with the same settings, for blocking reads. */
  duplicate(): StreamCommands;
  quit(): Promise<void>;
}

const readGroupReplySchema = z
  .array(
    z.tuple([
      z.instanceof(Buffer),
      z.array(z.tuple([z.instanceof(Buffer), z.array(z.instanceof(Buffer)).nullable()])),
    ]),
  )
  .nullable();

/** Parse an XREADGROUP reply fetched with buffer replies. */
export function parseReadGroupReply(reply: unknown): StreamEntry | null {
  const parsed = readGroupReplySchema.safeParse(reply);
  if (!parsed.success) {
    throw new Error(`Unexpected XREADGROUP reply: ${parsed.error.message}`);
  }
  const entry = parsed.data?.[0]?.[1][0];
  if (!entry) return null;

  const [id, fields] = entry;
  // A pending entry deleted from the stream comes back with nil fields.
  const values = fields ?? [];
  for (let i = 0; i + 1 < values.length; i += 2) {
    if (values[i].toString() === PAYLOAD_FIELD) {
      return { id: id.toString(), payload: new Uint8Array(values[i + 1]) };
    }
  }
  return { id: id.toString(), payload: new Uint8Array(0) };
}

/** {@link StreamCommands} over an ioredis connection. */
export class IoredisStreamCommands implements StreamCommands {
  constructor(private readonly redis: Redis) {}

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async append(stream: string, payload: Uint8Array): Promise<string> {
    const id = await this.redis.call("XADD", [stream, "*", PAYLOAD_FIELD, Buffer.from(payload)]);
    if (typeof id !== "string") {
      throw new Error(`XADD returned no entry id for stream ${stream}`);
    }
    return id;
  }

  async ensureGroup(stream: string, group: string): Promise<void> {
    try {
      await this.redis.call("XGROUP", ["CREATE", stream, group, "$", "MKSTREAM"]);
    } catch (err) {
      if (errorMessage(err).startsWith("BUSYGROUP")) return;
      throw err;
    }
  }

  async readGroup(
    stream: string,
    group: string,
    consumer: string,
    from: string,
    blockMs?: number,
  ): Promise<StreamEntry | null> {
    const args: (string | number)[] = ["GROUP", group, consumer, "COUNT", 1];
    if (blockMs !== undefined) args.push("BLOCK", blockMs);
    args.push("STREAMS", stream, from);
    return parseReadGroupReply(await this.redis.callBuffer("XREADGROUP", args));
  }

  async ack(stream: string, group: string, id: string): Promise<void> {
    await this.redis.call("XACK", [stream, group, id]);
  }

  duplicate(): StreamCommands {
    return new IoredisStreamCommands(this.redis.duplicate());
  }

  async quit(): Promise<void> {
    await this.redis.quit();
  }
}

class StreamProducer implements ProducerHandle {
  private closed = false;

  constructor(
    readonly topicName: string,
    private readonly commands: StreamCommands,
  ) {}

  async send(payload: Uint8Array): Promise<string> {
    if (this.closed) {
      throw new BackendUnavailableError("Producer is closed", { topicName: this.topicName });
    }
    try {
      return await this.commands.append(this.topicName, payload);
    } catch (err) {
      throw new BackendUnavailableError(`XADD to ${this.topicName} failed`, {
        cause: err,
        topicName: this.topicName,
      });
    }
  }

  sendAsync(payload: Uint8Array): Promise<string> {
    return this.send(payload);
  }

  // The connection is shared with other producers and outlives this handle.
  async close(): Promise<void> {
    this.closed = true;
  }
}

class StreamConsumer implements ConsumerHandle {
  private closed = false;
  /** Id of the last pending entry re-read; null once the pending list is drained. */
  private pendingCursor: string | null = "0";
  /** A read whose receiver was cancelled; the next receive takes its result. */
  private inflight: Promise<StreamEntry | null> | null = null;

  constructor(
    readonly topicName: string,
    private readonly group: string,
    private readonly reader: StreamCommands,
    private readonly writer: StreamCommands,
    private readonly blockTimeoutMs: number,
    private readonly logger: Logger,
    private readonly onClose: (consumer: StreamConsumer) => void,
  ) {}

  async receive(signal: AbortSignal): Promise<BackendMessage> {
    for (;;) {
      if (signal.aborted) throw abortError(signal);
      if (this.closed) {
        throw new BackendUnavailableError("Consumer is closed", { topicName: this.topicName });
      }

      const read = this.startRead();
      const entry = await this.raceAbort(read, signal);
      if (this.inflight === read) this.inflight = null;
      if (entry) {
        return { id: entry.id, topicName: this.topicName, payload: entry.payload };
      }
    }
  }

  async acknowledge(messageId: string): Promise<void> {
    await this.writer.ack(this.topicName, this.group, messageId);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.onClose(this);
    await this.reader.quit();
  }

  /** Reuse an unclaimed in-flight read, or start one. */
  private startRead(): Promise<StreamEntry | null> {
    if (this.inflight) return this.inflight;
    const read = this.readNext();
    this.inflight = read;
    // A failed read is reported to whoever awaits it, never to a later receive.
    void read.catch(() => {
      if (this.inflight === read) this.inflight = null;
    });
    return read;
  }

  private async readNext(): Promise<StreamEntry | null> {
    try {
      if (this.pendingCursor !== null) {
        const pending = await this.reader.readGroup(
          this.topicName,
          this.group,
          this.group,
          this.pendingCursor,
        );
        if (pending) {
          this.pendingCursor = pending.id;
          return pending;
        }
        this.pendingCursor = null;
      }
      return await this.reader.readGroup(
        this.topicName,
        this.group,
        this.group,
        ">",
        this.blockTimeoutMs,
      );
    } catch (err) {
      throw new BackendUnavailableError(`XREADGROUP on ${this.topicName} failed`, {
        cause: err,
        topicName: this.topicName,
      });
    }
  }

  /**
   * Settle as soon as `signal` fires. A read still in flight keeps running and
   * is handed to the next receive, so an entry it claims is not skipped.
   */
  private raceAbort<T>(pending: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        reject(abortError(signal));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      pending.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          if (signal.aborted) {
            this.logger.debug?.("Read failed after cancellation", {
              component: "redis-stream-backend",
              topic: this.topicName,
              error: err,
            });
          }
          reject(err);
        },
      );
    });
  }
}

export interface RedisStreamBackendOptions {
  commands: StreamCommands;
  /** Upper bound on one blocking read, in milliseconds. */
  blockTimeoutMs?: number;
  logger?: Logger;
}

export class RedisStreamBackend implements BackendClient {
  private readonly commands: StreamCommands;
  private readonly blockTimeoutMs: number;
  private readonly logger: Logger;
  private readonly consumers = new Set<StreamConsumer>();

  constructor(options: RedisStreamBackendOptions) {
    this.commands = options.commands;
    this.blockTimeoutMs = options.blockTimeoutMs ?? 1000;
    this.logger = options.logger ?? noopLogger;
  }

  /** Build a backend over a new ioredis connection to `url`. */
  static fromUrl(
    url: string,
    options: Omit<RedisStreamBackendOptions, "commands"> & { redis?: RedisOptions } = {},
  ): RedisStreamBackend {
    const redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 1, ...options.redis });
    return new RedisStreamBackend({ ...options, commands: new IoredisStreamCommands(redis) });
  }

  async createProducer(topicName: string): Promise<ProducerHandle> {
    try {
      await this.commands.ping();
    } catch (err) {
      throw new BackendUnavailableError(`Redis unreachable creating producer for ${topicName}`, {
        cause: err,
        topicName,
      });
    }
    return new StreamProducer(topicName, this.commands);
  }

  async createConsumer(topicName: string, subscriptionName: string): Promise<ConsumerHandle> {
    try {
      await this.commands.ensureGroup(topicName, subscriptionName);
    } catch (err) {
      throw new BackendUnavailableError(
        `Creating consumer group ${subscriptionName} on ${topicName} failed`,
        { cause: err, topicName },
      );
    }

    const consumer = new StreamConsumer(
      topicName,
      subscriptionName,
      this.commands.duplicate(),
      this.commands,
      this.blockTimeoutMs,
      this.logger,
      (c) => this.consumers.delete(c),
    );
    this.consumers.add(consumer);
    return consumer;
  }

  async close(): Promise<void> {
    const consumers = [...this.consumers];
    this.consumers.clear();
    await Promise.all(consumers.map((c) => c.close()));
    await this.commands.quit();
  }
}
