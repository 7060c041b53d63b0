import { randomUUID } from "node:crypto";
import { createServer, type Server, type Socket } from "node:net";
import type { Packet } from "mqtt-packet";
import type { ConnectionHandle } from "../interfaces/connection.js";
import type { Logger } from "../interfaces/logger.js";
import type { InboundMessage, OutboundFrame } from "../types/mqtt-messages.js";
import { noopLogger } from "../utils/noop-logger.js";
import { decodePacket, encodeFrame, MqttStreamDecoder } from "./mqtt-codec.js";

/** What the server hands decoded traffic to. {@link BridgeEngine} satisfies it. */
export interface MqttConnectionHandler {
  dispatch(connection: ConnectionHandle, message: InboundMessage): Promise<void>;
  processConnectionLost(connection: ConnectionHandle): Promise<void>;
}

export interface NodeMqttServerOptions {
  /** Port to listen on. Use 0 for a random free port. */
  port: number;
  /** Hostname to bind to. Defaults to "0.0.0.0". */
  host?: string;
  /**
   * Largest accepted remaining length (default: 1MB). A connection is closed
   * once the bytes buffered for one packet pass it, without waiting for the
   * whole packet.
   */
  maxPacketSize?: number;
  /** Keep-alive is enforced at this multiple of the client's interval (default: 1.5). */
  keepAliveGraceFactor?: number;
  logger?: Logger;
}

class SocketConnection implements ConnectionHandle {
  readonly id = randomUUID();
  private closed = false;

  constructor(
    private readonly socket: Socket,
    private readonly logger: Logger,
  ) {}

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  write(frame: OutboundFrame): void {
    if (this.closed || !this.socket.writable) {
      this.logger.debug?.("Dropping frame for closed connection", {
        component: "mqtt-server",
        connection: this.id,
        frame: frame.type,
      });
      return;
    }
    this.socket.write(encodeFrame(frame));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.end();
  }

  /** Mark closed after the peer went away, without touching the socket. */
  markClosed(): void {
    this.closed = true;
  }
}

/**
 * Plain TCP MQTT listener built on `node:net`.
 *
 * Each socket gets its own decoder and a dispatch chain, so the handler sees
 * one connection's packets strictly in arrival order. Socket close always ends
 * with a `processConnectionLost` after every pending dispatch.
 */
export class NodeMqttServer {
  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  private readonly options: NodeMqttServerOptions;
  private readonly logger: Logger;

  constructor(options: NodeMqttServerOptions) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
  }

  /** Actual port after listen (useful when constructed with port: 0). */
  get port(): number | undefined {
    const addr = this.server?.address();
    if (addr && typeof addr === "object") return addr.port;
    return undefined;
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  async listen(handler: MqttConnectionHandler): Promise<void> {
    if (this.server) throw new Error("Server is already listening");

    const server = createServer((socket) => this.accept(socket, handler));
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onError);
      server.listen(this.options.port, this.options.host ?? "0.0.0.0", () => {
        server.off("error", onError);
        server.on("error", (err) => {
          this.logger.error("Listener error", { component: "mqtt-server", error: err });
        });
        this.logger.info("MQTT listener ready", {
          component: "mqtt-server",
          host: this.options.host ?? "0.0.0.0",
          port: this.port,
        });
        resolve();
      });
    });
  }

  private accept(socket: Socket, handler: MqttConnectionHandler): void {
    const connection = new SocketConnection(socket, this.logger);
    const maxPacketSize = this.options.maxPacketSize ?? 1_048_576;
    const graceFactor = this.options.keepAliveGraceFactor ?? 1.5;
    this.sockets.add(socket);
    socket.setNoDelay(true);

    let chain: Promise<void> = Promise.resolve();
    const enqueue = (work: () => Promise<void>) => {
      chain = chain.then(work).catch((err: unknown) => {
        this.logger.error("Connection handler failed", {
          component: "mqtt-server",
          connection: connection.id,
          error: err,
        });
      });
    };

    const decoder = new MqttStreamDecoder(
      {
        onPacket: (packet: Packet) => {
          if (connection.isClosed) return;
          let message: InboundMessage;
          try {
            message = decodePacket(packet);
          } catch (err) {
            this.logger.error("Protocol violation; closing", {
              component: "mqtt-server",
              connection: connection.id,
              error: err,
            });
            connection.close();
            return;
          }

          if (message.type === "connect" && message.keepAliveSeconds) {
            socket.setTimeout(message.keepAliveSeconds * 1000 * graceFactor);
          }
          enqueue(() => handler.dispatch(connection, message));
        },
        onError: (failure) => {
          if (failure.category !== "malformed") {
            enqueue(() =>
              handler.dispatch(connection, { type: "connect", clientId: "", decodeFailure: failure }),
            );
            return;
          }
          this.logger.warn("Malformed packet; closing", {
            component: "mqtt-server",
            connection: connection.id,
            error: failure.cause,
          });
          connection.close();
        },
      },
      { maxPacketSize },
    );

    socket.on("data", (chunk: Buffer) => decoder.push(chunk));
    socket.on("timeout", () => {
      this.logger.info("Keep-alive expired; dropping connection", {
        component: "mqtt-server",
        connection: connection.id,
      });
      socket.destroy();
    });
    socket.on("error", (err) => {
      this.logger.debug?.("Socket error", {
        component: "mqtt-server",
        connection: connection.id,
        error: err,
      });
    });
    socket.on("close", () => {
      this.sockets.delete(socket);
      connection.markClosed();
      enqueue(() => handler.processConnectionLost(connection));
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const socket of this.sockets) socket.destroy();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
