/**
 * MQTT 3.1.1 wire codec over `mqtt-packet`.
 *
 * Translates parsed packets into {@link InboundMessage}s and
 * {@link OutboundFrame}s into bytes. Packets a server never receives, or that
 * MQTT 5 adds, are protocol violations.
 * @module
 */

import mqttPacket from "mqtt-packet";
import type { Packet, QoS } from "mqtt-packet";
import { errorMessage, ProtocolViolationError } from "../errors.js";
import {
  type DecodeFailure,
  type InboundMessage,
  MqttQoS,
  type OutboundFrame,
  type QoSLevel,
} from "../types/mqtt-messages.js";

const SUPPORTED_PROTOCOL_VERSIONS = new Set([3, 4]);

export function toQoSLevel(qos: number): QoSLevel {
  switch (qos) {
    case 0:
      return MqttQoS.AT_MOST_ONCE;
    case 1:
      return MqttQoS.AT_LEAST_ONCE;
    case 2:
      return MqttQoS.EXACTLY_ONCE;
    default:
      return MqttQoS.FAILURE;
  }
}

function toWireQoS(qos: QoSLevel): QoS {
  return qos === MqttQoS.FAILURE ? 0 : qos;
}

function toBytes(data: string | Buffer): Uint8Array {
  return typeof data === "string" ? Buffer.from(data, "utf-8") : data;
}

/** Map a parsed packet to the engine's message model. */
export function decodePacket(packet: Packet): InboundMessage {
  switch (packet.cmd) {
    case "connect": {
      const base = {
        type: "connect" as const,
        clientId: packet.clientId,
        username: packet.username,
        password: packet.password,
        keepAliveSeconds: packet.keepalive,
      };
      const version = packet.protocolVersion ?? 4;
      if (!SUPPORTED_PROTOCOL_VERSIONS.has(version)) {
        return {
          ...base,
          decodeFailure: {
            category: "unsupported-protocol-version",
            cause: new Error(`Protocol version ${version} is not supported`),
          },
        };
      }
      if (packet.clientId === "" && packet.clean === false) {
        return {
          ...base,
          decodeFailure: {
            category: "identifier-rejected",
            cause: new Error("Empty client id requires a clean session"),
          },
        };
      }
      return base;
    }

    case "publish":
      return {
        type: "publish",
        topicName: packet.topic,
        qos: toQoSLevel(packet.qos),
        packetId: packet.messageId,
        payload: toBytes(packet.payload),
        retain: packet.retain,
        dup: packet.dup,
      };

    case "subscribe":
      return {
        type: "subscribe",
        packetId: packet.messageId ?? 0,
        subscriptions: packet.subscriptions.map((s) => ({
          topicFilter: s.topic,
          qos: toQoSLevel(s.qos),
        })),
      };

    case "unsubscribe":
      return {
        type: "unsubscribe",
        packetId: packet.messageId ?? 0,
        topicFilters: [...packet.unsubscriptions],
      };

    case "puback":
    case "pubrec":
    case "pubrel":
    case "pubcomp":
      return { type: packet.cmd, packetId: packet.messageId ?? 0 };

    case "pingreq":
      return { type: "pingreq" };

    case "disconnect":
      return { type: "disconnect" };

    default:
      throw new ProtocolViolationError(`Unexpected ${packet.cmd} packet from client`);
  }
}

/** Serialize an outbound frame. */
export function encodeFrame(frame: OutboundFrame): Buffer {
  switch (frame.type) {
    case "connack":
      return mqttPacket.generate({
        cmd: "connack",
        returnCode: frame.returnCode,
        sessionPresent: frame.sessionPresent,
      });
    case "puback":
      return mqttPacket.generate({ cmd: "puback", messageId: frame.packetId });
    case "suback":
      return mqttPacket.generate({
        cmd: "suback",
        messageId: frame.packetId,
        granted: [...frame.granted],
      });
    case "unsuback":
      return mqttPacket.generate({ cmd: "unsuback", messageId: frame.packetId, granted: [] });
    case "pingresp":
      return mqttPacket.generate({ cmd: "pingresp" });
    case "publish":
      return mqttPacket.generate({
        cmd: "publish",
        topic: frame.topicName,
        payload: Buffer.from(frame.payload),
        qos: toWireQoS(frame.qos),
        messageId: frame.qos === MqttQoS.AT_MOST_ONCE ? undefined : frame.packetId,
        dup: frame.dup,
        retain: frame.retain,
      });
  }
}

/**
 * Classify a parser error. Before CONNECT has been read, a protocol version
 * error is answerable with a CONNACK; anything else is malformed.
 */
export function classifyParseError(err: unknown, connectSeen: boolean): DecodeFailure {
  if (!connectSeen && /protocol version/i.test(errorMessage(err))) {
    return { category: "unsupported-protocol-version", cause: err };
  }
  return { category: "malformed", cause: err };
}

export interface MqttDecoderHandlers {
  onPacket(packet: Packet): void;
  onError(failure: DecodeFailure): void;
}

export interface MqttDecoderOptions {
  /** Largest accepted remaining length. Unlimited when omitted. */
  maxPacketSize?: number;
}

// Type byte plus at most four remaining-length bytes.
const MAX_FIXED_HEADER = 5;

function wireSize(remainingLength: number): number {
  let lengthBytes = 1;
  for (let n = remainingLength; n >= 128; n = Math.floor(n / 128)) lengthBytes++;
  return 1 + lengthBytes + remainingLength;
}

/**
 * Incremental decoder for one connection's byte stream. With a size limit,
 * a packet fails as soon as the bytes buffered for it pass the limit, before
 * the rest of it arrives.
 */
export class MqttStreamDecoder {
  private readonly parser = mqttPacket.parser();
  private readonly maxPacketSize: number | undefined;
  private connectSeen = false;
  private failed = false;
  private buffered = 0;

  constructor(
    private readonly handlers: MqttDecoderHandlers,
    options: MqttDecoderOptions = {},
  ) {
    this.maxPacketSize = options.maxPacketSize;
    this.parser.on("packet", (packet: Packet) => {
      if (this.failed) return;
      const length = packet.length ?? 0;
      this.buffered -= wireSize(length);
      if (this.maxPacketSize !== undefined && length > this.maxPacketSize) {
        this.fail({ category: "malformed", cause: this.oversize(length) });
        return;
      }
      if (packet.cmd === "connect") this.connectSeen = true;
      handlers.onPacket(packet);
    });
    this.parser.on("error", (err: unknown) => {
      if (this.failed) return;
      this.fail(classifyParseError(err, this.connectSeen));
    });
  }

  /** Whether a CONNECT packet has been decoded on this stream. */
  get sawConnect(): boolean {
    return this.connectSeen;
  }

  push(chunk: Buffer): void {
    if (this.failed) return;
    this.buffered += chunk.length;
    this.parser.parse(chunk);
    if (
      !this.failed &&
      this.maxPacketSize !== undefined &&
      this.buffered > this.maxPacketSize + MAX_FIXED_HEADER
    ) {
      this.fail({ category: "malformed", cause: this.oversize(this.buffered) });
    }
  }

  private oversize(length: number): ProtocolViolationError {
    return new ProtocolViolationError(
      `Packet of at least ${length} bytes exceeds the ${this.maxPacketSize} byte limit`,
    );
  }

  private fail(failure: DecodeFailure): void {
    this.failed = true;
    this.handlers.onError(failure);
  }
}
