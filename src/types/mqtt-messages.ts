/**
 * Decoded MQTT messages exchanged between the transport and the engine.
 *
 * Inbound messages arrive already parsed; outbound frames are typed replies the
 * transport encodes. Neither side knows about the other's wire format.
 * @module
 */

export const MqttQoS = {
  AT_MOST_ONCE: 0,
  AT_LEAST_ONCE: 1,
  EXACTLY_ONCE: 2,
  /** Marker used by SUBACK for a refused subscription, and by decoders for an invalid level. */
  FAILURE: 0x80,
} as const;

export type QoSLevel = (typeof MqttQoS)[keyof typeof MqttQoS];

export const ConnectReturnCode = {
  ACCEPTED: 0x00,
  UNACCEPTABLE_PROTOCOL_VERSION: 0x01,
  IDENTIFIER_REJECTED: 0x02,
  SERVER_UNAVAILABLE: 0x03,
  BAD_USERNAME_OR_PASSWORD: 0x04,
  NOT_AUTHORIZED: 0x05,
  USE_ANOTHER_SERVER: 0x9c,
} as const;

export type ConnectReturnCodeValue = (typeof ConnectReturnCode)[keyof typeof ConnectReturnCode];

export type DecodeFailureCategory =
  | "unsupported-protocol-version"
  | "identifier-rejected"
  | "malformed";

export interface DecodeFailure {
  category: DecodeFailureCategory;
  cause?: unknown;
}

// ── Inbound ──

export interface ConnectMessage {
  type: "connect";
  clientId: string;
  username?: string;
  password?: Uint8Array;
  keepAliveSeconds?: number;
  decodeFailure?: DecodeFailure;
}

export interface PublishMessage {
  type: "publish";
  topicName: string;
  qos: QoSLevel;
  packetId?: number;
  payload: Uint8Array;
  retain?: boolean;
  dup?: boolean;
}

export interface TopicSubscription {
  topicFilter: string;
  qos: QoSLevel;
}

export interface SubscribeMessage {
  type: "subscribe";
  packetId: number;
  subscriptions: TopicSubscription[];
}

export interface UnsubscribeMessage {
  type: "unsubscribe";
  packetId: number;
  topicFilters: string[];
}

/** Acknowledgement and QoS 2 continuation packets sent by the client. */
export interface PacketIdMessage {
  type: "puback" | "pubrec" | "pubrel" | "pubcomp";
  packetId: number;
}

export interface PingReqMessage {
  type: "pingreq";
}

export interface DisconnectMessage {
  type: "disconnect";
}

export type InboundMessage =
  | ConnectMessage
  | PublishMessage
  | SubscribeMessage
  | UnsubscribeMessage
  | PacketIdMessage
  | PingReqMessage
  | DisconnectMessage;

// ── Outbound ──

export interface ConnAckFrame {
  type: "connack";
  returnCode: ConnectReturnCodeValue;
  sessionPresent: boolean;
}

export interface PubAckFrame {
  type: "puback";
  packetId: number;
}

export interface SubAckFrame {
  type: "suback";
  packetId: number;
  granted: QoSLevel[];
}

export interface UnsubAckFrame {
  type: "unsuback";
  packetId: number;
}

export interface PingRespFrame {
  type: "pingresp";
}

/** Server-to-client delivery of a backend message. */
export interface PublishFrame {
  type: "publish";
  topicName: string;
  qos: QoSLevel;
  packetId: number;
  payload: Uint8Array;
  dup: boolean;
  retain: boolean;
}

export type OutboundFrame =
  | ConnAckFrame
  | PubAckFrame
  | SubAckFrame
  | UnsubAckFrame
  | PingRespFrame
  | PublishFrame;
