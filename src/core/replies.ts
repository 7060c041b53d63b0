/**
 * Outbound frame factories used by the engine and forwarding tasks.
 *
 * @module MessagePlane
 */

import type {
  ConnAckFrame,
  ConnectReturnCodeValue,
  PingRespFrame,
  PubAckFrame,
  PublishFrame,
  QoSLevel,
  SubAckFrame,
  UnsubAckFrame,
} from "../types/mqtt-messages.js";

export function connAck(returnCode: ConnectReturnCodeValue): ConnAckFrame {
  return { type: "connack", returnCode, sessionPresent: false };
}

export function pubAck(packetId: number): PubAckFrame {
  return { type: "puback", packetId };
}

export function subAck(packetId: number, granted: QoSLevel[]): SubAckFrame {
  return { type: "suback", packetId, granted };
}

export function unsubAck(packetId: number): UnsubAckFrame {
  return { type: "unsuback", packetId };
}

export function pingResp(): PingRespFrame {
  return { type: "pingresp" };
}

/**
 * Server-to-client delivery. Packet id is always 0: deliveries are not
 * correlated with client acknowledgements.
 */
export function delivery(topicName: string, payload: Uint8Array, qos: QoSLevel): PublishFrame {
  return { type: "publish", topicName, qos, packetId: 0, payload, dup: false, retain: false };
}
