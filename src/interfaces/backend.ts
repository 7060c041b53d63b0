/**
 * Backend messaging client abstraction.
 *
 * The bridge never talks to a broker directly; it holds producer and consumer
 * handles created through a {@link BackendClient}. Transport, pooling and
 * wire serialization belong to the implementation.
 * @module
 */

/** A message pulled from a backend topic. */
export interface BackendMessage {
  /** Backend-assigned identifier, passed back to {@link ConsumerHandle.acknowledge}. */
  id: string;
  /** Fully resolved backend topic the message was read from. */
  topicName: string;
  payload: Uint8Array;
}

export interface ProducerHandle {
  readonly topicName: string;
  /** Send and wait for the backend to persist the message. Resolves to the message id. */
  send(payload: Uint8Array): Promise<string>;
  /** Fire-and-forget send; the returned promise only reports the outcome. */
  sendAsync(payload: Uint8Array): Promise<string>;
  close(): Promise<void>;
}

export interface ConsumerHandle {
  readonly topicName: string;
  /**
   * Wait for the next message. Rejects with an AbortError when `signal` fires,
   * or with a backend error when the subscription is no longer usable.
   */
  receive(signal: AbortSignal): Promise<BackendMessage>;
  acknowledge(messageId: string): Promise<void>;
  close(): Promise<void>;
}

/** Factory for producer and consumer handles. Creation failures reject with BackendUnavailableError. */
export interface BackendClient {
  createProducer(topicName: string): Promise<ProducerHandle>;
  /**
   * @param subscriptionName - durable subscription the consumer joins; messages
   *   left unacknowledged are redelivered to the next consumer on the same name.
   */
  createConsumer(topicName: string, subscriptionName: string): Promise<ConsumerHandle>;
  close(): Promise<void>;
}
