/**
 * Identity and resource keys.
 *
 * Plain immutable value types. Equality is by value, expressed through a
 * canonical string form that the registry uses as its `Map` key.
 *
 * @module SessionControl
 */

import type { ConnectionHandle } from "../interfaces/connection.js";

/** One logical client session, alive for the lifetime of one connection. */
export interface SessionIdentity {
  readonly clientId: string;
  readonly username: string;
}

/** A producer or consumer scoped to a session and a resolved backend topic. */
export interface TopicBinding {
  readonly topicName: string;
  readonly session: SessionIdentity;
}

/** Identity of one forwarding task: a live connection fed from one backend topic. */
export interface SubscriptionBinding {
  readonly connection: ConnectionHandle;
  readonly topicName: string;
}

export function sessionIdentity(clientId: string, username: string): SessionIdentity {
  return Object.freeze({ clientId, username });
}

export function topicBinding(session: SessionIdentity, topicName: string): TopicBinding {
  return Object.freeze({ topicName, session });
}

export function subscriptionBinding(
  connection: ConnectionHandle,
  topicName: string,
): SubscriptionBinding {
  return Object.freeze({ connection, topicName });
}

// JSON arrays keep the encoding unambiguous for identifiers containing separators.

export function sessionKey(session: SessionIdentity): string {
  return JSON.stringify([session.clientId, session.username]);
}

export function topicBindingKey(binding: TopicBinding): string {
  return JSON.stringify([binding.session.clientId, binding.session.username, binding.topicName]);
}

export function subscriptionKey(binding: SubscriptionBinding): string {
  return JSON.stringify([binding.connection.id, binding.topicName]);
}

export function sameSession(a: SessionIdentity, b: SessionIdentity): boolean {
  return a.clientId === b.clientId && a.username === b.username;
}
