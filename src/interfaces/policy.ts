/**
 * Policy collaborators consulted by the engine. The engine trusts their answers.
 * @module
 */

/** Decides whether a CONNECT is allowed. Resolve `false` to reject. */
export interface Authenticator {
  authenticate(
    username: string,
    password: Uint8Array | undefined,
    clientId: string,
  ): boolean | Promise<boolean>;
}

/** Maps a client-requested MQTT topic onto a backend topic name. */
export interface TopicResolver {
  resolveTopic(username: string, clientId: string, requestedTopic: string): string;
}
