import type { OutboundFrame } from "../types/mqtt-messages.js";

/**
 * Transport-agnostic client connection. Only the operations the engine uses.
 *
 * `id` must be stable and unique for the lifetime of the connection; the
 * engine uses it to key forwarding tasks.
 */
export interface ConnectionHandle {
  readonly id: string;
  readonly remoteAddress?: string;
  write(frame: OutboundFrame): void;
  close(): void;
}
