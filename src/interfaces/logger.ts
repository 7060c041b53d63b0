/**
 * Structured logger the bridge programs to. {@link StructuredLogger} writes
 * JSON lines; {@link noopLogger} drops everything.
 *
 * Context keys used across the bridge: `component` names the emitter,
 * `clientId`/`username` identify the session, `topic` is a backend topic name,
 * and `error` carries the caught value.
 * @module
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
