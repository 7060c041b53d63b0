import type { Logger } from "../interfaces/logger.js";

const discard = (): void => {};

/** Drops every entry. Components fall back to it when no logger is injected. */
export const noopLogger: Logger = Object.freeze({
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
});
