import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT"] as const;

type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];
type SignalListener = (signal: NodeJS.Signals) => void;

/** The slice of `process` the handlers touch. */
export interface SignalTarget {
  on(event: ShutdownSignal, listener: SignalListener): unknown;
  off(event: ShutdownSignal, listener: SignalListener): unknown;
  exit(code: number): void;
}

export interface SignalHandlerOptions {
  logger?: Logger;
  /** Exit with 1 when `shutdown` has not settled after this long (default: 10s). */
  timeoutMs?: number;
  target?: SignalTarget;
}

/**
 * Run `shutdown` on the first SIGTERM or SIGINT, then exit 0. A second signal,
 * or a shutdown that outlives `timeoutMs`, exits 1 immediately.
 *
 * Returns a function that removes the handlers.
 */
export function registerSignalHandlers(
  shutdown: () => Promise<void>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const target = options.target ?? process;
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      logger.warn("Second signal during shutdown; exiting now", { component: "daemon", signal });
      target.exit(1);
      return;
    }
    shuttingDown = true;
    logger.info("Shutting down", { component: "daemon", signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out", { component: "daemon", timeoutMs });
      target.exit(1);
    }, timeoutMs);
    forceTimer.unref();

    shutdown()
      .catch((err: unknown) => {
        logger.error("Shutdown failed", { component: "daemon", error: err });
      })
      .finally(() => {
        clearTimeout(forceTimer);
        target.exit(0);
      });
  };

  for (const signal of SHUTDOWN_SIGNALS) target.on(signal, handler);
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) target.off(signal, handler);
  };
}
