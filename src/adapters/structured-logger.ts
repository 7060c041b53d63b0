import { BridgeError } from "../errors.js";
import type { LogContext, Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

/** Parse a level name such as "warn". Returns undefined for unknown names. */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

/**
 * Flatten one ctx value into `entry`. Errors become `key`, `keyCode` (for
 * bridge errors), `keyCause` and `keyStack`; byte arrays become a length.
 */
function assign(entry: Record<string, unknown>, key: string, value: unknown): void {
  if (value instanceof Error) {
    entry[key] = value.message;
    if (value instanceof BridgeError) entry[`${key}Code`] = value.code;
    if (value.cause instanceof Error) entry[`${key}Cause`] = value.cause.message;
    entry[`${key}Stack`] = value.stack;
    return;
  }
  if (value instanceof Uint8Array) {
    entry[key] = `<${value.byteLength} bytes>`;
    return;
  }
  entry[key] = value;
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
}

/** JSON-lines logger writing to stderr by default. */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
  }

  /** A logger sharing this one's writer and level, tagged with `component`. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ writer: this.writer, level: this.level, component });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(msg: string, ctx?: LogContext): void {
    this.write(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.write(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.write(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.write(LogLevel.ERROR, msg, ctx);
  }

  private write(level: LogLevel, msg: string, ctx: LogContext | undefined): void {
    if (!this.isEnabled(level)) return;

    const time = new Date().toISOString();
    const entry: Record<string, unknown> = { time, level: LEVEL_NAMES[level], msg };
    // A component set on the logger wins over one passed in ctx.
    const component = this.component ?? ctx?.component;
    if (component !== undefined) entry.component = component;

    for (const [key, value] of Object.entries(ctx ?? {})) {
      if (!RESERVED_KEYS.has(key)) assign(entry, key, value);
    }

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch {
      // Circular reference or BigInt in ctx
      line = JSON.stringify({ time, level: LEVEL_NAMES[level], msg, serializationError: true });
    }
    this.writer(line);
  }
}
