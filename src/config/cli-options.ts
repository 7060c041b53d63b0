import { LogLevel, parseLogLevel } from "../adapters/structured-logger.js";
import { ConfigError } from "../errors.js";
import { type BridgeConfig, DEFAULT_CONFIG } from "../types/config.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface CliOptions {
  configFile?: string;
  port?: number;
  host?: string;
  backend?: "memory" | "redis";
  redisUrl?: string;
  logLevel?: LogLevel;
  verbose: boolean;
  help: boolean;
}

// ── Arg parsing ────────────────────────────────────────────────────────────

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false };

  const value = (flag: string, next: string | undefined): string => {
    if (next === undefined || next.startsWith("--")) {
      throw new ConfigError(`${flag} requires a value`);
    }
    return next;
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--config":
        options.configFile = value(arg, argv[++i]);
        break;
      case "--port": {
        const port = Number.parseInt(value(arg, argv[++i]), 10);
        if (Number.isNaN(port)) throw new ConfigError("--port requires a number");
        options.port = port;
        break;
      }
      case "--host":
        options.host = value(arg, argv[++i]);
        break;
      case "--backend": {
        const backend = value(arg, argv[++i]);
        if (backend !== "memory" && backend !== "redis") {
          throw new ConfigError(`--backend must be memory or redis, got ${backend}`);
        }
        options.backend = backend;
        break;
      }
      case "--redis-url":
        options.redisUrl = value(arg, argv[++i]);
        break;
      case "--log-level": {
        const name = value(arg, argv[++i]);
        const level = parseLogLevel(name);
        if (level === undefined) {
          throw new ConfigError(`--log-level must be debug, info, warn or error, got ${name}`);
        }
        options.logLevel = level;
        break;
      }
      case "--verbose":
      case "-v":
        options.verbose = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}\nRun with --help for usage.`);
    }
  }

  return options;
}

/** `--log-level` wins over `--verbose`. */
export function cliLogLevel(cli: CliOptions): LogLevel {
  return cli.logLevel ?? (cli.verbose ? LogLevel.DEBUG : LogLevel.INFO);
}

/** Layer CLI flags over a config file's settings. Flags win. */
export function mergeCliOptions(file: Partial<BridgeConfig>, cli: CliOptions): BridgeConfig {
  const merged: BridgeConfig = { ...file, port: cli.port ?? file.port ?? DEFAULT_CONFIG.port };
  if (cli.host !== undefined) merged.host = cli.host;

  if (cli.redisUrl !== undefined || cli.backend === "redis") {
    const fileRedis = file.backend?.type === "redis" ? file.backend : undefined;
    merged.backend = {
      type: "redis",
      url: cli.redisUrl ?? fileRedis?.url,
      blockTimeoutMs: fileRedis?.blockTimeoutMs,
    };
  } else if (cli.backend === "memory") {
    merged.backend = { type: "memory" };
  }
  return merged;
}
