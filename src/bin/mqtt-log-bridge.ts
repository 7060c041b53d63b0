#!/usr/bin/env node
import { ConsoleMetricsCollector } from "../adapters/console-metrics-collector.js";
import { StructuredLogger } from "../adapters/structured-logger.js";
import { cliLogLevel, mergeCliOptions, parseArgs } from "../config/cli-options.js";
import { loadConfigFile } from "../config/load-config.js";
import { registerSignalHandlers } from "../daemon/signal-handler.js";
import { ConfigError, errorMessage } from "../errors.js";
import { startBridge } from "../server/bridge-server.js";
import { DEFAULT_CONFIG, resolveConfig } from "../types/config.js";

function printHelp(): void {
  console.log(`
  mqtt-log-bridge: MQTT 3.1.1 front end for a log-based message backend

  Usage: mqtt-log-bridge [options]

  Options:
    --config <file>        JSON config file
    --port <n>             MQTT listen port (default: ${DEFAULT_CONFIG.port})
    --host <addr>          Bind address (default: ${DEFAULT_CONFIG.host})
    --backend <type>       memory | redis (default: memory)
    --redis-url <url>      Redis URL; implies --backend redis
    --log-level <level>    debug | info | warn | error (default: info)
    --verbose, -v          Same as --log-level debug
    --help, -h             Show this help
`);
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const cli = parseArgs(process.argv);
  if (cli.help) {
    printHelp();
    return;
  }
  const logger = new StructuredLogger({ level: cliLogLevel(cli) });

  const file = cli.configFile ? await loadConfigFile(cli.configFile) : {};
  const config = resolveConfig(mergeCliOptions(file, cli));

  const bridge = await startBridge(config, {
    logger,
    metrics: new ConsoleMetricsCollector(logger),
  });

  logger.child("cli").info("mqtt-log-bridge running", {
    port: bridge.server.port,
    backend: config.backend.type,
  });

  registerSignalHandlers(() => bridge.close(), { logger });
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error(`Fatal: ${errorMessage(err)}`);
  }
  process.exit(1);
});
