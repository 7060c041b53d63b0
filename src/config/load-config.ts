import { readFile } from "node:fs/promises";
import { ConfigError, errorMessage } from "../errors.js";
import type { BridgeConfig } from "../types/config.js";
import { bridgeConfigFileSchema } from "./config-schema.js";

/** Read and validate a JSON config file. Fields it omits are left undefined. */
export async function loadConfigFile(path: string): Promise<Partial<BridgeConfig>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = bridgeConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}
