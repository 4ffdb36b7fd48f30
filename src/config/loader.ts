// Config loader: reads ~/.config/archup/config.yaml and validates it against UpgradeConfigSchema.
// The schema supplies a default for every key, so a partial file only overrides what it names.
// A missing or invalid file never aborts an upgrade: defaults are used and the problem is logged.
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { UpgradeConfigSchema, type UpgradeConfig } from "../types/config.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "archup", "config.yaml");

export interface ConfigResult {
  config: UpgradeConfig;
  configPath: string;
  fromFile: boolean;
}

export function defaultConfig(): UpgradeConfig {
  return UpgradeConfigSchema.parse({});
}

/** Validate an already-parsed document. Throws a ZodError on invalid input. */
export function parseConfig(raw: unknown): UpgradeConfig {
  return UpgradeConfigSchema.parse(raw ?? {});
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, "No config file found, using defaults");
    return { config: defaultConfig(), configPath, fromFile: false };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    return { config: parseConfig(parseYaml(raw)), configPath, fromFile: true };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    return { config: defaultConfig(), configPath, fromFile: false };
  }
}
