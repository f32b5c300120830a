import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { parseEngineConfig, type EngineConfig } from "./schema.js";
import { DEFAULT_CONFIG, DEFAULT_RAW_CONFIG } from "../config/defaults.js";
import { ConfigError } from "../errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "config-loader" });

/**
 * Load the engine configuration file. A missing file yields the defaults;
 * an unreadable or invalid one is reported and also yields the defaults.
 */
export async function loadEngineConfig(path: string): Promise<EngineConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      log.debug({ path }, "No engine config file found, using defaults");
      return DEFAULT_CONFIG;
    }
    log.warn({ err, path }, "Failed to read engine config, using defaults");
    return DEFAULT_CONFIG;
  }

  try {
    return parseConfigText(content);
  } catch (err) {
    log.warn({ err, path }, "Invalid engine config, using defaults");
    return DEFAULT_CONFIG;
  }
}

/** Parse YAML text and merge it over the defaults; throws when invalid */
export function parseConfigText(content: string): EngineConfig {
  const raw = yaml.load(content);
  if (raw !== undefined && raw !== null && !isPlainObject(raw)) {
    throw new ConfigError("Engine config must be a YAML mapping");
  }
  return parseEngineConfig(mergeRaw(DEFAULT_RAW_CONFIG, raw ?? {}));
}

/** Deep merge: nested mappings merge key by key, everything else is replaced */
export function mergeRaw(defaults: unknown, overrides: unknown): unknown {
  if (!isPlainObject(defaults) || !isPlainObject(overrides)) {
    return overrides === undefined ? defaults : overrides;
  }
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    merged[key] = key in defaults ? mergeRaw(defaults[key], value) : value;
  }
  return merged;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
