import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigurationError } from "../errors.js";
import { CONFIG_KEYS, LIST_KEYS, type ConfigKey } from "../types/config.js";

export const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const ENV_PREFIX = "FLAKEHUB_PUSH_";

/** Misspelled env names still accepted for compatibility with existing workflows. */
const ENV_ALIASES: Record<string, ConfigKey> = {
  visiblity: "visibility",
};

export type RawConfig = Record<string, unknown>;

export type LoadConfigOptions = {
  /** Directory holding base.yaml. */
  configDir?: string;
  /** Optional user config file layered over base.yaml. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** CLI flags, already keyed by config name. Undefined values are ignored. */
  overrides?: RawConfig;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

/** "a, b,,c" → ["a", "b", "c"] */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Normalize a single layer: drop empty strings, split list keys given as strings. */
function normalizeLayer(layer: RawConfig): RawConfig {
  const out: RawConfig = {};
  for (const [key, value] of Object.entries(layer)) {
    if (value === undefined || value === "") continue;
    if (typeof value === "string" && LIST_KEYS.some((k) => k === key)) {
      out[key] = splitList(value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

/** Collect FLAKEHUB_PUSH_ prefixed environment variables as config keys. */
export function envOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const out: RawConfig = {};
  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || value === undefined || value === "") continue;
    // FLAKEHUB_PUSH_ROLLING_MINOR → rolling_minor
    const raw = name.slice(ENV_PREFIX.length).toLowerCase();
    const key = ENV_ALIASES[raw] ?? raw;
    if (!isConfigKey(key)) continue;
    out[key] = value;
  }
  return out;
}

/**
 * Load layered config: base.yaml ← config file ← environment variables ← CLI flags.
 * The result is unvalidated; see `validateConfig`.
 */
export function loadConfig(opts: LoadConfigOptions = {}): RawConfig {
  const dir = opts.configDir ?? CONFIG_DIR;
  const env = opts.env ?? process.env;

  // Layer 1: base.yaml
  let merged = normalizeLayer(loadYaml(path.join(dir, "base.yaml")));

  // Layer 2: user config file
  if (opts.configFile) {
    if (!fs.existsSync(opts.configFile)) {
      throw new ConfigurationError(`Config file not found: ${opts.configFile}`);
    }
    merged = deepMerge(merged, normalizeLayer(loadYaml(opts.configFile)));
  }

  // Layer 3: environment variables
  merged = deepMerge(merged, normalizeLayer(envOverrides(env)));

  // Layer 4: CLI flags
  if (opts.overrides) {
    merged = deepMerge(merged, normalizeLayer(opts.overrides));
  }

  return merged;
}
