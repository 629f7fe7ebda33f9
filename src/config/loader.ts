import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "CDFCTL_";

type ConfigObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigObject, override: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
export function loadYaml(filePath: string): ConfigObject {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

const LIST_KEYS = new Set(["manifest_names", "protected_patterns"]);

function coerceEnvValue(key: string, value: string): unknown {
  if (LIST_KEYS.has(key)) return value.split(",").map((v) => v.trim()).filter((v) => v.length > 0);
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^\d+$/.test(value)) return Number(value);
  return value;
}

/**
 * Apply CDFCTL_ prefixed environment variable overrides.
 * CDFCTL_VALIDATION_LEVEL → validation_level,
 * CDFCTL_SIGNATURE__TIMEOUT_MS → signature.timeout_ms.
 * List keys take comma-separated values.
 */
export function applyEnvOverrides(config: ConfigObject, env: NodeJS.ProcessEnv = process.env): ConfigObject {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    let override: ConfigObject = {};
    const leaf = segments.pop();
    if (!leaf) continue;
    override[leaf] = coerceEnvValue(leaf, value);
    for (const segment of segments.reverse()) override = { [segment]: override };
    result = deepMerge(result, override);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← user config file ← environment variables.
 * The result is unvalidated; pass it through validateConfig.
 */
export function loadConfig(opts: { configFile?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {}): ConfigObject {
  const dir = opts.configDir ?? CONFIG_DIR;

  // Layer 1: shipped defaults
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: user config file
  if (opts.configFile) {
    const file = path.resolve(opts.configFile);
    if (!fs.existsSync(file)) throw new Error(`Config file not found: ${file}`);
    merged = deepMerge(merged, loadYaml(file));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, opts.env);
}
