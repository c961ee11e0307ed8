import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { isRecord } from "../core/guards.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");
const ENV_PREFIX = "LABCTL_";

export type ConfigTree = Record<string, unknown>;

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const prev = result[key];
      result[key] = deepMerge(isRecord(prev) ? prev : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isRecord(parsed) ? parsed : {};
}

/**
 * Apply LABCTL_ prefixed environment variable overrides.
 * LABCTL_ROOT → root, LABCTL_CACHE__TTL_HOURS → cache.ttl_hours.
 */
export function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let patch: ConfigTree = { [segments[segments.length - 1]]: parseScalar(value) };
    for (let i = segments.length - 2; i >= 0; i--) patch = { [segments[i]]: patch };
    result = deepMerge(result, patch);
  }
  return result;
}

/** "24" → 24, "true" → true; anything that is not a plain scalar stays a string. */
function parseScalar(raw: string): unknown {
  try {
    const v: unknown = YAML.parse(raw);
    return v === null || typeof v === "object" ? raw : v;
  } catch {
    return raw;
  }
}

export type LoadConfigOptions = {
  /** Loads `config/{profile}.yaml` as an override layer. */
  profile?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

/**
 * Load layered config: base.yaml ← profile.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig` before use.
 */
export function loadConfig(opts: LoadConfigOptions = {}): ConfigTree {
  const dir = opts.configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.profile) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.profile}.yaml`)));
  }
  merged = applyEnvOverrides(merged, opts.env);

  if (typeof merged.root === "string") {
    merged.root = path.resolve(opts.cwd ?? process.cwd(), expandHome(merged.root));
  }
  const cache = isRecord(merged.cache) ? merged.cache : {};
  merged.cache = {
    ...cache,
    path: typeof cache.path === "string" ? expandHome(cache.path) : defaultCachePath(),
  };
  return merged;
}

export function defaultCachePath(): string {
  return path.join(os.homedir(), ".labctl", "registry-cache.json");
}

function expandHome(p: string): string {
  return p === "~" || p.startsWith("~/") ? path.join(os.homedir(), p.slice(1)) : p;
}
