import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { createRegistry, type RegistryDeps } from "../registry/factory.js";
import type { Registry } from "../registry/registry.js";
import type { LabConfig } from "../types/config.js";
import { EXIT, type CommandFailure } from "./exit-codes.js";

export type ConfigSource = {
  configDir?: string;
  profile?: string;
  env?: NodeJS.ProcessEnv;
};

export type OpenResult = { ok: true; config: LabConfig; registry: Registry } | CommandFailure;

export function resolveConfig(src: ConfigSource): { ok: true; config: LabConfig } | CommandFailure {
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig({ configDir: src.configDir, profile: src.profile, env: src.env });
  } catch (e) {
    return { ok: false, error: `Failed to load config: ${e instanceof Error ? e.message : String(e)}`, exitCode: EXIT.INVALID_ARGS };
  }
  const res = validateConfig(raw);
  if (!res.valid) return { ok: false, error: `Config invalid: ${res.errors}`, exitCode: EXIT.INVALID_ARGS };
  return { ok: true, config: res.config };
}

/** Load and validate config, then build the registry every command talks to. */
export function openRegistry(src: ConfigSource, deps: RegistryDeps = {}): OpenResult {
  const res = resolveConfig(src);
  if (!res.ok) return res;
  return { ok: true, config: res.config, registry: createRegistry(res.config, deps) };
}
