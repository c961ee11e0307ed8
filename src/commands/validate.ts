import fs from "node:fs";
import { defaultCachePath } from "../config/loader.js";
import { resolveConfig, type ConfigSource } from "./context.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string, p?: string): Diagnostic {
  return p === undefined ? { level, code, message } : { level, code, message, path: p };
}

/**
 * Check the layered config and the scan root it names. A missing root is an
 * error; a cache file that cannot be read back is only a warning.
 */
export function validate(src: ConfigSource): ValidateResult {
  const res = resolveConfig(src);
  if (!res.ok) return { ok: false, errors: [diag("error", "CONFIG_INVALID", res.error)] };
  const { config } = res;

  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  if (!fs.existsSync(config.root)) {
    errors.push(diag("error", "ROOT_NOT_FOUND", `Scan root not found: ${config.root}`, config.root));
  } else if (!fs.statSync(config.root).isDirectory()) {
    errors.push(diag("error", "ROOT_NOT_DIRECTORY", `Scan root is not a directory: ${config.root}`, config.root));
  }

  const cachePath = config.cache.path ?? defaultCachePath();
  if (fs.existsSync(cachePath) && !fs.statSync(cachePath).isFile()) {
    warnings.push(diag("warn", "CACHE_PATH_NOT_FILE", `Cache path is not a regular file: ${cachePath}`, cachePath));
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, warnings };
}
