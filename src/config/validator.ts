import { compileGuard, type SchemaGuard } from "../schema/ajv.js";
import type { LabConfig } from "../types/config.js";

const positiveInt = { type: "integer", minimum: 1 };

/** Config schema: every section required, defaults come from base.yaml. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "root", "cache", "scan", "compose", "readiness"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    root: { type: "string", minLength: 1 },
    cache: {
      type: "object",
      required: ["ttl_hours"],
      properties: {
        path: { type: "string", minLength: 1 },
        ttl_hours: { type: "number", exclusiveMinimum: 0 },
      },
    },
    scan: {
      type: "object",
      required: ["manifest_names", "exclude", "concurrency", "progress_interval"],
      properties: {
        manifest_names: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
        exclude: { type: "array", items: { type: "string" } },
        concurrency: positiveInt,
        progress_interval: positiveInt,
      },
    },
    compose: {
      type: "object",
      required: ["invocation", "command_timeout_seconds", "inspect_timeout_seconds"],
      properties: {
        invocation: { type: "string", enum: ["auto", "plugin", "standalone"] },
        command_timeout_seconds: { type: "number", exclusiveMinimum: 0 },
        inspect_timeout_seconds: { type: "number", exclusiveMinimum: 0 },
      },
    },
    readiness: {
      type: "object",
      required: ["poll_interval_ms", "probe_timeout_ms", "default_timeout_seconds"],
      properties: {
        poll_interval_ms: positiveInt,
        probe_timeout_ms: positiveInt,
        default_timeout_seconds: { type: "number", exclusiveMinimum: 0 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: LabConfig; errors: null }
  | { valid: false; errors: string };

let guard: SchemaGuard<LabConfig> | null = null;

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  guard ??= compileGuard<LabConfig>(CONFIG_SCHEMA);
  if (guard.is(config)) return { valid: true, config, errors: null };
  return { valid: false, errors: guard.errors() };
}
