/** Layered configuration: base.yaml, then profile.yaml, then LABCTL_ env vars. */
export type ComposeInvocationSetting = "auto" | "plugin" | "standalone";

export type CacheConfig = {
  /** Envelope file location; defaults to ~/.labctl/registry-cache.json. */
  path?: string;
  ttl_hours: number;
};

export type ScanConfig = {
  manifest_names: string[];
  exclude: string[];
  concurrency: number;
  progress_interval: number;
};

export type ComposeConfig = {
  invocation: ComposeInvocationSetting;
  command_timeout_seconds: number;
  inspect_timeout_seconds: number;
};

export type ReadinessConfig = {
  poll_interval_ms: number;
  probe_timeout_ms: number;
  default_timeout_seconds: number;
};

export type LabConfig = {
  schema_version: string;
  root: string;
  cache: CacheConfig;
  scan: ScanConfig;
  compose: ComposeConfig;
  readiness: ReadinessConfig;
};
