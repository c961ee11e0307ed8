import { RegistryCache } from "../cache/registry-cache.js";
import { FileCacheStore, type CacheStore } from "../cache/store.js";
import { createLogger, type Logger } from "../core/log.js";
import { DockerCli, type CommandRunner } from "../docker/cli.js";
import type { LineSpawner } from "../docker/stream.js";
import { LifecycleDriver } from "../lifecycle/driver.js";
import type { PortProbe } from "../lifecycle/readiness.js";
import { computeFingerprint } from "../scanner/discovery.js";
import { EnvironmentScanner, type ScanProgress } from "../scanner/scanner.js";
import type { LabConfig } from "../types/config.js";
import { defaultCachePath } from "../config/loader.js";
import { Registry } from "./registry.js";

/** Seams for tests and embedders; everything defaults to the real thing. */
export type RegistryDeps = {
  runner?: CommandRunner;
  spawner?: LineSpawner;
  store?: CacheStore;
  probe?: PortProbe;
  onProgress?: (progress: ScanProgress) => void;
  logger?: (scope: string) => Logger;
};

/** Wires config into one Registry with its cache, scanner and driver. */
export function createRegistry(config: LabConfig, deps: RegistryDeps = {}): Registry {
  const log = deps.logger ?? createLogger;
  const discovery = { manifestNames: config.scan.manifest_names, exclude: config.scan.exclude };

  const docker = new DockerCli({
    runner: deps.runner,
    spawner: deps.spawner,
    invocation: config.compose.invocation,
    commandTimeoutMs: config.compose.command_timeout_seconds * 1000,
    inspectTimeoutMs: config.compose.inspect_timeout_seconds * 1000,
    logger: log("docker"),
  });

  const cache = new RegistryCache({
    store: deps.store ?? new FileCacheStore(config.cache.path ?? defaultCachePath(), log("cache")),
    fingerprint: (root) => computeFingerprint(root, discovery),
    ttlMs: config.cache.ttl_hours * 3600 * 1000,
    logger: log("cache"),
  });

  const scanner = new EnvironmentScanner({
    inspectImage: (ref) => docker.imageExists(ref),
    ...discovery,
    concurrency: config.scan.concurrency,
    progressInterval: config.scan.progress_interval,
    onProgress: deps.onProgress,
    logger: log("scan"),
  });

  const driver = new LifecycleDriver({
    root: config.root,
    docker,
    manifestNames: config.scan.manifest_names,
    probe: deps.probe,
    pollIntervalMs: config.readiness.poll_interval_ms,
    probeTimeoutMs: config.readiness.probe_timeout_ms,
    logger: log("lifecycle"),
  });

  return new Registry({ root: config.root, cache, scanner, driver, logger: log("registry") });
}
