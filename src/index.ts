export { Registry, type DetailResult, type RegistryOptions } from "./registry/registry.js";
export { createRegistry, type RegistryDeps } from "./registry/factory.js";
export { computeStats } from "./registry/stats.js";
export { RegistryCache, DEFAULT_TTL_HOURS, type RegistryCacheOptions } from "./cache/registry-cache.js";
export { FileCacheStore, MemoryCacheStore, type CacheStore } from "./cache/store.js";
export { EnvironmentScanner, type ScannerOptions, type ScanProgress, type ImageInspector } from "./scanner/scanner.js";
export { computeFingerprint, findManifests, fingerprintManifestSet } from "./scanner/discovery.js";
export { parseManifest, parseManifestText, type ParsedManifest } from "./manifest/parser.js";
export { extractHostPort } from "./manifest/ports.js";
export { LifecycleDriver, type LifecycleDriverOptions } from "./lifecycle/driver.js";
export { resolveEnvironment, type ResolvedEnvironment } from "./lifecycle/security.js";
export { httpProbe, waitForReady, type PortProbe } from "./lifecycle/readiness.js";
export { DockerCli, execRunner, type CommandRunner, type CommandResult } from "./docker/cli.js";
export { spawnLines, type LineSpawner } from "./docker/stream.js";
export { LabError, isLabError, isPortConflict, type LabErrorCode } from "./core/errors.js";
export { createLogger, silentLogger, type Logger } from "./core/log.js";
export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export type * from "./types/environment.js";
export type * from "./types/lifecycle.js";
export type * from "./types/config.js";
