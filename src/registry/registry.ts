import fs from "node:fs";
import path from "node:path";
import type { RegistryCache } from "../cache/registry-cache.js";
import { KeyedMutex, SingleFlight } from "../core/concurrency.js";
import { errorMessage, LabError, type LabErrorCode } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/log.js";
import type { LifecycleDriver } from "../lifecycle/driver.js";
import type { ResolvedEnvironment } from "../lifecycle/security.js";
import type { EnvironmentScanner } from "../scanner/scanner.js";
import type {
  EnvironmentDetail,
  EnvironmentStatus,
  RegistrySnapshot,
  RegistryStats,
} from "../types/environment.js";
import type {
  ContainerSummary,
  ImageCheckResult,
  LifecycleFailure,
  LifecycleResult,
  ReadinessResult,
} from "../types/lifecycle.js";
import { buildDetail } from "./detail.js";
import { computeStats } from "./stats.js";

export type RegistryOptions = {
  root: string;
  cache: RegistryCache;
  scanner: EnvironmentScanner;
  driver: LifecycleDriver;
  logger?: Logger;
};

export type DetailResult = { ok: true; detail: EnvironmentDetail } | { ok: false; code: LabErrorCode; error: string };

/**
 * Composition root. Sole mutator of the in-process snapshot: rebuilds are
 * coalesced, and lifecycle operations on one identifier run one at a time.
 */
export class Registry {
  readonly root: string;
  private readonly cache: RegistryCache;
  private readonly scanner: EnvironmentScanner;
  private readonly driver: LifecycleDriver;
  private readonly logger: Logger;
  private readonly rebuilds = new SingleFlight<RegistrySnapshot>();
  private readonly locks = new KeyedMutex();

  constructor(opts: RegistryOptions) {
    this.root = opts.root;
    this.cache = opts.cache;
    this.scanner = opts.scanner;
    this.driver = opts.driver;
    this.logger = opts.logger ?? silentLogger;
  }

  /** @throws LabError ROOT_NOT_FOUND when a rebuild is needed and the root is gone */
  async listEnvironments(forceRefresh = false): Promise<RegistrySnapshot> {
    if (forceRefresh) return this.refreshCache();
    const cached = await this.cache.load(this.root);
    if (cached) return cached;
    return this.rebuild();
  }

  async refreshCache(): Promise<RegistrySnapshot> {
    try {
      await this.cache.invalidate();
    } catch (e) {
      this.logger.warn(`Cache invalidation failed: ${errorMessage(e)}`);
    }
    return this.rebuild();
  }

  async getEnvironment(identifier: string): Promise<DetailResult> {
    const env = this.tryResolve(identifier);
    if (!env.ok) return env;
    await this.cache.load(this.root);
    return { ok: true, detail: buildDetail(env.env, this.cache.find(env.env.identifier)) };
  }

  async startEnvironment(identifier: string): Promise<LifecycleResult> {
    return this.transition(identifier, "running", (id) => this.driver.start(id));
  }

  async stopEnvironment(identifier: string): Promise<LifecycleResult> {
    return this.transition(identifier, "stopped", (id) => this.driver.stop(id));
  }

  async checkImages(identifier: string): Promise<ImageCheckResult> {
    return this.driver.checkImages(identifier);
  }

  /**
   * Pull output line by line. Holds the identifier's lock until the sequence
   * ends or the consumer stops iterating.
   * @throws LabError INVALID_IDENTIFIER before anything runs, SUBPROCESS_FAILED when the pull fails
   */
  async *pullImages(identifier: string): AsyncGenerator<string, void, undefined> {
    const env = this.driver.resolve(identifier);
    const release = await this.locks.acquire(env.identifier);
    try {
      yield* this.driver.pullImages(env.identifier);
    } finally {
      release();
    }
  }

  async waitReady(identifier: string, timeoutSeconds: number): Promise<ReadinessResult> {
    return this.driver.waitReady(identifier, timeoutSeconds);
  }

  lastError(identifier: string): LifecycleFailure | undefined {
    const env = this.tryResolve(identifier);
    return this.driver.lastError(env.ok ? env.env.identifier : identifier);
  }

  /** Probes one environment with `compose ps` and records the answer. */
  async refreshStatus(identifier: string): Promise<EnvironmentStatus> {
    const env = this.tryResolve(identifier);
    if (!env.ok) return "unknown";
    const status = await this.driver.status(env.env.identifier);
    await this.cache.load(this.root);
    this.cache.setStatus(env.env.identifier, status);
    return status;
  }

  /** One `docker ps` call decides the status of every listed environment. */
  async reconcileStatuses(): Promise<RegistrySnapshot> {
    const snapshot = await this.listEnvironments();
    const dirs = await this.driver.runningProjectDirs();
    if (dirs === null) this.logger.warn("Could not list running compose projects");

    for (const rec of snapshot) {
      let status: EnvironmentStatus = "unknown";
      if (dirs !== null) {
        status = this.directoryCandidates(rec.identifier).some((d) => dirs.has(d)) ? "running" : "stopped";
      }
      this.cache.setStatus(rec.identifier, status);
    }
    return this.cache.current() ?? snapshot;
  }

  async stats(): Promise<RegistryStats> {
    const snapshot = await this.listEnvironments();
    return computeStats(this.cache.current() ?? snapshot);
  }

  async runningContainers(): Promise<{ ok: true; containers: ContainerSummary[] } | { ok: false; error: string }> {
    return this.driver.runningContainers();
  }

  private rebuild(): Promise<RegistrySnapshot> {
    return this.rebuilds.run(async () => {
      const snapshot = await this.scanner.scan(this.root);
      try {
        await this.cache.store(this.root, snapshot);
      } catch (e) {
        this.logger.warn(`Cache write failed: ${errorMessage(e)}`);
      }
      return snapshot;
    });
  }

  private async transition(
    identifier: string,
    next: EnvironmentStatus,
    op: (canonical: string) => Promise<LifecycleResult>,
  ): Promise<LifecycleResult> {
    const env = this.tryResolve(identifier);
    if (!env.ok) return { ok: false, code: env.code, error: env.error };

    const id = env.env.identifier;
    return this.locks.runExclusive(id, async () => {
      const res = await op(id);
      if (res.ok) {
        // a restarted process may only have the durable copy
        await this.cache.load(this.root);
        this.cache.setStatus(id, next);
      }
      return res;
    });
  }

  private tryResolve(
    identifier: string,
  ): { ok: true; env: ResolvedEnvironment } | { ok: false; code: LabErrorCode; error: string } {
    try {
      return { ok: true, env: this.driver.resolve(identifier) };
    } catch (e) {
      if (e instanceof LabError) return { ok: false, code: e.code, error: e.message };
      throw e;
    }
  }

  /** Compose labels carry the directory as given at `up` time, which may or may not be the real path. */
  private directoryCandidates(identifier: string): string[] {
    const resolved = path.resolve(this.root, identifier);
    const out = [resolved];
    try {
      out.push(fs.realpathSync(resolved));
    } catch (e) {
      this.logger.warn(`Could not resolve ${resolved}: ${errorMessage(e)}`);
    }
    return out;
  }
}
