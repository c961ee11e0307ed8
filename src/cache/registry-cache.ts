import path from "node:path";
import { errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/log.js";
import type { EnvironmentRecord, EnvironmentStatus, RegistrySnapshot } from "../types/environment.js";
import { parseEnvelope, serializeEnvelope } from "./envelope.js";
import type { CacheStore } from "./store.js";

export const DEFAULT_TTL_HOURS = 24;

export type RegistryCacheOptions = {
  store: CacheStore;
  /** Digest of the manifest set currently under `root`. */
  fingerprint: (root: string) => Promise<string>;
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
};

/**
 * Two tiers: an in-process snapshot trusted until `invalidate()`, and one
 * durable envelope checked for age, root and manifest-set fingerprint before
 * it is believed.
 */
export class RegistryCache {
  private readonly backing: CacheStore;
  private readonly fingerprint: (root: string) => Promise<string>;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private memory: { rootPath: string; snapshot: RegistrySnapshot } | null = null;

  constructor(opts: RegistryCacheOptions) {
    this.backing = opts.store;
    this.fingerprint = opts.fingerprint;
    this.ttlMs = opts.ttlMs ?? DEFAULT_TTL_HOURS * 3600 * 1000;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;
  }

  /** The snapshot for `root`, or null when both tiers miss. */
  async load(root: string): Promise<RegistrySnapshot | null> {
    const rootPath = path.resolve(root);
    if (this.memory?.rootPath === rootPath) return structuredClone(this.memory.snapshot);

    const snapshot = await this.loadDurable(rootPath);
    if (snapshot === null) return null;
    this.memory = { rootPath, snapshot };
    return structuredClone(snapshot);
  }

  async store(root: string, snapshot: RegistrySnapshot): Promise<void> {
    const rootPath = path.resolve(root);
    this.memory = { rootPath, snapshot: structuredClone(snapshot) };

    const envelope = serializeEnvelope({
      snapshot: snapshot.map((r): EnvironmentRecord => ({ ...r, status: "unknown" })),
      capturedAt: this.now(),
      manifestSetFingerprint: await this.fingerprint(rootPath),
      rootPath,
    });
    await this.backing.write(envelope);
  }

  async invalidate(): Promise<void> {
    this.memory = null;
    await this.backing.remove();
  }

  /** In-process snapshot without touching the durable tier. */
  current(): RegistrySnapshot | null {
    return this.memory ? structuredClone(this.memory.snapshot) : null;
  }

  find(identifier: string): EnvironmentRecord | null {
    const rec = this.memory?.snapshot.find((r) => r.identifier === identifier);
    return rec ? structuredClone(rec) : null;
  }

  /** Returns false when no in-process record has that identifier. */
  setStatus(identifier: string, status: EnvironmentStatus): boolean {
    const rec = this.memory?.snapshot.find((r) => r.identifier === identifier);
    if (!rec) return false;
    rec.status = status;
    return true;
  }

  private async loadDurable(rootPath: string): Promise<RegistrySnapshot | null> {
    let text: string | null;
    try {
      text = await this.backing.read();
    } catch (e) {
      this.logger.warn(`Cache read failed: ${errorMessage(e)}`);
      return null;
    }
    if (text === null) return null;

    const parsed = parseEnvelope(text);
    if (!parsed.ok) {
      this.logger.warn(`Cache envelope rejected: ${parsed.error}`);
      return null;
    }
    const env = parsed.envelope;

    if (env.rootPath !== rootPath) {
      this.logger.info(`Cache was built for ${env.rootPath}, not ${rootPath}`);
      return null;
    }
    const age = this.now() - env.capturedAt;
    if (age > this.ttlMs) {
      this.logger.info(`Cache expired (${Math.round(age / 60000)} min old)`);
      return null;
    }
    let current: string;
    try {
      current = await this.fingerprint(rootPath);
    } catch (e) {
      this.logger.warn(`Could not fingerprint ${rootPath}: ${errorMessage(e)}`);
      return null;
    }
    if (env.manifestSetFingerprint !== current) {
      this.logger.info("Manifest set changed since cache was written");
      return null;
    }
    return env.snapshot;
  }
}
