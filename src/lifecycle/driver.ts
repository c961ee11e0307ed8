import { mapWithConcurrency } from "../core/concurrency.js";
import { errorMessage, isPortConflict, LabError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/log.js";
import type { CommandResult, DockerCli } from "../docker/cli.js";
import { parseManifest } from "../manifest/parser.js";
import { DEFAULT_MANIFEST_NAMES } from "../scanner/discovery.js";
import type { EnvironmentStatus } from "../types/environment.js";
import type {
  ContainerSummary,
  ImageCheckResult,
  LifecycleFailure,
  LifecycleResult,
  ReadinessResult,
} from "../types/lifecycle.js";
import { httpProbe, waitForReady, type PortProbe } from "./readiness.js";
import { resolveEnvironment, type ResolvedEnvironment } from "./security.js";

const IMAGE_CHECK_CONCURRENCY = 4;

export type LifecycleDriverOptions = {
  root: string;
  docker: DockerCli;
  manifestNames?: string[];
  probe?: PortProbe;
  pollIntervalMs?: number;
  probeTimeoutMs?: number;
  logger?: Logger;
};

/**
 * Drives compose lifecycle for one environment at a time: up, down, image
 * checks, pulls and readiness polling. Every identifier is resolved against
 * the scan root before any subprocess runs.
 */
export class LifecycleDriver {
  private readonly root: string;
  private readonly docker: DockerCli;
  private readonly manifestNames: string[];
  private readonly probe: PortProbe;
  private readonly pollIntervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly logger: Logger;
  private readonly failures = new Map<string, LifecycleFailure>();

  constructor(opts: LifecycleDriverOptions) {
    this.root = opts.root;
    this.docker = opts.docker;
    this.manifestNames = opts.manifestNames ?? DEFAULT_MANIFEST_NAMES;
    this.probe = opts.probe ?? httpProbe;
    this.pollIntervalMs = opts.pollIntervalMs ?? 1000;
    this.probeTimeoutMs = opts.probeTimeoutMs ?? 2000;
    this.logger = opts.logger ?? silentLogger;
  }

  /** @throws LabError INVALID_IDENTIFIER */
  resolve(identifier: string): ResolvedEnvironment {
    return resolveEnvironment(this.root, identifier, this.manifestNames);
  }

  async start(identifier: string): Promise<LifecycleResult> {
    return this.runLifecycle(identifier, ["up", "-d"], "start");
  }

  async stop(identifier: string): Promise<LifecycleResult> {
    return this.runLifecycle(identifier, ["down"], "stop");
  }

  /** Last start/stop failure for `identifier`, cleared by the next success. */
  lastError(identifier: string): LifecycleFailure | undefined {
    return this.failures.get(identifier);
  }

  /**
   * Images the environment needs that are not present locally. Never fails:
   * an unknown environment yields an empty list and a warning.
   */
  async checkImages(identifier: string): Promise<ImageCheckResult> {
    let env: ResolvedEnvironment;
    try {
      env = this.resolve(identifier);
    } catch (e) {
      return { missing: [], warning: `${errorMessage(e)} (image check skipped)` };
    }

    const images = (await this.docker.composeImages(env.directory)) ?? parseManifest(env.manifestPath).images;
    const present = await mapWithConcurrency(images, IMAGE_CHECK_CONCURRENCY, (ref) => this.docker.imageExists(ref));
    return { missing: images.filter((_, i) => !present[i]) };
  }

  /**
   * Output of `compose pull`, line by line, as it is produced.
   * @throws LabError INVALID_IDENTIFIER before anything runs, SUBPROCESS_FAILED at the end of a failed pull
   */
  async *pullImages(identifier: string): AsyncGenerator<string, void, undefined> {
    const env = this.resolve(identifier);
    this.logger.info(`Pulling images for ${env.identifier}`);
    yield* this.docker.composeLines(["pull"], env.directory);
  }

  async waitReady(identifier: string, timeoutSeconds: number): Promise<ReadinessResult> {
    let env: ResolvedEnvironment;
    try {
      env = this.resolve(identifier);
    } catch {
      return { ready: false };
    }
    return waitForReady({
      timeoutSeconds,
      discoverPorts: (remainingMs) => this.docker.publishedPorts(env.directory, remainingMs),
      probe: this.probe,
      pollIntervalMs: this.pollIntervalMs,
      probeTimeoutMs: this.probeTimeoutMs,
    });
  }

  /** Explicit status probe: any container listed by `compose ps -q` means running. */
  async status(identifier: string): Promise<EnvironmentStatus> {
    let env: ResolvedEnvironment;
    try {
      env = this.resolve(identifier);
    } catch {
      return "unknown";
    }
    const ids = await this.docker.projectContainerIds(env.directory);
    if (ids === null) return "unknown";
    return ids.length > 0 ? "running" : "stopped";
  }

  async runningContainers(): Promise<{ ok: true; containers: ContainerSummary[] } | { ok: false; error: string }> {
    return this.docker.listContainers();
  }

  async runningProjectDirs(): Promise<Set<string> | null> {
    return this.docker.runningProjectDirs();
  }

  private async runLifecycle(identifier: string, args: string[], verb: "start" | "stop"): Promise<LifecycleResult> {
    let env: ResolvedEnvironment;
    try {
      env = this.resolve(identifier);
    } catch (e) {
      const code = e instanceof LabError ? e.code : "INVALID_IDENTIFIER";
      return { ok: false, code, error: errorMessage(e) };
    }

    const res = await this.docker.compose(args, env.directory);
    if (res.ok) {
      this.failures.delete(identifier);
      this.logger.info(`${verb} ${env.identifier}: ok`);
      return { ok: true };
    }

    const failure = toFailure(res, `Failed to ${verb} ${env.identifier}`);
    this.failures.set(identifier, failure);
    this.logger.warn(`${verb} ${env.identifier}: ${failure.error}`);
    return failure;
  }
}

export function toFailure(res: CommandResult, fallback: string): LifecycleFailure {
  const error = res.stderr.trim() || res.stdout.trim() || fallback;
  if (isPortConflict(`${res.stderr}\n${res.stdout}`)) {
    return { ok: false, code: "PORT_CONFLICT", error, portConflict: true };
  }
  return { ok: false, code: "SUBPROCESS_FAILED", error };
}
