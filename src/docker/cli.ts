import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { isRecord } from "../core/guards.js";
import { silentLogger, type Logger } from "../core/log.js";
import type { ComposeInvocationSetting } from "../types/config.js";
import type { ContainerSummary } from "../types/lifecycle.js";
import { parseContainerLines, parsePublishedPorts, parseWorkingDirLabels } from "./ps.js";
import { spawnLines, type LineSpawner } from "./stream.js";

const pExecFile = promisify(execFile);

const MAX_BUFFER = 50 * 1024 * 1024;
const DETECT_TIMEOUT_MS = 5000;

export type CommandResult = {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  cwd?: string;
  timeoutMs?: number;
};

/** Runs a command to completion. Never rejects; failures come back with `ok: false`. */
export type CommandRunner = (command: string, args: string[], opts?: RunOptions) => Promise<CommandResult>;

export const execRunner: CommandRunner = async (command, args, opts = {}) => {
  try {
    const { stdout, stderr } = await pExecFile(command, args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs ?? 0,
      maxBuffer: MAX_BUFFER,
      shell: false,
    });
    return { ok: true, exitCode: 0, stdout, stderr };
  } catch (e) {
    return failureFrom(e);
  }
};

function failureFrom(e: unknown): CommandResult {
  const message = e instanceof Error ? e.message : String(e);
  if (!isRecord(e)) return { ok: false, exitCode: null, stdout: "", stderr: message };
  const stdout = typeof e.stdout === "string" ? e.stdout : "";
  const stderr = typeof e.stderr === "string" && e.stderr.trim().length > 0 ? e.stderr : message;
  const exitCode = typeof e.code === "number" ? e.code : null;
  return { ok: false, exitCode, stdout, stderr };
}

/** `plugin` is `docker compose`, `standalone` is the legacy `docker-compose` binary. */
export type ComposeInvocation = "plugin" | "standalone";

export async function detectComposeInvocation(
  runner: CommandRunner,
  logger: Logger = silentLogger,
): Promise<ComposeInvocation> {
  const plugin = await runner("docker", ["compose", "version"], { timeoutMs: DETECT_TIMEOUT_MS });
  if (plugin.ok) return "plugin";

  const standalone = await runner("docker-compose", ["version"], { timeoutMs: DETECT_TIMEOUT_MS });
  if (standalone.ok) return "standalone";

  logger.warn("Docker Compose not detected, defaulting to 'docker compose'");
  return "plugin";
}

export type DockerCliOptions = {
  runner?: CommandRunner;
  spawner?: LineSpawner;
  invocation?: ComposeInvocationSetting;
  commandTimeoutMs?: number;
  inspectTimeoutMs?: number;
  logger?: Logger;
};

/**
 * Docker / Compose CLI wrapper. The compose invocation form is detected on
 * first use and reused for the lifetime of the instance.
 */
export class DockerCli {
  private readonly runner: CommandRunner;
  private readonly spawner: LineSpawner;
  private readonly commandTimeoutMs: number;
  private readonly inspectTimeoutMs: number;
  private readonly logger: Logger;
  private invocation: Promise<ComposeInvocation> | null;

  constructor(opts: DockerCliOptions = {}) {
    this.runner = opts.runner ?? execRunner;
    this.spawner = opts.spawner ?? spawnLines;
    this.commandTimeoutMs = opts.commandTimeoutMs ?? 600_000;
    this.inspectTimeoutMs = opts.inspectTimeoutMs ?? 2000;
    this.logger = opts.logger ?? silentLogger;
    const setting = opts.invocation ?? "auto";
    this.invocation = setting === "auto" ? null : Promise.resolve(setting);
  }

  resolveInvocation(): Promise<ComposeInvocation> {
    if (!this.invocation) {
      this.invocation = detectComposeInvocation(this.runner, this.logger).then((inv) => {
        this.logger.info(`Using compose invocation: ${inv === "plugin" ? "docker compose" : "docker-compose"}`);
        return inv;
      });
    }
    return this.invocation;
  }

  async composeArgv(args: string[]): Promise<{ command: string; args: string[] }> {
    const inv = await this.resolveInvocation();
    return inv === "plugin"
      ? { command: "docker", args: ["compose", ...args] }
      : { command: "docker-compose", args };
  }

  async compose(args: string[], cwd: string, timeoutMs = this.commandTimeoutMs): Promise<CommandResult> {
    const argv = await this.composeArgv(args);
    return this.runner(argv.command, argv.args, { cwd, timeoutMs });
  }

  /** Combined stdout/stderr of a long-running compose command, line by line. */
  async *composeLines(args: string[], cwd: string): AsyncGenerator<string, void, undefined> {
    const argv = await this.composeArgv(args);
    yield* this.spawner(argv.command, argv.args, { cwd });
  }

  async imageExists(ref: string): Promise<boolean> {
    const res = await this.runner("docker", ["image", "inspect", ref], { timeoutMs: this.inspectTimeoutMs });
    return res.ok;
  }

  /** Images compose would use for the project in `cwd`, or null if compose cannot tell. */
  async composeImages(cwd: string): Promise<string[] | null> {
    const res = await this.compose(["config", "--images"], cwd);
    if (!res.ok) return null;
    return [...new Set(res.stdout.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0))];
  }

  /** Host ports currently published by the project's containers. */
  async publishedPorts(cwd: string, timeoutMs = this.commandTimeoutMs): Promise<number[]> {
    const res = await this.compose(["ps", "--format", "json"], cwd, Math.max(1, Math.min(timeoutMs, this.commandTimeoutMs)));
    return res.ok ? parsePublishedPorts(res.stdout) : [];
  }

  /** Container ids of the project in `cwd`; null when compose fails. */
  async projectContainerIds(cwd: string): Promise<string[] | null> {
    const res = await this.compose(["ps", "-q"], cwd, DETECT_TIMEOUT_MS);
    if (!res.ok) return null;
    return res.stdout.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0);
  }

  async listContainers(): Promise<{ ok: true; containers: ContainerSummary[] } | { ok: false; error: string }> {
    const res = await this.runner("docker", ["ps", "--format", "{{json .}}"], { timeoutMs: this.commandTimeoutMs });
    if (!res.ok) return { ok: false, error: res.stderr.trim() || res.stdout.trim() || "docker ps failed" };
    return { ok: true, containers: parseContainerLines(res.stdout) };
  }

  /** Working directories of running compose projects; null when docker fails. */
  async runningProjectDirs(): Promise<Set<string> | null> {
    const res = await this.runner("docker", ["ps", "--format", "{{.Labels}}"], { timeoutMs: 10_000 });
    return res.ok ? parseWorkingDirLabels(res.stdout) : null;
  }
}
