import type { Registry } from "../registry/registry.js";
import type { ReadinessResult } from "../types/lifecycle.js";
import { EXIT, exitCodeFor, failureFromError, type CommandFailure } from "./exit-codes.js";

export type StartOptions = {
  /** Poll for readiness after a successful start. */
  wait?: boolean;
  timeoutSeconds: number;
};

export type StartResult =
  | { ok: true; identifier: string; readiness?: ReadinessResult }
  | (CommandFailure & { portConflict: boolean });

export async function start(registry: Registry, identifier: string, opts: StartOptions): Promise<StartResult> {
  const res = await registry.startEnvironment(identifier);
  if (!res.ok) {
    return { ok: false, error: res.error, exitCode: exitCodeFor(res.code), portConflict: res.portConflict === true };
  }
  if (!opts.wait) return { ok: true, identifier };
  return { ok: true, identifier, readiness: await registry.waitReady(identifier, opts.timeoutSeconds) };
}

export async function stop(registry: Registry, identifier: string): Promise<{ ok: true; identifier: string } | CommandFailure> {
  const res = await registry.stopEnvironment(identifier);
  if (!res.ok) return { ok: false, error: res.error, exitCode: exitCodeFor(res.code) };
  return { ok: true, identifier };
}

export type ImagesResult = { ok: true; missing: string[]; warning?: string };

export async function images(registry: Registry, identifier: string): Promise<ImagesResult> {
  const res = await registry.checkImages(identifier);
  return { ok: true, ...res };
}

/**
 * Forwards pull output to `onLine` as it arrives.
 */
export async function pull(
  registry: Registry,
  identifier: string,
  onLine: (line: string) => void,
): Promise<{ ok: true; lines: number } | CommandFailure> {
  let lines = 0;
  try {
    for await (const line of registry.pullImages(identifier)) {
      lines++;
      onLine(line);
    }
  } catch (e) {
    return failureFromError(e);
  }
  return { ok: true, lines };
}

export async function ready(
  registry: Registry,
  identifier: string,
  timeoutSeconds: number,
): Promise<{ ok: true; readiness: ReadinessResult } | CommandFailure> {
  const readiness = await registry.waitReady(identifier, timeoutSeconds);
  if (readiness.ready) return { ok: true, readiness };
  const where = readiness.port === undefined ? "no published port found" : `port ${readiness.port} not answering`;
  return { ok: false, error: `${identifier} not ready after ${timeoutSeconds}s: ${where}`, exitCode: EXIT.FAILED };
}

export function formatReadiness(r: ReadinessResult): string {
  if (r.ready) return `ready on port ${r.port ?? "?"}`;
  return r.port === undefined ? "not ready (no published port)" : `not ready (port ${r.port} not answering)`;
}
