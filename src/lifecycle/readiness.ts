import type { ReadinessResult } from "../types/lifecycle.js";

/** True when something on `port` answered at all, whatever the status code. */
export type PortProbe = (port: number, timeoutMs: number) => Promise<boolean>;

const PROBE_HOST = "127.0.0.1";

export async function probeUrl(url: string, timeoutMs: number): Promise<boolean> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: "manual",
      headers: { "User-Agent": "labctl-readiness/1.0" },
    });
    await res.body?.cancel();
    return true;
  } catch {
    // refused, reset, TLS mismatch or timed out: not accepting yet
    return false;
  } finally {
    clearTimeout(timer);
  }
}

const SCHEMES = ["http", "https"] as const;

/** Both schemes race inside one `timeoutMs` budget. */
export const httpProbe: PortProbe = async (port, timeoutMs) => {
  const attempts = SCHEMES.map((scheme) =>
    probeUrl(`${scheme}://${PROBE_HOST}:${port}/`, timeoutMs).then((ok) => {
      if (!ok) throw new Error(`${scheme} probe failed`);
      return true;
    }),
  );
  try {
    return await Promise.any(attempts);
  } catch (e) {
    if (e instanceof AggregateError) return false;
    throw e;
  }
};

export type WaitForReadyOptions = {
  timeoutSeconds: number;
  /** Receives the time left before the deadline, in milliseconds. */
  discoverPorts: (remainingMs: number) => Promise<number[]>;
  probe?: PortProbe;
  pollIntervalMs?: number;
  probeTimeoutMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Settles with `fallback` once `ms` passes; the slow promise is left to finish on its own. */
async function within<T>(work: Promise<T>, ms: number, fallback: T): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(fallback), Math.max(0, ms));
  });
  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Poll published ports until one answers or the timeout elapses. A port that
 * was discovered but never answered is reported alongside `ready: false`.
 */
export async function waitForReady(opts: WaitForReadyOptions): Promise<ReadinessResult> {
  const probe = opts.probe ?? httpProbe;
  const pollIntervalMs = opts.pollIntervalMs ?? 1000;
  const probeTimeoutMs = opts.probeTimeoutMs ?? 2000;
  const now = opts.now ?? Date.now;
  const sleep = opts.sleep ?? defaultSleep;

  const deadline = now() + Math.max(1, opts.timeoutSeconds) * 1000;
  let firstPort: number | undefined;

  while (now() < deadline) {
    const left = deadline - now();
    const ports = await within(opts.discoverPorts(left), left, []);
    for (const port of ports) {
      if (firstPort === undefined) firstPort = port;
      const budget = Math.min(probeTimeoutMs, deadline - now());
      if (budget <= 0) break;
      if (await within(probe(port, budget), budget, false)) return { ready: true, port };
    }

    const remaining = deadline - now();
    if (remaining <= 0) break;
    await sleep(Math.min(pollIntervalMs, remaining));
  }

  return firstPort === undefined ? { ready: false } : { ready: false, port: firstPort };
}
