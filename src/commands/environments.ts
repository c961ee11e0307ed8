import type { Registry } from "../registry/registry.js";
import type {
  EnvironmentDetail,
  EnvironmentRecord,
  RegistrySnapshot,
  RegistryStats,
} from "../types/environment.js";
import type { ContainerSummary } from "../types/lifecycle.js";
import { EXIT, exitCodeFor, failureFromError, type CommandFailure } from "./exit-codes.js";

export type ListOptions = {
  refresh?: boolean;
  /** Reconcile every record's status with `docker ps` before listing. */
  status?: boolean;
  category?: string;
};

export type ListResult = { ok: true; environments: RegistrySnapshot } | CommandFailure;

export async function list(registry: Registry, opts: ListOptions = {}): Promise<ListResult> {
  try {
    let environments = await registry.listEnvironments(opts.refresh ?? false);
    if (opts.status) environments = await registry.reconcileStatuses();
    if (opts.category) {
      const category = opts.category;
      environments = environments.filter((e) => e.category === category);
    }
    return { ok: true, environments };
  } catch (e) {
    return failureFromError(e);
  }
}

export async function refresh(registry: Registry): Promise<ListResult> {
  try {
    return { ok: true, environments: await registry.refreshCache() };
  } catch (e) {
    return failureFromError(e);
  }
}

export async function show(
  registry: Registry,
  identifier: string,
): Promise<{ ok: true; detail: EnvironmentDetail } | CommandFailure> {
  const res = await registry.getEnvironment(identifier);
  if (!res.ok) return { ok: false, error: res.error, exitCode: exitCodeFor(res.code) };
  return res;
}

export async function stats(registry: Registry): Promise<{ ok: true; stats: RegistryStats } | CommandFailure> {
  try {
    return { ok: true, stats: await registry.stats() };
  } catch (e) {
    return failureFromError(e);
  }
}

export async function ps(registry: Registry): Promise<{ ok: true; containers: ContainerSummary[] } | CommandFailure> {
  const res = await registry.runningContainers();
  if (!res.ok) return { ok: false, error: res.error, exitCode: EXIT.FAILED };
  return res;
}

const FLAG_LETTERS: Array<[keyof EnvironmentRecord, string]> = [
  ["hasExploitArtifacts", "E"],
  ["hasBundledImages", "I"],
  ["hasDocumentation", "D"],
  ["hasLocalizedDocumentation", "L"],
  ["hasAllImagesLocally", "P"],
];

/** One line per record: identifier, status, flags, service=port pairs. */
export function formatRecord(rec: EnvironmentRecord): string {
  const flags = FLAG_LETTERS.map(([key, letter]) => (rec[key] === true ? letter : "-")).join("");
  const ports = rec.services.map((s) => (rec.hostPorts[s] ? `${s}:${rec.hostPorts[s]}` : s)).join(" ");
  return `${rec.identifier}  ${rec.status}  ${flags}  ${ports}`.trimEnd();
}

export function formatStats(s: RegistryStats): string[] {
  const lines = [
    `total: ${s.total}`,
    `running: ${s.running}`,
    `with exploit: ${s.withExploit}`,
    `images local: ${s.withImages}`,
  ];
  for (const [category, count] of Object.entries(s.categories).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    lines.push(`  ${category}: ${count}`);
  }
  return lines;
}
