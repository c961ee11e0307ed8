import { isRecord } from "../core/guards.js";
import type { ContainerSummary } from "../types/lifecycle.js";

const WORKING_DIR_LABEL = "com.docker.compose.project.working_dir=";

/**
 * JSON objects from `ps --format json` output. Newer compose prints one
 * array, older releases print one object per line.
 */
export function parseJsonRecords(output: string): Record<string, unknown>[] {
  const trimmed = output.trim();
  if (!trimmed) return [];

  const chunks: unknown[] = [];
  if (trimmed.startsWith("[")) {
    const parsed = tryParse(trimmed);
    if (Array.isArray(parsed)) chunks.push(...parsed);
  } else {
    for (const line of trimmed.split(/\r?\n/)) {
      if (line.trim()) chunks.push(tryParse(line.trim()));
    }
  }
  return chunks.filter(isRecord);
}

function tryParse(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return null;
  }
}

/** Host ports in a docker `Ports` column: `0.0.0.0:8080->80/tcp, :::8080->80/tcp`. */
export function parsePortsString(s: string): number[] {
  const ports: number[] = [];
  for (const part of s.split(",")) {
    const m = /:(\d+)->\d+\/(tcp|udp)/.exec(part);
    if (m) ports.push(parseInt(m[1], 10));
  }
  return ports;
}

/** Distinct published host ports, in the order compose lists them. */
export function parsePublishedPorts(output: string): number[] {
  const ports: number[] = [];
  const add = (p: number) => {
    if (Number.isInteger(p) && p > 0 && !ports.includes(p)) ports.push(p);
  };

  for (const rec of parseJsonRecords(output)) {
    if (Array.isArray(rec.Publishers)) {
      for (const pub of rec.Publishers) {
        if (isRecord(pub) && typeof pub.PublishedPort === "number") add(pub.PublishedPort);
      }
    }
    if (typeof rec.Ports === "string") {
      for (const p of parsePortsString(rec.Ports)) add(p);
    }
  }
  return ports;
}

export function parseContainerLines(output: string): ContainerSummary[] {
  const str = (v: unknown) => (typeof v === "string" ? v : "");
  return parseJsonRecords(output).map((rec) => ({
    id: str(rec.ID).slice(0, 12),
    name: str(rec.Names),
    image: str(rec.Image),
    status: str(rec.Status),
    ports: str(rec.Ports),
  }));
}

/** Compose working directories found in `docker ps --format {{.Labels}}` output. */
export function parseWorkingDirLabels(output: string): Set<string> {
  const dirs = new Set<string>();
  for (const line of output.split(/\r?\n/)) {
    const idx = line.indexOf(WORKING_DIR_LABEL);
    if (idx === -1) continue;
    const dir = line.slice(idx + WORKING_DIR_LABEL.length).split(",")[0].trim();
    if (dir) dirs.add(dir);
  }
  return dirs;
}
