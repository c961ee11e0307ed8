import { isRecord } from "../core/guards.js";

const NUMERIC_PORT = /^\d+$/;

/**
 * Host port from one entry of a service's `ports:` list.
 *
 * - `"host:container[/proto]"` and `"bind:host:container[/proto]"`: the
 *   second-to-last colon token.
 * - `{ published: ... }`: the published value.
 * - A bare number (`"80"`, `80`): kept as a host-port guess.
 *
 * Returns null when nothing usable is there.
 */
export function extractHostPort(entry: unknown): string | null {
  if (typeof entry === "number") {
    return Number.isInteger(entry) && entry > 0 ? String(entry) : null;
  }

  if (typeof entry === "string") {
    const parts = entry.trim().split(":");
    if (parts.length >= 2) {
      return normalizePort(parts[parts.length - 2]);
    }
    return normalizePort(stripProtocol(parts[0]));
  }

  if (isRecord(entry)) {
    const published = entry.published;
    if (typeof published === "number" && published > 0) return String(published);
    if (typeof published === "string" && published.trim().length > 0) {
      return normalizePort(published) ?? published.trim();
    }
  }

  return null;
}

/** First recoverable host port in a service's `ports:` list. */
export function firstHostPort(ports: unknown): string | null {
  if (!Array.isArray(ports)) return null;
  for (const entry of ports) {
    const hostPort = extractHostPort(entry);
    if (hostPort) return hostPort;
  }
  return null;
}

function stripProtocol(token: string): string {
  const slash = token.indexOf("/");
  return slash === -1 ? token : token.slice(0, slash);
}

function normalizePort(token: string): string | null {
  const t = token.trim();
  if (!NUMERIC_PORT.test(t)) return null;
  const n = Number(t);
  return n > 0 ? String(n) : null;
}
