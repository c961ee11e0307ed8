import { createHash } from "node:crypto";
import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";

export const DEFAULT_MANIFEST_NAMES = [
  "docker-compose.yml",
  "docker-compose.yaml",
  "compose.yml",
  "compose.yaml",
];

export const DEFAULT_EXCLUDE = ["**/.git", "**/node_modules"];

export type DiscoveryOptions = {
  manifestNames?: string[];
  exclude?: string[];
};

/**
 * Find every manifest under `root`. At most one manifest per directory (the
 * first of `manifestNames` present). Returns root-relative forward-slash
 * paths, sorted. Symlinked directories are not followed.
 */
export async function findManifests(root: string, opts: DiscoveryOptions = {}): Promise<string[]> {
  const names = opts.manifestNames ?? DEFAULT_MANIFEST_NAMES;
  const exclude = opts.exclude ?? DEFAULT_EXCLUDE;
  const found: string[] = [];

  async function walk(dir: string, rel: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }

    const files = new Set<string>();
    for (const e of entries) {
      if (!names.includes(e.name)) continue;
      // symlinked manifests count when they point at a file, as resolveEnvironment sees them
      if (e.isFile() || (e.isSymbolicLink() && (await isFileTarget(path.join(dir, e.name))))) files.add(e.name);
    }
    const manifest = names.find((n) => files.has(n));
    if (manifest) found.push(rel ? `${rel}/${manifest}` : manifest);

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const childRel = rel ? `${rel}/${entry.name}` : entry.name;
      if (isExcluded(childRel, exclude)) continue;
      await walk(path.join(dir, entry.name), childRel);
    }
  }

  await walk(root, "");
  return found.sort(compareIdentifiers);
}

async function isFileTarget(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

export function isExcluded(relDir: string, patterns: string[]): boolean {
  return patterns.some((p) => minimatch(relDir, p, { dot: true }));
}

/** Digest over the sorted manifest path set. Changes only when manifests are added, removed or moved. */
export function fingerprintManifestSet(relPaths: readonly string[]): string {
  const h = createHash("sha256");
  for (const p of [...relPaths].sort(compareIdentifiers)) {
    h.update(p);
    h.update("\n");
  }
  return h.digest("hex");
}

export async function computeFingerprint(root: string, opts: DiscoveryOptions = {}): Promise<string> {
  return fingerprintManifestSet(await findManifests(root, opts));
}

/** Environment identifier for a manifest path: its directory, or "." at the root. */
export function identifierFor(manifestRelPath: string): string {
  return path.posix.dirname(manifestRelPath);
}

/** Code-unit order, independent of locale. */
export function compareIdentifiers(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
