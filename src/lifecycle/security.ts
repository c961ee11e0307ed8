import fs from "node:fs";
import path from "node:path";
import { LabError } from "../core/errors.js";
import { DEFAULT_MANIFEST_NAMES } from "../scanner/discovery.js";

export type ResolvedEnvironment = {
  /** Canonical identifier: root-relative, forward slashes, "." for the root. */
  identifier: string;
  directory: string;
  manifestPath: string;
};

function invalid(identifier: string, reason: string): LabError {
  return new LabError("INVALID_IDENTIFIER", `Invalid environment identifier '${identifier}': ${reason}`);
}

export function isWithinOrEqual(rootDir: string, candidate: string): boolean {
  const rel = path.relative(rootDir, candidate);
  return rel === "" || (rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel));
}

/**
 * Resolve an identifier to its environment directory. Rejects absolute paths,
 * `..` segments, anything whose real path lands outside the root (symlinks
 * included) and directories without a manifest.
 * @throws LabError INVALID_IDENTIFIER, or ROOT_NOT_FOUND when the root itself is missing
 */
export function resolveEnvironment(
  root: string,
  identifier: string,
  manifestNames: readonly string[] = DEFAULT_MANIFEST_NAMES,
): ResolvedEnvironment {
  if (typeof identifier !== "string" || identifier.trim().length === 0) {
    throw invalid(String(identifier), "empty");
  }
  if (identifier.includes("\0")) throw invalid(identifier, "contains NUL");
  if (path.posix.isAbsolute(identifier) || path.win32.isAbsolute(identifier)) {
    throw invalid(identifier, "absolute paths are not allowed");
  }
  if (identifier.split(/[\\/]+/).includes("..")) {
    throw invalid(identifier, "parent-directory segments are not allowed");
  }

  let rootReal: string;
  try {
    rootReal = fs.realpathSync(root);
  } catch {
    throw new LabError("ROOT_NOT_FOUND", `Scan root does not exist: ${root}`);
  }

  let directory: string;
  try {
    directory = fs.realpathSync(path.resolve(rootReal, identifier));
  } catch {
    throw invalid(identifier, "no such directory");
  }
  if (!isWithinOrEqual(rootReal, directory)) throw invalid(identifier, "escapes the scan root");
  if (!fs.statSync(directory).isDirectory()) throw invalid(identifier, "not a directory");

  const manifest = manifestNames.find((name) => isFile(path.join(directory, name)));
  if (!manifest) throw invalid(identifier, "no compose manifest");

  const rel = path.relative(rootReal, directory).split(path.sep).join("/");
  return {
    identifier: rel === "" ? "." : rel,
    directory,
    manifestPath: path.join(directory, manifest),
  };
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}
