import path from "node:path";
import type { ResolvedEnvironment } from "../lifecycle/security.js";
import { readExploitFiles, readImageFiles, readReadme, readTextOrNull } from "../scanner/probes.js";
import type { EnvironmentDetail, EnvironmentRecord } from "../types/environment.js";

/** Raw directory contents for one resolved environment. Unreadable parts come back empty. */
export function buildDetail(env: ResolvedEnvironment, record: EnvironmentRecord | null): EnvironmentDetail {
  const segments = env.identifier === "." ? [path.basename(env.directory)] : env.identifier.split("/");
  return {
    identifier: env.identifier,
    category: record?.category ?? segments[0],
    label: record?.label ?? segments[segments.length - 1],
    directory: env.directory,
    manifestPath: env.manifestPath,
    manifestText: readTextOrNull(env.manifestPath) ?? "",
    images: readImageFiles(env.directory),
    exploitFiles: readExploitFiles(env.directory),
    readme: readReadme(env.directory),
    record,
  };
}
