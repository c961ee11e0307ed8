import fs from "node:fs";
import path from "node:path";
import { mapWithConcurrency } from "../core/concurrency.js";
import { LabError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/log.js";
import { parseManifest } from "../manifest/parser.js";
import type { EnvironmentRecord, RegistrySnapshot } from "../types/environment.js";
import {
  compareIdentifiers,
  DEFAULT_EXCLUDE,
  DEFAULT_MANIFEST_NAMES,
  findManifests,
  identifierFor,
} from "./discovery.js";
import { hasBundledImages, hasExploitArtifacts, probeDocumentation } from "./probes.js";

/** Answers whether an image reference is present in the local image store. */
export type ImageInspector = (ref: string) => Promise<boolean>;

export type ScanProgress = {
  scanned: number;
  total: number;
};

export type ScannerOptions = {
  inspectImage: ImageInspector;
  manifestNames?: string[];
  exclude?: string[];
  concurrency?: number;
  progressInterval?: number;
  onProgress?: (progress: ScanProgress) => void;
  logger?: Logger;
};

/**
 * Builds a registry snapshot from the filesystem: one record per manifest
 * directory, sorted by identifier. Runs to completion; the result does not
 * depend on traversal order or on scheduling.
 */
export class EnvironmentScanner {
  private readonly inspectImage: ImageInspector;
  private readonly manifestNames: string[];
  private readonly exclude: string[];
  private readonly concurrency: number;
  private readonly progressInterval: number;
  private readonly onProgress?: (progress: ScanProgress) => void;
  private readonly logger: Logger;

  constructor(opts: ScannerOptions) {
    this.inspectImage = opts.inspectImage;
    this.manifestNames = opts.manifestNames ?? DEFAULT_MANIFEST_NAMES;
    this.exclude = opts.exclude ?? DEFAULT_EXCLUDE;
    this.concurrency = opts.concurrency ?? 8;
    this.progressInterval = Math.max(1, opts.progressInterval ?? 50);
    this.onProgress = opts.onProgress;
    this.logger = opts.logger ?? silentLogger;
  }

  /** @throws LabError ROOT_NOT_FOUND */
  async scan(root: string): Promise<RegistrySnapshot> {
    if (!isDirectory(root)) {
      throw new LabError("ROOT_NOT_FOUND", `Scan root does not exist: ${root}`);
    }

    const manifests = await findManifests(root, {
      manifestNames: this.manifestNames,
      exclude: this.exclude,
    });
    const total = manifests.length;
    this.logger.info(`Found ${total} environments, scanning...`);

    let scanned = 0;
    const records = await mapWithConcurrency(manifests, this.concurrency, async (rel) => {
      const record = await this.scanOne(root, rel);
      scanned++;
      if (scanned % this.progressInterval === 0 || scanned === total) {
        this.logger.info(`Scanned ${scanned}/${total} environments`);
        this.onProgress?.({ scanned, total });
      }
      return record;
    });

    records.sort((a, b) => compareIdentifiers(a.identifier, b.identifier));
    this.logger.info(`Scan complete: ${records.length} environments`);
    return records;
  }

  private async scanOne(root: string, manifestRel: string): Promise<EnvironmentRecord> {
    const identifier = identifierFor(manifestRel);
    const envDir = path.join(root, ...identifier.split("/"));
    const segments = identifier === "." ? [path.basename(path.resolve(root))] : identifier.split("/");

    const manifest = parseManifest(path.join(root, ...manifestRel.split("/")));
    const docs = probeDocumentation(envDir);

    return {
      identifier,
      category: segments[0],
      label: segments[segments.length - 1],
      services: manifest.services,
      hostPorts: manifest.hostPorts,
      status: "unknown",
      hasExploitArtifacts: hasExploitArtifacts(envDir),
      hasBundledImages: hasBundledImages(envDir),
      hasDocumentation: docs.hasDocumentation,
      hasLocalizedDocumentation: docs.hasLocalizedDocumentation,
      hasAllImagesLocally: await this.allImagesLocal(manifest.images),
    };
  }

  /** False at the first missing image, and false when nothing is declared. */
  private async allImagesLocal(images: string[]): Promise<boolean> {
    if (images.length === 0) return false;
    for (const ref of images) {
      if (!(await this.inspectImage(ref))) return false;
    }
    return true;
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}
