import fs from "node:fs";
import YAML from "yaml";
import { isRecord } from "../core/guards.js";
import { firstHostPort } from "./ports.js";

export type ParsedManifest = {
  /** Service names, in manifest order. */
  services: string[];
  /** Service name → first recoverable host port. */
  hostPorts: Record<string, string>;
  /** Declared image references, deduplicated, in manifest order. */
  images: string[];
};

const IMAGE_LINE = /^\s*image\s*:\s*([^\s#]+)/gm;

function emptyManifest(): ParsedManifest {
  return { services: [], hostPorts: {}, images: [] };
}

/**
 * Parse a compose manifest. Never throws: an unreadable file yields empty
 * collections, and a document the YAML parser rejects still gets its images
 * from a line scan.
 */
export function parseManifest(manifestPath: string): ParsedManifest {
  let text: string;
  try {
    text = fs.readFileSync(manifestPath, "utf8");
  } catch {
    return emptyManifest();
  }
  return parseManifestText(text);
}

export function parseManifestText(text: string): ParsedManifest {
  const result = emptyManifest();

  let doc: unknown = null;
  try {
    doc = YAML.parse(text);
  } catch {
    doc = null;
  }

  const services = isRecord(doc) && isRecord(doc.services) ? doc.services : null;
  if (services) {
    for (const [name, cfg] of Object.entries(services)) {
      result.services.push(name);
      if (!isRecord(cfg)) continue;

      const hostPort = firstHostPort(cfg.ports);
      if (hostPort) result.hostPorts[name] = hostPort;

      if (typeof cfg.image === "string" && cfg.image.trim().length > 0) {
        pushUnique(result.images, cfg.image.trim());
      }
    }
  }

  if (result.images.length === 0) {
    result.images = scanImageLines(text);
  }

  return result;
}

/** Line-based `image:` scan, for manifests structured parsing cannot read. */
export function scanImageLines(text: string): string[] {
  const images: string[] = [];
  for (const m of text.matchAll(IMAGE_LINE)) {
    const ref = m[1].replace(/^["']|["']$/g, "");
    if (ref.length > 0) pushUnique(images, ref);
  }
  return images;
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}
