import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { ExploitFile, ImageFile, Readme } from "../types/environment.js";

export const EXPLOIT_DIRS = ["exploit", "exploits", "poc", "pocs"];
export const EXPLOIT_PATTERNS = ["*exploit*.py", "*exploit*.sh", "poc.py", "poc.sh", "exp.py", "PoC.py"];
export const EXPLOIT_EXTENSIONS = new Set([".py", ".sh", ".rb", ".go", ".c", ".cpp"]);

export const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".gif", ".webp", ".bmp", ".svg"]);
export const MAX_IMAGE_FILES = 5;
export const MAX_IMAGE_BYTES = 5 * 1024 * 1024;

export const README_NAMES = ["README.md", "README.MD"];
export const LOCALIZED_README_NAMES = ["README.zh-cn.md", "README.zh-CN.md", "README_zh.md"];

const EXPLOIT_PREVIEW_CHARS = 10000;
const USAGE_SCAN_LINES = 20;

function listDir(dir: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function matchesExploitPattern(name: string): boolean {
  return EXPLOIT_PATTERNS.some((p) => minimatch(name, p));
}

export function hasExploitArtifacts(envDir: string): boolean {
  if (EXPLOIT_DIRS.some((d) => fs.existsSync(path.join(envDir, d)))) return true;
  return listDir(envDir).some((e) => e.isFile() && matchesExploitPattern(e.name));
}

/** Exploit/PoC file paths relative to `envDir`, sorted. */
export function listExploitFiles(envDir: string): string[] {
  const files: string[] = [];

  for (const sub of EXPLOIT_DIRS) {
    const subDir = path.join(envDir, sub);
    if (!isDirectory(subDir)) continue;
    for (const e of listDir(subDir)) {
      if (e.isFile() && EXPLOIT_EXTENSIONS.has(path.extname(e.name))) {
        files.push(`${sub}/${e.name}`);
      }
    }
  }

  for (const e of listDir(envDir)) {
    if (e.isFile() && matchesExploitPattern(e.name)) files.push(e.name);
  }

  return [...new Set(files)].sort();
}

/** First-level image file names, sorted, at most `limit`. */
export function listImageFiles(envDir: string, limit = MAX_IMAGE_FILES): string[] {
  return listDir(envDir)
    .filter((e) => e.isFile() && IMAGE_EXTENSIONS.has(path.extname(e.name).toLowerCase()))
    .map((e) => e.name)
    .sort()
    .slice(0, limit);
}

export function hasBundledImages(envDir: string): boolean {
  return listImageFiles(envDir, 1).length > 0;
}

export type DocumentationProbe = {
  hasDocumentation: boolean;
  hasLocalizedDocumentation: boolean;
};

export function probeDocumentation(envDir: string): DocumentationProbe {
  const names = new Set(listDir(envDir).filter((e) => e.isFile()).map((e) => e.name));
  return {
    hasDocumentation: README_NAMES.some((n) => names.has(n)),
    hasLocalizedDocumentation: LOCALIZED_README_NAMES.some((n) => names.has(n)),
  };
}

/** Localized README first, then the plain one. */
export function readReadme(envDir: string): Readme | null {
  const candidates = [
    ...LOCALIZED_README_NAMES.map((filename) => ({ filename, localized: true })),
    ...README_NAMES.map((filename) => ({ filename, localized: false })),
  ];
  for (const c of candidates) {
    const p = path.join(envDir, c.filename);
    const text = readTextOrNull(p);
    if (text !== null) return { ...c, text };
  }
  return null;
}

export function readImageFiles(envDir: string): ImageFile[] {
  const out: ImageFile[] = [];
  for (const name of listImageFiles(envDir)) {
    const p = path.join(envDir, name);
    try {
      const { size } = fs.statSync(p);
      if (size < MAX_IMAGE_BYTES) out.push({ name, path: p, bytes: size });
    } catch {
      continue; // vanished between listing and stat
    }
  }
  return out;
}

export function readExploitFiles(envDir: string): ExploitFile[] {
  const out: ExploitFile[] = [];
  for (const rel of listExploitFiles(envDir)) {
    const content = readTextOrNull(path.join(envDir, rel));
    if (!content) continue;
    const lines = content.replace(/\r?\n$/, "").split(/\r?\n/);
    const usage =
      lines.slice(0, USAGE_SCAN_LINES).find((l) => /usage:|example:/i.test(l)) ?? "";
    out.push({
      filename: path.posix.basename(rel),
      path: rel,
      content: content.slice(0, EXPLOIT_PREVIEW_CHARS),
      size: content.length,
      lines: lines.length,
      usage,
    });
  }
  return out;
}

export function readTextOrNull(p: string): string | null {
  try {
    if (!fs.statSync(p).isFile()) return null;
    return fs.readFileSync(p, "utf8");
  } catch {
    return null;
  }
}
