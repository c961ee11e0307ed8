import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  hasExploitArtifacts,
  listExploitFiles,
  listImageFiles,
  MAX_IMAGE_BYTES,
  probeDocumentation,
  readExploitFiles,
  readImageFiles,
  readReadme,
} from "../src/scanner/probes.js";
import { makeTmpDir, writeTree } from "./helpers.js";

describe("filesystem probes", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir("labctl-probe-");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("lists exploit files from exploit dirs and root name patterns", () => {
    writeTree(dir, {
      "exploit/run.py": "",
      "exploit/notes.txt": "",
      "pocs/x.go": "",
      "poc.py": "",
      "PoC.py": "",
      "exp.py": "",
      "my_exploit.sh": "",
      "main.py": "",
    });
    expect(listExploitFiles(dir)).toEqual(["PoC.py", "exp.py", "exploit/run.py", "my_exploit.sh", "poc.py", "pocs/x.go"]);
    expect(hasExploitArtifacts(dir)).toBe(true);
  });

  it("counts an empty exploit directory as an artifact", () => {
    fs.mkdirSync(path.join(dir, "poc"));
    expect(hasExploitArtifacts(dir)).toBe(true);
    expect(listExploitFiles(dir)).toEqual([]);
  });

  it("finds no artifacts in a plain directory", () => {
    writeTree(dir, { "docker-compose.yml": "", "app.py": "" });
    expect(hasExploitArtifacts(dir)).toBe(false);
  });

  it("reads exploit previews with line count and usage line", () => {
    const content = "#!/usr/bin/env python3\n# Usage: python3 poc.py <target>\nprint('hi')\n";
    writeTree(dir, { "poc.py": content });
    expect(readExploitFiles(dir)).toEqual([
      {
        filename: "poc.py",
        path: "poc.py",
        content,
        size: content.length,
        lines: 3,
        usage: "# Usage: python3 poc.py <target>",
      },
    ]);
  });

  it("ignores usage lines past the first twenty", () => {
    const body = Array.from({ length: 20 }, (_, i) => `line ${i}`).join("\n");
    writeTree(dir, { "exp.py": `${body}\n# example: exp.py host\n` });
    const [file] = readExploitFiles(dir);
    expect(file.lines).toBe(21);
    expect(file.usage).toBe("");
  });

  it("caps first-level images at five, sorted", () => {
    writeTree(dir, {
      "g.png": "x",
      "a.jpg": "x",
      "c.gif": "x",
      "b.PNG": "x",
      "e.webp": "x",
      "d.svg": "x",
      "f.txt": "x",
      "sub/z.png": "x",
    });
    expect(listImageFiles(dir)).toEqual(["a.jpg", "b.PNG", "c.gif", "d.svg", "e.webp"]);
  });

  it("skips images at or above the size limit", () => {
    writeTree(dir, { "small.png": "tiny" });
    fs.writeFileSync(path.join(dir, "huge.png"), Buffer.alloc(MAX_IMAGE_BYTES));
    expect(readImageFiles(dir)).toEqual([{ name: "small.png", path: path.join(dir, "small.png"), bytes: 4 }]);
  });

  it("prefers the localized README", () => {
    writeTree(dir, { "README.md": "plain", "README_zh.md": "localized" });
    expect(readReadme(dir)).toEqual({ filename: "README_zh.md", localized: true, text: "localized" });
    expect(probeDocumentation(dir)).toEqual({ hasDocumentation: true, hasLocalizedDocumentation: true });
  });

  it("returns null when there is no README", () => {
    expect(readReadme(dir)).toBeNull();
    expect(probeDocumentation(dir)).toEqual({ hasDocumentation: false, hasLocalizedDocumentation: false });
  });
});
