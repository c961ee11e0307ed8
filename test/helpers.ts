import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CommandResult, CommandRunner, RunOptions } from "../src/docker/cli.js";

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write `files` (relative path → contents) under `root`, creating directories. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, contents] of Object.entries(files)) {
    const p = path.join(root, rel);
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, contents);
  }
}

export type RecordedCall = { command: string; args: string[]; cwd?: string };

export type FakeReply = Partial<CommandResult> | undefined;

/**
 * CommandRunner that answers from `reply`. Unanswered calls succeed with
 * empty output.
 */
export function fakeRunner(
  reply: (command: string, args: string[], opts: RunOptions) => FakeReply = () => undefined,
): CommandRunner & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner = async (command: string, args: string[], opts: RunOptions = {}): Promise<CommandResult> => {
    calls.push({ command, args, cwd: opts.cwd });
    const r = reply(command, args, opts) ?? {};
    const ok = r.ok ?? true;
    return {
      ok,
      exitCode: r.exitCode ?? (ok ? 0 : 1),
      stdout: r.stdout ?? "",
      stderr: r.stderr ?? "",
    };
  };
  return Object.assign(runner, { calls });
}

export function manifest(services: Record<string, { image?: string; ports?: string[] }>): string {
  const lines = ["services:"];
  for (const [name, svc] of Object.entries(services)) {
    lines.push(`  ${name}:`);
    if (svc.image) lines.push(`    image: ${svc.image}`);
    if (svc.ports) {
      lines.push("    ports:");
      for (const p of svc.ports) lines.push(`      - "${p}"`);
    }
  }
  return lines.join("\n") + "\n";
}
