import { spawn } from "node:child_process";
import { PassThrough } from "node:stream";
import * as readline from "node:readline";
import { LabError } from "../core/errors.js";

export type SpawnOptions = {
  cwd?: string;
};

/**
 * Starts a command and yields its combined stdout/stderr line by line as it
 * is produced. Finite and not restartable; ends by throwing a
 * SUBPROCESS_FAILED LabError when the command cannot start or exits non-zero.
 */
export type LineSpawner = (command: string, args: string[], opts?: SpawnOptions) => AsyncGenerator<string, void, undefined>;

type Exit = { code: number | null; signal: NodeJS.Signals | null; error?: Error };

export async function* spawnLines(
  command: string,
  args: string[],
  opts: SpawnOptions = {},
): AsyncGenerator<string, void, undefined> {
  const child = spawn(command, args, {
    cwd: opts.cwd,
    stdio: ["ignore", "pipe", "pipe"],
    shell: false,
  });

  const merged = new PassThrough();
  let ended = false;
  const endMerged = () => {
    if (ended) return;
    ended = true;
    merged.end();
  };

  let openStreams = 2;
  const onStreamEnd = () => {
    openStreams--;
    if (openStreams === 0) endMerged();
  };
  child.stdout.on("end", onStreamEnd);
  child.stderr.on("end", onStreamEnd);
  child.stdout.pipe(merged, { end: false });
  child.stderr.pipe(merged, { end: false });

  // Listeners are attached up front so the exit is reaped even if the consumer detaches.
  const exited = new Promise<Exit>((resolve) => {
    child.once("error", (error) => {
      endMerged();
      resolve({ code: null, signal: null, error });
    });
    child.once("close", (code, signal) => {
      endMerged();
      resolve({ code, signal });
    });
  });

  const rl = readline.createInterface({ input: merged, crlfDelay: Infinity });
  let completed = false;
  try {
    for await (const line of rl) {
      yield line;
    }
    completed = true;
  } finally {
    rl.close();
    if (!completed && child.exitCode === null && child.signalCode === null) {
      child.kill("SIGTERM");
    }
  }

  const exit = await exited;
  if (exit.error) {
    throw new LabError("SUBPROCESS_FAILED", `Failed to start ${command}: ${exit.error.message}`);
  }
  if (exit.code !== 0) {
    const how = exit.signal ? `signal ${exit.signal}` : `exit code ${exit.code}`;
    throw new LabError("SUBPROCESS_FAILED", `${command} ${args.join(" ")} failed with ${how}`);
  }
}
