#!/usr/bin/env node

import { Command } from "commander";
import { openRegistry, type ConfigSource } from "./commands/context.js";
import { list, refresh, show, stats, ps, formatRecord, formatStats } from "./commands/environments.js";
import { start, stop, images, pull, ready, formatReadiness } from "./commands/lifecycle.js";
import { validate } from "./commands/validate.js";
import { EXIT, type CommandFailure } from "./commands/exit-codes.js";
import type { Registry } from "./registry/registry.js";
import type { LabConfig } from "./types/config.js";

type Format = "human" | "jsonl";

type CommonOpts = { config?: string; profile?: string; format: string };

const program = new Command();

program
  .name("labctl")
  .description("Registry and lifecycle control for compose-based lab environments")
  .version("0.1.0");

function common(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory")
    .option("--profile <name>", "Config profile layered over base.yaml")
    .option("--format <format>", "Output format: human|jsonl", "human");
}

function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value) + "\n");
}

function fail(format: Format, res: CommandFailure, extra: Record<string, unknown> = {}): never {
  if (format === "jsonl") {
    writeJson({ level: "error", error: res.error, ...extra });
  } else {
    console.error(res.error);
  }
  process.exit(res.exitCode);
}

function parseFormat(raw: string): Format {
  if (raw === "human" || raw === "jsonl") return raw;
  console.error(`Unknown format: ${raw} (expected human|jsonl)`);
  process.exit(EXIT.INVALID_ARGS);
}

function parseTimeout(raw: string | undefined, fallback: number, format: Format): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) fail(format, { ok: false, error: `Invalid timeout: ${raw}`, exitCode: EXIT.INVALID_ARGS });
  return n;
}

/** Resolve config, build the registry, and hand both to `fn`. */
async function withRegistry(
  opts: CommonOpts,
  fn: (registry: Registry, format: Format, config: LabConfig) => Promise<void>,
): Promise<void> {
  const format = parseFormat(opts.format);
  const src: ConfigSource = { configDir: opts.config, profile: opts.profile };
  const res = openRegistry(src);
  if (!res.ok) fail(format, res);
  await fn(res.registry, format, res.config);
}

common(program.command("list"))
  .description("List environments (cached unless --refresh)")
  .option("--refresh", "Rescan the tree before listing")
  .option("--status", "Reconcile running/stopped status with docker ps")
  .option("--category <name>", "Only environments in this category")
  .action(async (opts: CommonOpts & { refresh?: boolean; status?: boolean; category?: string }) => {
    await withRegistry(opts, async (registry, format) => {
      const res = await list(registry, { refresh: opts.refresh, status: opts.status, category: opts.category });
      if (!res.ok) fail(format, res);
      if (format === "jsonl") {
        for (const env of res.environments) writeJson(env);
      } else {
        if (res.environments.length === 0) { console.log("No environments found."); return; }
        for (const env of res.environments) console.log(formatRecord(env));
      }
    });
  });

common(program.command("show"))
  .description("Show one environment's manifest, docs and exploit files")
  .argument("<id>", "Environment identifier (path relative to the root)")
  .action(async (id: string, opts: CommonOpts) => {
    await withRegistry(opts, async (registry, format) => {
      const res = await show(registry, id);
      if (!res.ok) fail(format, res);
      const d = res.detail;
      if (format === "jsonl") {
        writeJson(d);
        return;
      }
      console.log(d.record ? formatRecord(d.record) : d.identifier);
      console.log(`directory: ${d.directory}`);
      console.log(`manifest: ${d.manifestPath}`);
      if (d.readme) console.log(`readme: ${d.readme.filename}${d.readme.localized ? " (localized)" : ""}`);
      for (const img of d.images) console.log(`image: ${img.name}  ${img.bytes} bytes`);
      for (const f of d.exploitFiles) {
        console.log(`exploit: ${f.path}  ${f.lines} lines${f.usage ? `  ${f.usage.trim()}` : ""}`);
      }
      console.log("");
      console.log(d.manifestText.trimEnd());
    });
  });

common(program.command("start"))
  .description("Bring an environment up (detached)")
  .argument("<id>", "Environment identifier")
  .option("--wait", "Wait until a published port answers")
  .option("--timeout <seconds>", "Readiness timeout in seconds")
  .action(async (id: string, opts: CommonOpts & { wait?: boolean; timeout?: string }) => {
    await withRegistry(opts, async (registry, format, config) => {
      const timeoutSeconds = parseTimeout(opts.timeout, config.readiness.default_timeout_seconds, format);
      const res = await start(registry, id, { wait: opts.wait, timeoutSeconds });
      if (!res.ok) {
        if (res.portConflict && format === "human") console.error("Hint: a host port is taken; stop whatever holds it and retry.");
        fail(format, res, { portConflict: res.portConflict });
      }
      if (format === "jsonl") {
        writeJson({ level: "info", identifier: res.identifier, status: "running", readiness: res.readiness });
      } else {
        console.log(`${res.identifier}: running`);
        if (res.readiness) console.log(formatReadiness(res.readiness));
      }
    });
  });

common(program.command("stop"))
  .description("Tear an environment down")
  .argument("<id>", "Environment identifier")
  .action(async (id: string, opts: CommonOpts) => {
    await withRegistry(opts, async (registry, format) => {
      const res = await stop(registry, id);
      if (!res.ok) fail(format, res);
      if (format === "jsonl") writeJson({ level: "info", identifier: res.identifier, status: "stopped" });
      else console.log(`${res.identifier}: stopped`);
    });
  });

common(program.command("images"))
  .description("Report images the environment needs that are not present locally")
  .argument("<id>", "Environment identifier")
  .action(async (id: string, opts: CommonOpts) => {
    await withRegistry(opts, async (registry, format) => {
      const res = await images(registry, id);
      if (format === "jsonl") {
        writeJson({ level: res.warning ? "warn" : "info", missing: res.missing, warning: res.warning });
        return;
      }
      if (res.warning) console.error(res.warning);
      if (res.missing.length === 0) console.log("All images present.");
      for (const ref of res.missing) console.log(ref);
    });
  });

common(program.command("pull"))
  .description("Pull the environment's images, streaming compose output")
  .argument("<id>", "Environment identifier")
  .action(async (id: string, opts: CommonOpts) => {
    await withRegistry(opts, async (registry, format) => {
      const res = await pull(registry, id, (line) => {
        if (format === "jsonl") writeJson({ level: "info", line });
        else console.log(line);
      });
      if (!res.ok) fail(format, res);
    });
  });

common(program.command("ready"))
  .description("Wait until one of the environment's published ports answers HTTP")
  .argument("<id>", "Environment identifier")
  .option("--timeout <seconds>", "Timeout in seconds")
  .action(async (id: string, opts: CommonOpts & { timeout?: string }) => {
    await withRegistry(opts, async (registry, format, config) => {
      const timeoutSeconds = parseTimeout(opts.timeout, config.readiness.default_timeout_seconds, format);
      const res = await ready(registry, id, timeoutSeconds);
      if (!res.ok) fail(format, res);
      if (format === "jsonl") writeJson({ level: "info", ...res.readiness });
      else console.log(formatReadiness(res.readiness));
    });
  });

common(program.command("refresh"))
  .description("Drop the cache and rescan the tree")
  .action(async (opts: CommonOpts) => {
    await withRegistry(opts, async (registry, format) => {
      const res = await refresh(registry);
      if (!res.ok) fail(format, res);
      if (format === "jsonl") writeJson({ level: "info", environments: res.environments.length });
      else console.log(`Rescanned ${res.environments.length} environments.`);
    });
  });

common(program.command("stats"))
  .description("Summary counts over the registry")
  .action(async (opts: CommonOpts) => {
    await withRegistry(opts, async (registry, format) => {
      const res = await stats(registry);
      if (!res.ok) fail(format, res);
      if (format === "jsonl") writeJson(res.stats);
      else for (const line of formatStats(res.stats)) console.log(line);
    });
  });

common(program.command("ps"))
  .description("List running containers")
  .action(async (opts: CommonOpts) => {
    await withRegistry(opts, async (registry, format) => {
      const res = await ps(registry);
      if (!res.ok) fail(format, res);
      if (format === "jsonl") {
        for (const c of res.containers) writeJson(c);
      } else {
        if (res.containers.length === 0) { console.log("No running containers."); return; }
        for (const c of res.containers) console.log(`${c.id}  ${c.name}  ${c.image}  ${c.status}  ${c.ports}`);
      }
    });
  });

common(program.command("validate"))
  .description("Validate config and the scan root")
  .action((opts: CommonOpts) => {
    const format = parseFormat(opts.format);
    const res = validate({ configDir: opts.config, profile: opts.profile });
    if (!res.ok) {
      if (format === "jsonl") {
        for (const err of res.errors) writeJson(err);
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.INVALID_ARGS);
    }
    for (const w of res.warnings) {
      if (format === "jsonl") writeJson(w);
      else console.error(w.message);
    }
    if (format === "jsonl") writeJson({ level: "info", code: "OK", message: "OK" });
    else console.log("OK");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
