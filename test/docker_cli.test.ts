import { describe, expect, it } from "vitest";
import { DockerCli, detectComposeInvocation, execRunner } from "../src/docker/cli.js";
import {
  parseContainerLines,
  parsePortsString,
  parsePublishedPorts,
  parseWorkingDirLabels,
} from "../src/docker/ps.js";
import { spawnLines } from "../src/docker/stream.js";
import { isLabError } from "../src/core/errors.js";
import { fakeRunner } from "./helpers.js";

const isComposeVersion = (command: string, args: string[]) =>
  command === "docker" && args.join(" ") === "compose version";

describe("compose invocation detection", () => {
  it("prefers the docker compose plugin", async () => {
    const runner = fakeRunner();
    expect(await detectComposeInvocation(runner)).toBe("plugin");
    expect(runner.calls).toHaveLength(1);
  });

  it("falls back to standalone docker-compose", async () => {
    const runner = fakeRunner((command, args) => (isComposeVersion(command, args) ? { ok: false } : undefined));
    expect(await detectComposeInvocation(runner)).toBe("standalone");
  });

  it("defaults to the plugin form when neither answers", async () => {
    const runner = fakeRunner(() => ({ ok: false, stderr: "not found" }));
    expect(await detectComposeInvocation(runner)).toBe("plugin");
    expect(runner.calls.map((c) => c.command)).toEqual(["docker", "docker-compose"]);
  });

  it("detects once per DockerCli instance", async () => {
    const runner = fakeRunner();
    const docker = new DockerCli({ runner });
    await docker.compose(["up", "-d"], "/labs/web/a");
    await docker.compose(["down"], "/labs/web/a");
    expect(runner.calls.map((c) => [c.command, ...c.args].join(" "))).toEqual([
      "docker compose version",
      "docker compose up -d",
      "docker compose down",
    ]);
    expect(runner.calls[1].cwd).toBe("/labs/web/a");
  });

  it("uses the configured invocation without probing", async () => {
    const runner = fakeRunner();
    const docker = new DockerCli({ runner, invocation: "standalone" });
    await docker.compose(["pull"], "/labs/x");
    expect(runner.calls).toEqual([{ command: "docker-compose", args: ["pull"], cwd: "/labs/x" }]);
  });
});

describe("DockerCli queries", () => {
  it("lists compose images without duplicates", async () => {
    const runner = fakeRunner(() => ({ stdout: "nginx:1.25\n\nredis:7\nnginx:1.25\n" }));
    const docker = new DockerCli({ runner, invocation: "plugin" });
    expect(await docker.composeImages("/labs/x")).toEqual(["nginx:1.25", "redis:7"]);
  });

  it("returns null when compose cannot list images", async () => {
    const runner = fakeRunner(() => ({ ok: false, stderr: "no configuration file provided" }));
    const docker = new DockerCli({ runner, invocation: "plugin" });
    expect(await docker.composeImages("/labs/x")).toBeNull();
  });

  it("checks image presence with docker image inspect", async () => {
    const runner = fakeRunner((_, args) => (args[2] === "redis:7" ? { ok: false } : undefined));
    const docker = new DockerCli({ runner, invocation: "plugin" });
    expect(await docker.imageExists("nginx:1.25")).toBe(true);
    expect(await docker.imageExists("redis:7")).toBe(false);
    expect(runner.calls[0]).toEqual({ command: "docker", args: ["image", "inspect", "nginx:1.25"], cwd: undefined });
  });

  it("maps project container ids to a list, null on failure", async () => {
    const docker = new DockerCli({ runner: fakeRunner(() => ({ stdout: "abc123\ndef456\n" })), invocation: "plugin" });
    expect(await docker.projectContainerIds("/labs/x")).toEqual(["abc123", "def456"]);

    const failing = new DockerCli({ runner: fakeRunner(() => ({ ok: false })), invocation: "plugin" });
    expect(await failing.projectContainerIds("/labs/x")).toBeNull();
  });

  it("reports a docker ps failure as an error result", async () => {
    const docker = new DockerCli({
      runner: fakeRunner(() => ({ ok: false, stderr: "Cannot connect to the Docker daemon\n" })),
      invocation: "plugin",
    });
    expect(await docker.listContainers()).toEqual({ ok: false, error: "Cannot connect to the Docker daemon" });
  });
});

describe("docker ps parsing", () => {
  it("reads host ports from a Ports column", () => {
    expect(parsePortsString("0.0.0.0:8080->80/tcp, :::8080->80/tcp, 0.0.0.0:5353->53/udp, 9000/tcp")).toEqual([
      8080, 8080, 5353,
    ]);
  });

  it("collects published ports from array and line-delimited output", () => {
    const array = JSON.stringify([
      { Name: "web", Publishers: [{ PublishedPort: 8080 }, { PublishedPort: 0 }] },
      { Name: "db", Publishers: [{ PublishedPort: 8080 }, { PublishedPort: 3306 }] },
    ]);
    expect(parsePublishedPorts(array)).toEqual([8080, 3306]);

    const lines = [
      JSON.stringify({ Name: "web", Ports: "0.0.0.0:8081->80/tcp, :::8081->80/tcp" }),
      "not json",
      JSON.stringify({ Name: "api", Ports: "0.0.0.0:9000->9000/tcp" }),
    ].join("\n");
    expect(parsePublishedPorts(lines)).toEqual([8081, 9000]);
  });

  it("maps docker ps json lines to container summaries", () => {
    const out = JSON.stringify({
      ID: "0123456789abcdef",
      Names: "web-app-1",
      Image: "nginx:1.25",
      Status: "Up 3 minutes",
      Ports: "0.0.0.0:8080->80/tcp",
    });
    expect(parseContainerLines(`${out}\n`)).toEqual([
      { id: "0123456789ab", name: "web-app-1", image: "nginx:1.25", status: "Up 3 minutes", ports: "0.0.0.0:8080->80/tcp" },
    ]);
  });

  it("extracts compose working directories from labels", () => {
    const out = [
      "com.docker.compose.project=app,com.docker.compose.project.working_dir=/labs/web/app,com.docker.compose.service=web",
      "maintainer=someone",
      "com.docker.compose.project.working_dir=/labs/db/mysql",
    ].join("\n");
    expect([...parseWorkingDirLabels(out)]).toEqual(["/labs/web/app", "/labs/db/mysql"]);
  });
});

describe("subprocess execution", () => {
  it("execRunner reports a missing binary as a failure", async () => {
    const res = await execRunner("labctl-no-such-binary", ["--version"]);
    expect(res.ok).toBe(false);
    expect(res.stderr).toContain("ENOENT");
  });

  it("spawnLines yields stdout and stderr lines as they arrive", async () => {
    const script = "console.log('one'); console.error('two'); console.log('three');";
    const lines: string[] = [];
    for await (const line of spawnLines(process.execPath, ["-e", script])) lines.push(line);
    expect([...lines].sort()).toEqual(["one", "three", "two"]);
  });

  it("spawnLines ends with SUBPROCESS_FAILED on a non-zero exit", async () => {
    const lines: string[] = [];
    const err = await (async () => {
      for await (const line of spawnLines(process.execPath, ["-e", "console.log('partial'); process.exit(3)"])) {
        lines.push(line);
      }
    })().catch((e: unknown) => e);
    expect(lines).toEqual(["partial"]);
    expect(isLabError(err, "SUBPROCESS_FAILED")).toBe(true);
  });

  it("spawnLines fails when the command cannot start", async () => {
    const err = await (async () => {
      for await (const _ of spawnLines("labctl-no-such-binary", [])) {
        // no output expected
      }
    })().catch((e: unknown) => e);
    expect(isLabError(err, "SUBPROCESS_FAILED")).toBe(true);
  });

  it("spawnLines terminates the child when the consumer stops early", async () => {
    const script = "setInterval(() => console.log('tick'), 10);";
    let seen = 0;
    for await (const _ of spawnLines(process.execPath, ["-e", script])) {
      seen++;
      if (seen === 2) break;
    }
    expect(seen).toBe(2);
  });
});
