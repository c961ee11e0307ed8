import { describe, expect, it, afterEach } from "vitest";
import http from "node:http";
import { httpProbe, waitForReady } from "../src/lifecycle/readiness.js";

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      resolve(typeof addr === "object" && addr !== null ? addr.port : 0);
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

/** A port that was just bound and released, so nothing is listening on it. */
async function closedPort(): Promise<number> {
  const server = http.createServer();
  const port = await listen(server);
  await close(server);
  return port;
}

describe("waitForReady", () => {
  const servers: http.Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((s) => (s.listening ? close(s) : Promise.resolve())));
  });

  it("is ready as soon as a published port answers", async () => {
    const server = http.createServer((_, res) => res.end("ok"));
    servers.push(server);
    const port = await listen(server);

    expect(await waitForReady({ timeoutSeconds: 5, discoverPorts: async () => [port] })).toEqual({ ready: true, port });
  });

  it("counts an error status as ready", async () => {
    const server = http.createServer((_, res) => {
      res.statusCode = 503;
      res.end("starting");
    });
    servers.push(server);
    const port = await listen(server);

    expect(await httpProbe(port, 1000)).toBe(true);
  });

  it("spends one budget on a port that accepts but never answers", async () => {
    const server = http.createServer(() => {
      // hold the request open
    });
    servers.push(server);
    const port = await listen(server);

    const started = Date.now();
    expect(await httpProbe(port, 300)).toBe(false);
    expect(Date.now() - started).toBeLessThan(550);
    server.closeAllConnections();
  });

  it("reports not ready with the port when nothing accepts within the timeout", async () => {
    const port = await closedPort();
    const started = Date.now();
    const res = await waitForReady({
      timeoutSeconds: 2,
      discoverPorts: async () => [port],
      pollIntervalMs: 100,
      probeTimeoutMs: 200,
    });
    expect(res).toEqual({ ready: false, port });
    expect(Date.now() - started).toBeGreaterThanOrEqual(1900);
  });

  it("stops at the deadline when port discovery stalls", async () => {
    const remaining: number[] = [];
    const started = Date.now();
    const res = await waitForReady({
      timeoutSeconds: 1,
      discoverPorts: async (remainingMs) => {
        remaining.push(remainingMs);
        await new Promise((r) => setTimeout(r, 3000));
        return [8080];
      },
    });
    expect(res).toEqual({ ready: false });
    expect(Date.now() - started).toBeLessThan(2000);
    expect(remaining.length).toBeGreaterThan(0);
    expect(remaining[0]).toBeLessThanOrEqual(1000);
  });

  it("caps each probe at the time left", async () => {
    let clock = 0;
    const budgets: number[] = [];
    await waitForReady({
      timeoutSeconds: 1,
      discoverPorts: async () => [8080],
      probeTimeoutMs: 2000,
      probe: async (_port, timeoutMs) => {
        budgets.push(timeoutMs);
        clock += 600;
        return false;
      },
      now: () => clock,
      sleep: async () => {},
    });
    expect(budgets).toEqual([1000, 400]);
  });

  it("reports not ready without a port when none is ever published", async () => {
    let clock = 0;
    let polls = 0;
    const res = await waitForReady({
      timeoutSeconds: 2,
      discoverPorts: async () => {
        polls++;
        return [];
      },
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      },
    });
    expect(res).toEqual({ ready: false });
    expect(polls).toBe(2);
  });

  it("polls at least once for a zero timeout", async () => {
    let clock = 0;
    let polls = 0;
    await waitForReady({
      timeoutSeconds: 0,
      discoverPorts: async () => {
        polls++;
        return [];
      },
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      },
    });
    expect(polls).toBe(1);
  });

  it("tries every discovered port in order", async () => {
    const probed: number[] = [];
    const res = await waitForReady({
      timeoutSeconds: 1,
      discoverPorts: async () => [8080, 8443],
      probe: async (port) => {
        probed.push(port);
        return port === 8443;
      },
    });
    expect(res).toEqual({ ready: true, port: 8443 });
    expect(probed).toEqual([8080, 8443]);
  });
});
