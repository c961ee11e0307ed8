import { describe, expect, it, vi, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { RegistryCache } from "../src/cache/registry-cache.js";
import { FileCacheStore, MemoryCacheStore } from "../src/cache/store.js";
import { parseEnvelope } from "../src/cache/envelope.js";
import { computeFingerprint } from "../src/scanner/discovery.js";
import type { EnvironmentRecord, RegistrySnapshot } from "../src/types/environment.js";
import type { Logger } from "../src/core/log.js";
import { makeTmpDir, writeTree } from "./helpers.js";

const HOUR = 3600 * 1000;
const ROOT = path.resolve("/srv/labs");

function record(identifier: string, extra: Partial<EnvironmentRecord> = {}): EnvironmentRecord {
  const segments = identifier.split("/");
  return {
    identifier,
    category: segments[0],
    label: segments[segments.length - 1],
    services: ["web"],
    hostPorts: { web: "8080" },
    status: "unknown",
    hasExploitArtifacts: false,
    hasBundledImages: false,
    hasDocumentation: true,
    hasLocalizedDocumentation: false,
    hasAllImagesLocally: false,
    ...extra,
  };
}

const SNAPSHOT: RegistrySnapshot = [record("db/mysql-5"), record("web/nginx-1", { hasExploitArtifacts: true })];

describe("RegistryCache", () => {
  let fingerprint = "fp-1";
  let clock = 1_000_000;

  const makeCache = (store: MemoryCacheStore, logger?: Logger) =>
    new RegistryCache({
      store,
      fingerprint: async () => fingerprint,
      ttlMs: 24 * HOUR,
      now: () => clock,
      logger,
    });

  afterEach(() => {
    fingerprint = "fp-1";
    clock = 1_000_000;
  });

  it("reports absent before anything is stored", async () => {
    expect(await makeCache(new MemoryCacheStore()).load(ROOT)).toBeNull();
  });

  it("round-trips a stored snapshot", async () => {
    const cache = makeCache(new MemoryCacheStore());
    await cache.store(ROOT, SNAPSHOT);
    expect(await cache.load(ROOT)).toEqual(SNAPSHOT);
  });

  it("serves the durable tier to a fresh instance", async () => {
    const store = new MemoryCacheStore();
    await makeCache(store).store(ROOT, SNAPSHOT);
    expect(await makeCache(store).load(ROOT)).toEqual(SNAPSHOT);
  });

  it("writes one complete envelope", async () => {
    const store = new MemoryCacheStore();
    await makeCache(store).store(ROOT, SNAPSHOT);
    expect(store.writes).toBe(1);
    const parsed = parseEnvelope(store.contents ?? "");
    expect(parsed).toEqual({
      ok: true,
      envelope: { snapshot: SNAPSHOT, capturedAt: 1_000_000, manifestSetFingerprint: "fp-1", rootPath: ROOT },
    });
  });

  it("rejects the durable tier when the manifest set changed", async () => {
    const store = new MemoryCacheStore();
    await makeCache(store).store(ROOT, SNAPSHOT);
    fingerprint = "fp-2";
    expect(await makeCache(store).load(ROOT)).toBeNull();
  });

  it("expires the durable tier after the TTL", async () => {
    const store = new MemoryCacheStore();
    await makeCache(store).store(ROOT, SNAPSHOT);

    clock += 24 * HOUR;
    expect(await makeCache(store).load(ROOT)).toEqual(SNAPSHOT);

    clock += 1;
    expect(await makeCache(store).load(ROOT)).toBeNull();
  });

  it("rejects an envelope written for another root", async () => {
    const store = new MemoryCacheStore();
    await makeCache(store).store(ROOT, SNAPSHOT);
    expect(await makeCache(store).load(path.resolve("/srv/other"))).toBeNull();
  });

  it("treats a corrupt envelope as a miss and logs it", async () => {
    const store = new MemoryCacheStore();
    store.contents = "{ not json";
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    expect(await makeCache(store, logger).load(ROOT)).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("treats an envelope of the wrong shape as a miss", async () => {
    const store = new MemoryCacheStore();
    store.contents = JSON.stringify({ snapshot: [{ identifier: "x" }], capturedAt: 1, manifestSetFingerprint: "fp-1", rootPath: ROOT });
    expect(await makeCache(store).load(ROOT)).toBeNull();
  });

  it("invalidate clears both tiers", async () => {
    const store = new MemoryCacheStore();
    const cache = makeCache(store);
    await cache.store(ROOT, SNAPSHOT);
    await cache.invalidate();
    expect(store.contents).toBeNull();
    expect(await cache.load(ROOT)).toBeNull();
  });

  it("keeps status changes in process only", async () => {
    const store = new MemoryCacheStore();
    const cache = makeCache(store);
    await cache.store(ROOT, SNAPSHOT);

    expect(cache.setStatus("web/nginx-1", "running")).toBe(true);
    expect(cache.setStatus("web/missing", "running")).toBe(false);
    expect(cache.find("web/nginx-1")?.status).toBe("running");
    expect((await cache.load(ROOT))?.[1].status).toBe("running");

    expect((await makeCache(store).load(ROOT))?.[1].status).toBe("unknown");
  });

  it("hands out copies that callers cannot mutate", async () => {
    const cache = makeCache(new MemoryCacheStore());
    await cache.store(ROOT, SNAPSHOT);
    const first = await cache.load(ROOT);
    if (first) first[0].status = "running";
    expect((await cache.load(ROOT))?.[0].status).toBe("unknown");
  });
});

describe("RegistryCache over a real tree", () => {
  it("misses after a manifest is added", async () => {
    const root = makeTmpDir("labctl-cache-tree-");
    const cacheDir = makeTmpDir("labctl-cache-file-");
    writeTree(root, { "web/a/docker-compose.yml": "services: {}\n" });

    const make = () =>
      new RegistryCache({
        store: new FileCacheStore(path.join(cacheDir, "registry-cache.json")),
        fingerprint: (r) => computeFingerprint(r),
      });

    const snapshot = [record("web/a")];
    await make().store(root, snapshot);
    expect(await make().load(root)).toEqual(snapshot);

    writeTree(root, { "web/b/compose.yml": "services: {}\n" });
    expect(await make().load(root)).toBeNull();

    fs.rmSync(root, { recursive: true, force: true });
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });
});

describe("FileCacheStore", () => {
  it("writes atomically and leaves no temp files", async () => {
    const dir = makeTmpDir("labctl-store-");
    const store = new FileCacheStore(path.join(dir, "nested", "cache.json"));

    expect(await store.read()).toBeNull();
    await store.write("first");
    await store.write("second");
    expect(await store.read()).toBe("second");
    expect(fs.readdirSync(path.join(dir, "nested"))).toEqual(["cache.json"]);

    await store.remove();
    await store.remove();
    expect(await store.read()).toBeNull();
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
