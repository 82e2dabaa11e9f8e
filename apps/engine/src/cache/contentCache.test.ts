import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ContentCache, createContentCache } from "./contentCache";
import { FileCacheIndex } from "./cacheIndexFile";
import { RedisCacheIndex } from "./cacheIndexRedis";
import { createFakeRedis } from "../redis/__testutils__/fakeRedis";

const SETTINGS = { stability: 0.45, similarityBoost: 0.75 };

describe("ContentCache", () => {
  let root = "";
  let cache: ContentCache;
  let calls = 0;

  const synthesize = async (outPath: string) => {
    calls += 1;
    await fs.writeFile(outPath, `audio-${calls}`);
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "reel-cache-"));
    calls = 0;
    cache = await createContentCache({ namespace: "stub", backend: "file", rootDir: root });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("derives the same key regardless of settings key order", () => {
    expect(cache.keyFor("hello", "mark", { a: 1, b: 2 })).toBe(cache.keyFor("hello", "mark", { b: 2, a: 1 }));
    expect(cache.keyFor("hello", "mark", SETTINGS)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("synthesizes once and serves later requests from the cache", async () => {
    const first = await cache.getOrCreate("hello there", "mark", SETTINGS, synthesize);
    const second = await cache.getOrCreate("hello there", "mark", SETTINGS, synthesize);
    expect(calls).toBe(1);
    expect(first.hit).toBe(false);
    expect(second).toEqual({ key: first.key, path: first.path, hit: true });
    expect(await fs.readFile(second.path, "utf8")).toBe("audio-1");
    expect(path.basename(first.path)).toBe(`${first.key}.mp3`);
  });

  it("collapses concurrent misses into one synthesis", async () => {
    const results = await Promise.all([
      cache.getOrCreate("same text", "mark", SETTINGS, synthesize),
      cache.getOrCreate("same text", "mark", SETTINGS, synthesize),
      cache.getOrCreate("same text", "mark", SETTINGS, synthesize)
    ]);
    expect(calls).toBe(1);
    expect(new Set(results.map((result) => result.path)).size).toBe(1);
  });

  it("retries after a failed synthesis and leaves no partial file", async () => {
    const failing = async (outPath: string) => {
      await fs.writeFile(outPath, "partial");
      throw new Error("tts exploded");
    };
    await expect(cache.getOrCreate("retry me", "mark", SETTINGS, failing)).rejects.toThrow("tts exploded");
    expect((await fs.readdir(cache.dir)).filter((name) => name.endsWith(".mp3"))).toEqual([]);

    const result = await cache.getOrCreate("retry me", "mark", SETTINGS, synthesize);
    expect(result.hit).toBe(false);
    expect(calls).toBe(1);
  });

  it("evicts an entry whose file disappeared", async () => {
    const created = await cache.getOrCreate("gone soon", "mark", SETTINGS, synthesize);
    await fs.rm(created.path);

    expect(await cache.lookup(created.key)).toBeNull();
    const reopened = await FileCacheIndex.open(cache.dir);
    expect(await reopened.get(created.key)).toBeNull();

    const again = await cache.getOrCreate("gone soon", "mark", SETTINGS, synthesize);
    expect(again.hit).toBe(false);
    expect(calls).toBe(2);
  });

  it("keeps namespaces apart", async () => {
    const other = await createContentCache({ namespace: "elevenlabs", backend: "file", rootDir: root });
    await cache.getOrCreate("shared text", "mark", SETTINGS, synthesize);
    const fromOther = await other.getOrCreate("shared text", "mark", SETTINGS, synthesize);
    expect(fromOther.hit).toBe(false);
    expect(calls).toBe(2);
  });

  it("works over a redis hash index", async () => {
    const redis = createFakeRedis();
    const redisCache = new ContentCache(new RedisCacheIndex(redis, "reel:test:cache:stub"), path.join(root, "r"));
    const first = await redisCache.getOrCreate("redis text", "adam", SETTINGS, synthesize);
    const second = await redisCache.getOrCreate("redis text", "adam", SETTINGS, synthesize);
    expect(second.hit).toBe(true);
    expect(calls).toBe(1);

    const stored = await redis.hget("reel:test:cache:stub", first.key);
    expect(stored).not.toBeNull();
    expect(JSON.parse(stored ?? "{}")).toMatchObject({
      path: first.path,
      voice: "adam",
      text_preview: "redis text"
    });
  });
});
