import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { contentHash } from "../lib/hashing";
import { getCacheDir, getCacheIndexBackend, type CacheIndexBackend } from "../lib/config";
import type { RedisCommands } from "../redis/client";
import { PREVIEW_CHARS, type CacheEntry, type CacheIndex } from "./cacheIndex";
import { FileCacheIndex } from "./cacheIndexFile";
import { RedisCacheIndex, getCacheIndexKey } from "./cacheIndexRedis";

export type CacheResult = {
  key: string;
  path: string;
  hit: boolean;
};

/** Writes the synthesized artifact to `outPath`. */
export type Synthesize = (outPath: string) => Promise<void>;

async function fileExists(filePath: string) {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class ContentCache {
  private readonly inFlight = new Map<string, Promise<CacheResult>>();

  constructor(
    private readonly index: CacheIndex,
    readonly dir: string,
    private readonly extension = ".mp3"
  ) {}

  keyFor(text: string, voice: string, settings: Record<string, unknown>) {
    return contentHash({ text, voice, settings });
  }

  /** Returns the cached file path, or null. An entry whose file is gone is evicted. */
  async lookup(key: string): Promise<string | null> {
    const entry = await this.index.get(key);
    if (!entry) {
      return null;
    }
    if (await fileExists(entry.path)) {
      return entry.path;
    }
    await this.index.delete(key);
    console.warn(`[reel] cache entry evicted key=${key} reason=missing-file path=${entry.path}`);
    return null;
  }

  async store(key: string, filePath: string, meta: { voice: string; text: string }): Promise<CacheEntry> {
    const entry: CacheEntry = {
      key,
      path: filePath,
      voice: meta.voice,
      preview: meta.text.slice(0, PREVIEW_CHARS),
      createdAt: new Date().toISOString()
    };
    await this.index.set(entry);
    return entry;
  }

  /**
   * Returns the cached artifact for (text, voice, settings), synthesizing it on a
   * miss. Concurrent callers for the same key share one synthesis; a failed
   * synthesis is not remembered.
   */
  async getOrCreate(
    text: string,
    voice: string,
    settings: Record<string, unknown>,
    synthesize: Synthesize
  ): Promise<CacheResult> {
    const key = this.keyFor(text, voice, settings);
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }
    const task = this.resolve(key, text, voice, synthesize);
    this.inFlight.set(key, task);
    try {
      return await task;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async resolve(key: string, text: string, voice: string, synthesize: Synthesize) {
    const cached = await this.lookup(key);
    if (cached) {
      console.log(`[reel] cache hit key=${key.slice(0, 12)} voice=${voice}`);
      return { key, path: cached, hit: true };
    }
    await fs.mkdir(this.dir, { recursive: true });
    const finalPath = path.join(this.dir, `${key}${this.extension}`);
    const tempPath = path.join(this.dir, `.tmp-${randomUUID()}-${key}${this.extension}`);
    try {
      await synthesize(tempPath);
      await fs.rename(tempPath, finalPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }
    await this.store(key, finalPath, { voice, text });
    console.log(`[reel] cache stored key=${key.slice(0, 12)} voice=${voice}`);
    return { key, path: finalPath, hit: false };
  }
}

export async function createContentCache(options: {
  namespace: string;
  backend?: CacheIndexBackend;
  rootDir?: string;
  redis?: RedisCommands;
  extension?: string;
}) {
  const backend = options.backend ?? getCacheIndexBackend();
  const dir = path.join(options.rootDir ?? getCacheDir(), options.namespace);
  let index: CacheIndex;
  if (backend === "redis") {
    const redis = options.redis ?? (await import("../redis/client")).getRedisCommands();
    index = new RedisCacheIndex(redis, getCacheIndexKey(options.namespace));
  } else {
    index = await FileCacheIndex.open(dir);
  }
  return new ContentCache(index, dir, options.extension);
}
