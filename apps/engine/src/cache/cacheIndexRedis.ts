import type { RedisCommands } from "../redis/client";
import { getInstanceId } from "../lib/config";
import { fromIndexRecord, toIndexRecord, type CacheEntry, type CacheIndex } from "./cacheIndex";

export function getCacheIndexKey(namespace: string, instanceId = getInstanceId()) {
  return `reel:${instanceId}:cache:${namespace}`;
}

/** One Redis hash per namespace; each entry is a single HSET/HDEL. */
export class RedisCacheIndex implements CacheIndex {
  constructor(
    private readonly redis: RedisCommands,
    readonly hashKey: string
  ) {}

  async get(key: string) {
    const raw = await this.redis.hget(this.hashKey, key);
    return raw ? this.parse(key, raw) : null;
  }

  async set(entry: CacheEntry) {
    await this.redis.hset(this.hashKey, entry.key, JSON.stringify(toIndexRecord(entry)));
  }

  async delete(key: string) {
    await this.redis.hdel(this.hashKey, key);
  }

  async entries() {
    const all = await this.redis.hgetall(this.hashKey);
    const entries: CacheEntry[] = [];
    for (const [key, raw] of Object.entries(all)) {
      const entry = this.parse(key, raw);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  private parse(key: string, raw: string) {
    try {
      return fromIndexRecord(key, JSON.parse(raw));
    } catch {
      console.warn(`[reel] cache index entry unreadable key=${key} hash=${this.hashKey}`);
      return null;
    }
  }
}
