import type { RedisCommands } from "../client";

export type FakeRedis = RedisCommands & {
  dump: () => { strings: Map<string, string>; sets: Map<string, Set<string>>; hashes: Map<string, Map<string, string>> };
};

export function createFakeRedis(): FakeRedis {
  const strings = new Map<string, string>();
  const sets = new Map<string, Set<string>>();
  const hashes = new Map<string, Map<string, string>>();

  const setFor = (key: string) => {
    let current = sets.get(key);
    if (!current) {
      current = new Set();
      sets.set(key, current);
    }
    return current;
  };

  const hashFor = (key: string) => {
    let current = hashes.get(key);
    if (!current) {
      current = new Map();
      hashes.set(key, current);
    }
    return current;
  };

  return {
    async get(key) {
      return strings.get(key) ?? null;
    },
    async set(key, value) {
      strings.set(key, value);
      return "OK";
    },
    async del(...keys) {
      let removed = 0;
      for (const key of keys) {
        if (strings.delete(key) || sets.delete(key) || hashes.delete(key)) {
          removed += 1;
        }
      }
      return removed;
    },
    async sadd(key, ...members) {
      const target = setFor(key);
      let added = 0;
      for (const member of members) {
        if (!target.has(member)) {
          target.add(member);
          added += 1;
        }
      }
      return added;
    },
    async srem(key, ...members) {
      const target = sets.get(key);
      if (!target) {
        return 0;
      }
      let removed = 0;
      for (const member of members) {
        if (target.delete(member)) {
          removed += 1;
        }
      }
      return removed;
    },
    async smembers(key) {
      return [...(sets.get(key) ?? [])];
    },
    async hget(key, field) {
      return hashes.get(key)?.get(field) ?? null;
    },
    async hset(key, field, value) {
      const target = hashFor(key);
      const isNew = !target.has(field);
      target.set(field, value);
      return isNew ? 1 : 0;
    },
    async hdel(key, ...fields) {
      const target = hashes.get(key);
      if (!target) {
        return 0;
      }
      let removed = 0;
      for (const field of fields) {
        if (target.delete(field)) {
          removed += 1;
        }
      }
      return removed;
    },
    async hgetall(key) {
      return Object.fromEntries(hashes.get(key) ?? []);
    },
    dump: () => ({ strings, sets, hashes })
  };
}
