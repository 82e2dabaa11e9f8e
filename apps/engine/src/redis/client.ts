import IORedis from "ioredis";

/** The subset of Redis the job tracker and cache index rely on. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  sadd(key: string, ...members: string[]): Promise<number>;
  srem(key: string, ...members: string[]): Promise<number>;
  smembers(key: string): Promise<string[]>;
  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string): Promise<number>;
  hdel(key: string, ...fields: string[]): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
}

let client: IORedis | null = null;

export function getRedis() {
  if (!client) {
    const redisUrl = process.env.REDIS_URL ?? "redis://127.0.0.1:6379";
    const isTest = process.env.NODE_ENV === "test";
    client = new IORedis(redisUrl, {
      maxRetriesPerRequest: isTest ? 0 : null,
      retryStrategy: isTest ? () => null : undefined,
      lazyConnect: isTest,
      enableReadyCheck: isTest ? true : undefined
    });
    client.on("error", (err) => {
      console.error("[reel] redis error", err);
    });
  }
  return client;
}

export async function closeRedis() {
  if (!client) {
    return;
  }
  const current = client;
  client = null;
  await current.quit();
}

export function toRedisCommands(redis: IORedis): RedisCommands {
  return {
    get: (key) => redis.get(key),
    set: (key, value) => redis.set(key, value),
    del: (...keys) => redis.del(...keys),
    sadd: (key, ...members) => redis.sadd(key, ...members),
    srem: (key, ...members) => redis.srem(key, ...members),
    smembers: (key) => redis.smembers(key),
    hget: (key, field) => redis.hget(key, field),
    hset: (key, field, value) => redis.hset(key, field, value),
    hdel: (key, ...fields) => redis.hdel(key, ...fields),
    hgetall: (key) => redis.hgetall(key)
  };
}

export function getRedisCommands(): RedisCommands {
  return toRedisCommands(getRedis());
}
