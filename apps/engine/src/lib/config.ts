import path from "node:path";

export type RunMode = "solo" | "split";
export type StoreBackend = "memory" | "file" | "redis";
export type QueueBackend = "memory" | "redis";
export type CacheIndexBackend = "file" | "redis";
export type TtsProviderName = "stub" | "elevenlabs";
export type StoryProviderName = "custom" | "groq";

export type VideoConfig = {
  width: number;
  height: number;
  fps: number;
  safeMargin: number;
};

function pick<T extends string>(value: string | undefined, allowed: readonly T[]): T | null {
  if (!value) {
    return null;
  }
  const lower = value.trim().toLowerCase();
  return allowed.find((candidate) => candidate === lower) ?? null;
}

export function getRunMode(): RunMode {
  const explicit = pick(process.env.REEL_RUN_MODE, ["solo", "split"] as const);
  if (explicit) {
    return explicit;
  }
  if (process.env.REEL_STORE === "redis" && process.env.REEL_QUEUE === "redis") {
    return "split";
  }
  return "solo";
}

const startedAt = new Date().toISOString();

export function getInstanceId() {
  return process.env.REEL_INSTANCE_ID || "local";
}

export function getStartedAt() {
  return startedAt;
}

export function parseEnvNumber(value: string | undefined, fallback: number) {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function ensureRedisUrl(label: string) {
  if (!process.env.REDIS_URL) {
    throw new Error(`REDIS_URL is required when ${label} is set to redis.`);
  }
}

export function getStoreBackend(): StoreBackend {
  const raw = process.env.REEL_STORE;
  const explicit = pick(raw, ["memory", "file", "redis"] as const);
  if (raw && !explicit) {
    throw new Error(`Unknown REEL_STORE=${raw}. Supported: memory, file, redis`);
  }
  const selected = explicit ?? (getRunMode() === "split" ? "redis" : "memory");
  if (getRunMode() === "split" && selected !== "redis") {
    throw new Error("REEL_RUN_MODE=split requires REEL_STORE=redis.");
  }
  if (selected === "redis") {
    ensureRedisUrl("REEL_STORE");
  }
  return selected;
}

export function getQueueBackend(): QueueBackend {
  const raw = process.env.REEL_QUEUE;
  const explicit = pick(raw, ["memory", "redis"] as const);
  if (raw && !explicit) {
    throw new Error(`Unknown REEL_QUEUE=${raw}. Supported: memory, redis`);
  }
  const selected = explicit ?? (getRunMode() === "split" ? "redis" : "memory");
  if (getRunMode() === "split" && selected !== "redis") {
    throw new Error("REEL_RUN_MODE=split requires REEL_QUEUE=redis.");
  }
  if (selected === "redis") {
    ensureRedisUrl("REEL_QUEUE");
  }
  return selected;
}

export function getCacheIndexBackend(): CacheIndexBackend {
  const raw = process.env.REEL_CACHE_INDEX;
  const explicit = pick(raw, ["file", "redis"] as const);
  if (raw && !explicit) {
    throw new Error(`Unknown REEL_CACHE_INDEX=${raw}. Supported: file, redis`);
  }
  const selected = explicit ?? "file";
  if (selected === "redis") {
    ensureRedisUrl("REEL_CACHE_INDEX");
  }
  return selected;
}

export function isRedisEnabled() {
  return (
    getStoreBackend() === "redis" ||
    getQueueBackend() === "redis" ||
    getCacheIndexBackend() === "redis"
  );
}

function resolveDir(value: string | undefined, fallback: string) {
  const trimmed = value?.trim();
  return trimmed ? path.resolve(trimmed) : fallback;
}

export function getDataDir() {
  return resolveDir(process.env.REEL_DATA_DIR, path.resolve(process.cwd(), "data"));
}

export function getOutputDir() {
  return resolveDir(process.env.REEL_OUTPUT_DIR, path.join(getDataDir(), "output"));
}

export function getJobsDir() {
  return path.join(getDataDir(), "jobs");
}

export function getCacheDir() {
  return path.join(getDataDir(), "cache");
}

export function getBackgroundsDir() {
  return resolveDir(
    process.env.REEL_BACKGROUNDS_DIR,
    path.resolve(process.cwd(), "assets", "backgrounds")
  );
}

export function getFontsDir() {
  return resolveDir(process.env.REEL_FONTS_DIR, path.resolve(process.cwd(), "assets", "fonts"));
}

function toEven(value: number) {
  const rounded = Math.max(2, Math.round(value));
  return rounded % 2 === 0 ? rounded : rounded - 1;
}

export function getVideoConfig(): VideoConfig {
  return {
    width: toEven(parseEnvNumber(process.env.REEL_VIDEO_WIDTH, 1080)),
    height: toEven(parseEnvNumber(process.env.REEL_VIDEO_HEIGHT, 1920)),
    fps: Math.max(1, Math.round(parseEnvNumber(process.env.REEL_VIDEO_FPS, 30))),
    safeMargin: Math.max(0, parseEnvNumber(process.env.REEL_SAFE_MARGIN, 320))
  };
}

export function getJobTimeoutMs() {
  return Math.max(1000, parseEnvNumber(process.env.REEL_JOB_TIMEOUT_MS, 10 * 60 * 1000));
}

export function getJobMaxAgeMs() {
  return Math.max(0, parseEnvNumber(process.env.REEL_JOB_MAX_AGE_MS, 24 * 60 * 60 * 1000));
}

export function getSweepIntervalMs() {
  return Math.max(1000, parseEnvNumber(process.env.REEL_SWEEP_INTERVAL_MS, 10 * 60 * 1000));
}

export function getTtsProviderName(): TtsProviderName {
  const raw = process.env.REEL_TTS_PROVIDER;
  const selected = pick(raw, ["stub", "elevenlabs"] as const);
  if (raw && !selected) {
    throw new Error(`Unknown REEL_TTS_PROVIDER=${raw}. Supported: stub, elevenlabs`);
  }
  return selected ?? "stub";
}

export function getStoryProviderName(): StoryProviderName {
  const raw = process.env.REEL_STORY_PROVIDER;
  const selected = pick(raw, ["custom", "groq"] as const);
  if (raw && !selected) {
    throw new Error(`Unknown REEL_STORY_PROVIDER=${raw}. Supported: custom, groq`);
  }
  return selected ?? "custom";
}

export function getPort() {
  return parseEnvNumber(process.env.PORT, 4000);
}

export function isHttpLoggingEnabled() {
  return process.env.REEL_LOG_HTTP === "1";
}
