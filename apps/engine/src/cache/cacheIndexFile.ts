import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { KeyedMutex } from "../jobs/keyedMutex";
import { errorMessage } from "../lib/errors";
import {
  fromIndexRecord,
  toIndexRecord,
  type CacheEntry,
  type CacheIndex,
  type CacheIndexRecord
} from "./cacheIndex";

type LogLine =
  | { op: "set"; key: string; entry: CacheIndexRecord }
  | { op: "del"; key: string };

const SNAPSHOT_FILE = "index.json";
const LOG_FILE = "index.log";
const DEFAULT_COMPACT_EVERY = 500;

async function readOptional(filePath: string) {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Cache index kept as a JSON snapshot plus an append-only mutation log.
 * Every mutation is one appended line; the snapshot is rewritten (temp file +
 * rename) on open and every `compactEvery` mutations, after which the log is
 * truncated. Replaying the log over a newer snapshot is harmless.
 */
export class FileCacheIndex implements CacheIndex {
  private readonly entriesByKey = new Map<string, CacheEntry>();
  private readonly lock = new KeyedMutex();
  private mutationsSinceCompact = 0;

  private constructor(
    readonly dir: string,
    private readonly compactEvery: number
  ) {}

  static async open(dir: string, options: { compactEvery?: number } = {}) {
    const index = new FileCacheIndex(dir, Math.max(1, options.compactEvery ?? DEFAULT_COMPACT_EVERY));
    await fs.mkdir(dir, { recursive: true });
    await index.load();
    await index.compact();
    return index;
  }

  get snapshotPath() {
    return path.join(this.dir, SNAPSHOT_FILE);
  }

  get logPath() {
    return path.join(this.dir, LOG_FILE);
  }

  async get(key: string) {
    return this.entriesByKey.get(key) ?? null;
  }

  async entries() {
    return [...this.entriesByKey.values()];
  }

  async set(entry: CacheEntry) {
    await this.mutate({ op: "set", key: entry.key, entry: toIndexRecord(entry) }, () => {
      this.entriesByKey.set(entry.key, entry);
    });
  }

  async delete(key: string) {
    if (!this.entriesByKey.has(key)) {
      return;
    }
    await this.mutate({ op: "del", key }, () => {
      this.entriesByKey.delete(key);
    });
  }

  async compact() {
    await this.lock.run("index", () => this.compactLocked());
  }

  private async mutate(line: LogLine, apply: () => void) {
    await this.lock.run("index", async () => {
      await fs.appendFile(this.logPath, `${JSON.stringify(line)}\n`, "utf8");
      apply();
      this.mutationsSinceCompact += 1;
      if (this.mutationsSinceCompact >= this.compactEvery) {
        await this.compactLocked();
      }
    });
  }

  private async compactLocked() {
    const snapshot: Record<string, CacheIndexRecord> = {};
    for (const entry of this.entriesByKey.values()) {
      snapshot[entry.key] = toIndexRecord(entry);
    }
    const tempPath = path.join(this.dir, `.tmp-${randomUUID()}-${SNAPSHOT_FILE}`);
    try {
      await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2), "utf8");
      await fs.rename(tempPath, this.snapshotPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }
    await fs.writeFile(this.logPath, "", "utf8");
    this.mutationsSinceCompact = 0;
  }

  private async load() {
    const rawSnapshot = await readOptional(this.snapshotPath);
    if (rawSnapshot) {
      try {
        const parsed: unknown = JSON.parse(rawSnapshot);
        if (parsed && typeof parsed === "object") {
          for (const [key, value] of Object.entries(parsed)) {
            const entry = fromIndexRecord(key, value);
            if (entry) {
              this.entriesByKey.set(key, entry);
            }
          }
        }
      } catch (err) {
        console.warn(`[reel] cache index snapshot unreadable path=${this.snapshotPath} error=${errorMessage(err)}`);
      }
    }

    const rawLog = await readOptional(this.logPath);
    if (!rawLog) {
      return;
    }
    let skipped = 0;
    for (const raw of rawLog.split("\n")) {
      if (!raw.trim()) {
        continue;
      }
      try {
        const line: unknown = JSON.parse(raw);
        if (!this.replay(line)) {
          skipped += 1;
        }
      } catch {
        skipped += 1;
      }
    }
    if (skipped > 0) {
      console.warn(`[reel] cache index log skipped=${skipped} path=${this.logPath}`);
    }
  }

  private replay(line: unknown) {
    if (!line || typeof line !== "object") {
      return false;
    }
    const op: unknown = Reflect.get(line, "op");
    const key: unknown = Reflect.get(line, "key");
    if (typeof key !== "string") {
      return false;
    }
    if (op === "del") {
      this.entriesByKey.delete(key);
      return true;
    }
    if (op === "set") {
      const entry = fromIndexRecord(key, Reflect.get(line, "entry"));
      if (!entry) {
        return false;
      }
      this.entriesByKey.set(key, entry);
      return true;
    }
    return false;
  }
}
