import { getJobsDir, getStoreBackend, type StoreBackend } from "../lib/config";
import { getRedisCommands, type RedisCommands } from "../redis/client";
import type { JobTracker } from "./jobTracker";
import { createFileJobTracker } from "./jobTrackerFile";
import { createMemoryJobTracker } from "./jobTrackerMemory";
import { createRedisJobTracker } from "./jobTrackerRedis";

export type JobTrackerOptions = {
  dir?: string;
  redis?: RedisCommands;
  instanceId?: string;
  now?: () => Date;
};

export function createJobTracker(backend: StoreBackend, options: JobTrackerOptions = {}): JobTracker {
  if (backend === "redis") {
    return createRedisJobTracker(options.redis ?? getRedisCommands(), options);
  }
  if (backend === "file") {
    return createFileJobTracker(options.dir ?? getJobsDir(), options);
  }
  return createMemoryJobTracker(options);
}

let tracker: JobTracker | null = null;

/** The tracker for the configured backend, shared by one process's entrypoints. */
export function getJobTracker(): JobTracker {
  if (!tracker) {
    tracker = createJobTracker(getStoreBackend());
    console.log(`[reel] job tracker backend=${tracker.backend}`);
  }
  return tracker;
}
