import type IORedis from "ioredis";
import { getInstanceId, getQueueBackend, type QueueBackend } from "../lib/config";
import { createMemoryJobQueue } from "./jobQueueMemory";

export interface JobQueue {
  readonly backend: QueueBackend;
  enqueue(jobId: string): Promise<void>;
  /** Waits up to `timeoutSeconds` for the next id; null on timeout or close. */
  dequeue(timeoutSeconds?: number): Promise<string | null>;
  close(): Promise<void>;
}

export function getQueueKey(instanceId = getInstanceId()) {
  return `reel:${instanceId}:queue:jobs`;
}

/**
 * Redis list queue. Blocking pops run on a duplicated connection so they never
 * stall commands issued on the shared client.
 */
export function createRedisJobQueue(redis: IORedis, instanceId = getInstanceId()): JobQueue {
  const key = getQueueKey(instanceId);
  let blocking: IORedis | null = null;

  return {
    backend: "redis",
    async enqueue(jobId) {
      await redis.rpush(key, jobId);
    },
    async dequeue(timeoutSeconds = 30) {
      if (!blocking) {
        blocking = redis.duplicate();
      }
      const result = await blocking.blpop(key, timeoutSeconds);
      if (!result) {
        return null;
      }
      return result[1] ?? null;
    },
    async close() {
      if (!blocking) {
        return;
      }
      const current = blocking;
      blocking = null;
      current.disconnect();
    }
  };
}

let queue: JobQueue | null = null;

export async function getJobQueue(): Promise<JobQueue> {
  if (!queue) {
    if (getQueueBackend() === "redis") {
      const { getRedis } = await import("../redis/client");
      queue = createRedisJobQueue(getRedis());
    } else {
      queue = createMemoryJobQueue();
    }
    console.log(`[reel] job queue backend=${queue.backend}`);
  }
  return queue;
}
