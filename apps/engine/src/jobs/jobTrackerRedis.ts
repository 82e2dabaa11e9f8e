import { JOB_STATUSES, type Job, type JobStatus } from "@reelsmith/shared";
import type { RedisCommands } from "../redis/client";
import { getInstanceId } from "../lib/config";
import { errorMessage } from "../lib/errors";
import { createStoredJobTracker, parseJobRecord, type JobRecordStore, type JobTracker } from "./jobTracker";

export function getJobKeyPrefix(instanceId = getInstanceId()) {
  return `reel:${instanceId}:jobs:`;
}

export function getJobIndexKey(instanceId = getInstanceId()) {
  return `reel:${instanceId}:jobs:index`;
}

export function getJobStatusKey(status: JobStatus, instanceId = getInstanceId()) {
  return `reel:${instanceId}:jobs:status:${status}`;
}

/** One JSON string per job plus an id index and one set per status. */
export function createRedisJobStore(redis: RedisCommands, instanceId = getInstanceId()): JobRecordStore {
  const jobKey = (id: string) => `${getJobKeyPrefix(instanceId)}${id}`;
  const indexKey = getJobIndexKey(instanceId);

  async function readJob(id: string): Promise<Job | null> {
    const raw = await redis.get(jobKey(id));
    if (!raw) {
      return null;
    }
    try {
      const job = parseJobRecord(JSON.parse(raw));
      if (!job) {
        console.warn(`[reel] redis job skipped jobId=${id} reason=invalid-record`);
      }
      return job;
    } catch (err) {
      console.warn(`[reel] redis job unreadable jobId=${id} error=${errorMessage(err)}`);
      return null;
    }
  }

  async function readMany(ids: string[]) {
    const jobs: Job[] = [];
    for (const id of ids) {
      const job = await readJob(id);
      if (job) {
        jobs.push(job);
      }
    }
    return jobs;
  }

  return {
    read: readJob,
    async write(job, previous) {
      await redis.set(jobKey(job.id), JSON.stringify(job));
      await redis.sadd(indexKey, job.id);
      if (previous && previous.status !== job.status) {
        await redis.srem(getJobStatusKey(previous.status, instanceId), job.id);
      }
      await redis.sadd(getJobStatusKey(job.status, instanceId), job.id);
    },
    async remove(job) {
      await redis.del(jobKey(job.id));
      await redis.srem(indexKey, job.id);
      for (const status of JOB_STATUSES) {
        await redis.srem(getJobStatusKey(status, instanceId), job.id);
      }
    },
    async list() {
      return readMany(await redis.smembers(indexKey));
    },
    async listActive() {
      const pending = await redis.smembers(getJobStatusKey("pending", instanceId));
      const running = await redis.smembers(getJobStatusKey("running", instanceId));
      return readMany([...new Set([...pending, ...running])]);
    }
  };
}

export function createRedisJobTracker(
  redis: RedisCommands,
  options: { instanceId?: string; now?: () => Date } = {}
): JobTracker {
  return createStoredJobTracker("redis", createRedisJobStore(redis, options.instanceId), options);
}
