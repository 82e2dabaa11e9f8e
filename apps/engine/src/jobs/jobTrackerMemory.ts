import type { Job } from "@reelsmith/shared";
import { createStoredJobTracker, type JobRecordStore, type JobTracker } from "./jobTracker";

export function createMemoryJobStore(): JobRecordStore & { size: () => number } {
  const jobs = new Map<string, Job>();
  return {
    async read(id) {
      const job = jobs.get(id);
      return job ? { ...job } : null;
    },
    async write(job) {
      jobs.set(job.id, { ...job });
    },
    async remove(job) {
      jobs.delete(job.id);
    },
    async list() {
      return Array.from(jobs.values(), (job) => ({ ...job }));
    },
    size: () => jobs.size
  };
}

export function createMemoryJobTracker(options: { now?: () => Date } = {}): JobTracker {
  return createStoredJobTracker("memory", createMemoryJobStore(), options);
}
