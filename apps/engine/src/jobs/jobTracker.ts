import {
  ACTIVE_JOB_STATUSES,
  JOB_STATUSES,
  JOB_TYPES,
  TERMINAL_JOB_STATUSES,
  type Job,
  type JobMetadata,
  type JobPatch,
  type JobStatus,
  type JobType
} from "@reelsmith/shared";
import type { StoreBackend } from "../lib/config";
import { InputValidationError } from "../lib/errors";
import { KeyedMutex } from "./keyedMutex";

export const DEFAULT_RECENT_LIMIT = 50;

export interface JobTracker {
  readonly backend: StoreBackend;
  create(id: string, type: JobType, metadata?: JobMetadata): Promise<Job>;
  get(id: string): Promise<Job | null>;
  /** Null when the job does not exist. */
  update(id: string, patch: JobPatch): Promise<Job | null>;
  delete(id: string): Promise<boolean>;
  listActive(): Promise<Job[]>;
  listRecent(limit?: number): Promise<Job[]>;
  /** Deletes terminal jobs last updated before `now - maxAgeMs`; returns how many. */
  cleanup(maxAgeMs: number): Promise<number>;
}

/** Raw record storage a backend provides; state rules live in the tracker. */
export interface JobRecordStore {
  read(id: string): Promise<Job | null>;
  write(job: Job, previous: Job | null): Promise<void>;
  remove(job: Job): Promise<void>;
  list(): Promise<Job[]>;
  listActive?(): Promise<Job[]>;
}

export function isTerminalStatus(status: JobStatus) {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function isActiveStatus(status: JobStatus) {
  return ACTIVE_JOB_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus) {
  if (from === to) {
    return true;
  }
  if (isTerminalStatus(from)) {
    return false;
  }
  if (from === "running" && to === "pending") {
    return false;
  }
  return true;
}

export type PatchOutcome = {
  job: Job;
  applied: boolean;
  reason?: string;
};

function clampProgress(value: number) {
  return Math.min(100, Math.max(0, value));
}

/**
 * Forward-only merge. A status change out of a terminal state or back from
 * running to pending rejects the whole patch; progress never goes down and
 * completion pins it to 100.
 */
export function applyJobPatch(current: Job, patch: JobPatch, now: Date = new Date()): PatchOutcome {
  const status = patch.status ?? current.status;
  if (status !== current.status && !canTransition(current.status, status)) {
    return { job: current, applied: false, reason: `illegal transition ${current.status} -> ${status}` };
  }

  let progress = current.progress;
  if (patch.progress !== undefined && Number.isFinite(patch.progress)) {
    progress = Math.max(current.progress, clampProgress(patch.progress));
  }
  if (status === "completed") {
    progress = 100;
  }

  const next: Job = {
    ...current,
    status,
    progress,
    phase: patch.phase ?? current.phase,
    result: patch.result ?? current.result,
    metadata: patch.metadata ? { ...current.metadata, ...patch.metadata } : current.metadata,
    updatedAt: now.toISOString()
  };
  if ("error" in patch) {
    next.error = patch.error;
  }
  return { job: next, applied: true };
}

export function buildInitialJob(id: string, type: JobType, metadata: JobMetadata, now: Date): Job {
  const timestamp = now.toISOString();
  return {
    id,
    type,
    status: "pending",
    progress: 0,
    result: {},
    metadata,
    createdAt: timestamp,
    updatedAt: timestamp
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

function isJobType(value: unknown): value is JobType {
  return JOB_TYPES.some((type) => type === value);
}

/** Validates a stored record; null when it is not a job. */
export function parseJobRecord(value: unknown): Job | null {
  if (!isPlainObject(value)) {
    return null;
  }
  const { id, type, status, progress, phase, result, error, metadata, createdAt, updatedAt } = value;
  if (
    typeof id !== "string" ||
    !isJobType(type) ||
    !isJobStatus(status) ||
    typeof progress !== "number" ||
    !isPlainObject(result) ||
    !isPlainObject(metadata) ||
    typeof createdAt !== "string" ||
    typeof updatedAt !== "string"
  ) {
    return null;
  }
  return {
    id,
    type,
    status,
    progress,
    phase: typeof phase === "string" ? phase : undefined,
    result,
    error: typeof error === "string" ? error : undefined,
    metadata,
    createdAt,
    updatedAt
  };
}

function byCreatedAt(a: Job, b: Job) {
  return Date.parse(a.createdAt) - Date.parse(b.createdAt);
}

function byLatestUpdate(a: Job, b: Job) {
  return Date.parse(b.updatedAt) - Date.parse(a.updatedAt) || byCreatedAt(b, a);
}

/**
 * Tracker over any record store. Writes for one job id are serialized through
 * a keyed mutex so concurrent progress and status updates cannot interleave.
 */
export function createStoredJobTracker(
  backend: StoreBackend,
  store: JobRecordStore,
  options: { now?: () => Date } = {}
): JobTracker {
  const mutex = new KeyedMutex();
  const now = options.now ?? (() => new Date());

  return {
    backend,
    create(id, type, metadata = {}) {
      return mutex.run(id, async () => {
        if (await store.read(id)) {
          throw new InputValidationError(`Job ${id} already exists`, { jobId: id });
        }
        const job = buildInitialJob(id, type, metadata, now());
        await store.write(job, null);
        return job;
      });
    },
    get(id) {
      return store.read(id);
    },
    update(id, patch) {
      return mutex.run(id, async () => {
        const current = await store.read(id);
        if (!current) {
          return null;
        }
        const outcome = applyJobPatch(current, patch, now());
        if (!outcome.applied) {
          console.warn(`[reel] job update ignored jobId=${id} reason="${outcome.reason ?? "rejected"}"`);
          return current;
        }
        await store.write(outcome.job, current);
        return outcome.job;
      });
    },
    delete(id) {
      return mutex.run(id, async () => {
        const current = await store.read(id);
        if (!current) {
          return false;
        }
        await store.remove(current);
        return true;
      });
    },
    async listActive() {
      const jobs = store.listActive ? await store.listActive() : await store.list();
      return jobs.filter((job) => isActiveStatus(job.status)).sort(byCreatedAt);
    },
    async listRecent(limit = DEFAULT_RECENT_LIMIT) {
      const jobs = await store.list();
      return jobs.sort(byLatestUpdate).slice(0, Math.max(0, limit));
    },
    async cleanup(maxAgeMs) {
      const cutoff = now().getTime() - maxAgeMs;
      let removed = 0;
      for (const candidate of await store.list()) {
        const deleted = await mutex.run(candidate.id, async () => {
          const current = await store.read(candidate.id);
          if (!current || !isTerminalStatus(current.status) || Date.parse(current.updatedAt) >= cutoff) {
            return false;
          }
          await store.remove(current);
          return true;
        });
        if (deleted) {
          removed += 1;
        }
      }
      if (removed > 0) {
        console.log(`[reel] job cleanup removed=${removed} backend=${backend}`);
      }
      return removed;
    }
  };
}
