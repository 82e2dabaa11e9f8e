import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import type { Job } from "@reelsmith/shared";
import { InputValidationError, errorMessage } from "../lib/errors";
import { createStoredJobTracker, parseJobRecord, type JobRecordStore, type JobTracker } from "./jobTracker";

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

function isMissing(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** One `<id>.json` per job, replaced atomically through a temp file. */
export function createFileJobStore(dir: string): JobRecordStore {
  const jobPath = (id: string) => path.join(dir, `${id}.json`);

  async function readFile(filePath: string): Promise<Job | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (isMissing(err)) {
        return null;
      }
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.warn(`[reel] job file unreadable path=${filePath} error=${errorMessage(err)}`);
      return null;
    }
    const job = parseJobRecord(parsed);
    if (!job) {
      console.warn(`[reel] job file skipped path=${filePath} reason=invalid-record`);
    }
    return job;
  }

  return {
    async read(id) {
      if (!SAFE_ID.test(id)) {
        return null;
      }
      return readFile(jobPath(id));
    },
    async write(job) {
      if (!SAFE_ID.test(job.id)) {
        throw new InputValidationError(`Job id contains unsupported characters: ${job.id}`);
      }
      await fs.mkdir(dir, { recursive: true });
      const tempPath = path.join(dir, `.tmp-${randomUUID()}-${job.id}.json`);
      await fs.writeFile(tempPath, JSON.stringify(job, null, 2), "utf8");
      await fs.rename(tempPath, jobPath(job.id));
    },
    async remove(job) {
      await fs.rm(jobPath(job.id), { force: true });
    },
    async list() {
      let names: string[];
      try {
        names = await fs.readdir(dir);
      } catch (err) {
        if (isMissing(err)) {
          return [];
        }
        throw err;
      }
      const jobs: Job[] = [];
      for (const name of names) {
        if (!name.endsWith(".json") || name.startsWith(".tmp-")) {
          continue;
        }
        const job = await readFile(path.join(dir, name));
        if (job) {
          jobs.push(job);
        }
      }
      return jobs;
    }
  };
}

export function createFileJobTracker(dir: string, options: { now?: () => Date } = {}): JobTracker {
  return createStoredJobTracker("file", createFileJobStore(dir), options);
}
