import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { Router, type Response } from "express";
import JSZip from "jszip";
import type { CreateJobResponse, Job, JobResult } from "@reelsmith/shared";
import type { JobTracker } from "../jobs/jobTracker";
import { DEFAULT_RECENT_LIMIT, isTerminalStatus } from "../jobs/jobTracker";
import { ErrorCodes, InputValidationError, MissingAssetError, RenderCancelledError } from "../lib/errors";
import { parseJobRequest } from "../pipeline/validate";
import type { JobQueue } from "../queue/jobQueue";
import type { JobControls } from "../worker/jobControls";
import { asyncHandler } from "./asyncHandler";

export const MAX_LIST_LIMIT = 500;
const BUNDLED_FIELDS = ["videoPath", "subtitlePath", "metadataPath"] as const;

export type JobsRouterDeps = {
  tracker: JobTracker;
  queue: JobQueue;
  controls: JobControls;
  requireText: boolean;
};

function notFound(res: Response, id: string) {
  res.status(404).json({ error: ErrorCodes.NOT_FOUND, message: `Job ${id} not found` });
}

function parseLimit(raw: unknown) {
  if (raw === undefined) {
    return DEFAULT_RECENT_LIMIT;
  }
  const limit = typeof raw === "string" ? Number(raw) : Number.NaN;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw new InputValidationError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
  }
  return limit;
}

/** Output files of a finished job: one render, or every render of a batch. */
export function bundleFiles(result: JobResult): string[] {
  const nested: unknown[] = Array.isArray(result.videos) ? result.videos : [];
  const records: unknown[] = [result, ...nested];
  const files: string[] = [];
  for (const record of records) {
    if (typeof record !== "object" || record === null) {
      continue;
    }
    for (const field of BUNDLED_FIELDS) {
      const value: unknown = Reflect.get(record, field);
      if (typeof value === "string" && value && !files.includes(value)) {
        files.push(value);
      }
    }
  }
  return files;
}

async function buildBundle(job: Job) {
  const zip = new JSZip();
  for (const file of bundleFiles(job.result)) {
    let contents: Buffer;
    try {
      contents = await fs.readFile(file);
    } catch {
      throw new MissingAssetError(`Job output is missing: ${path.basename(file)}`, { jobId: job.id });
    }
    zip.file(path.basename(file), contents);
  }
  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}

export function createJobsRouter(deps: JobsRouterDeps) {
  const router = Router();

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const request = parseJobRequest(req.body, { requireText: deps.requireText });
      const jobId = randomUUID();
      const job = await deps.tracker.create(jobId, request.type, { request });
      await deps.queue.enqueue(jobId);
      console.log(`[reel] job enqueued jobId=${jobId} type=${request.type} genre=${request.genre}`);
      const body: CreateJobResponse = { jobId, status: job.status };
      res.status(202).json(body);
    })
  );

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      res.json({ jobs: await deps.tracker.listRecent(parseLimit(req.query.limit)) });
    })
  );

  router.get(
    "/active",
    asyncHandler(async (_req, res) => {
      res.json({ jobs: await deps.tracker.listActive() });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const job = await deps.tracker.get(req.params.id);
      if (!job) {
        notFound(res, req.params.id);
        return;
      }
      res.json(job);
    })
  );

  router.delete(
    "/:id",
    asyncHandler(async (req, res) => {
      const id = req.params.id;
      const job = await deps.tracker.get(id);
      if (!job) {
        notFound(res, id);
        return;
      }
      if (isTerminalStatus(job.status)) {
        res.json(job);
        return;
      }
      const reason = new RenderCancelledError();
      const cancelled = await deps.tracker.update(id, { status: "cancelled", phase: "cancelled", error: reason.message });
      const aborted = deps.controls.abort(id, reason);
      console.log(`[reel] job cancel requested jobId=${id} running=${aborted}`);
      res.json(cancelled ?? job);
    })
  );

  router.get(
    "/:id/bundle.zip",
    asyncHandler(async (req, res) => {
      const job = await deps.tracker.get(req.params.id);
      if (!job) {
        notFound(res, req.params.id);
        return;
      }
      if (job.status !== "completed") {
        res.status(409).json({ error: "not_ready", message: `Job ${job.id} is ${job.status}` });
        return;
      }
      const bundle = await buildBundle(job);
      res.setHeader("Content-Type", "application/zip");
      res.setHeader("Content-Disposition", `attachment; filename="${job.id}.zip"`);
      res.send(bundle);
    })
  );

  return router;
}
