import type { Job } from "@reelsmith/shared";
import type { JobTracker } from "../jobs/jobTracker";
import { ProgressBridge } from "../jobs/progressBridge";
import { startSweeper } from "../jobs/sweeper";
import { getJobMaxAgeMs, getJobTimeoutMs, getSweepIntervalMs } from "../lib/config";
import {
  RenderCancelledError,
  RenderTimeoutError,
  abortReasonToError,
  errorMessage
} from "../lib/errors";
import type { RenderPipeline } from "../pipeline/renderVideo";
import type { JobQueue } from "../queue/jobQueue";
import type { JobControls } from "./jobControls";

export type WorkerDeps = {
  tracker: JobTracker;
  queue: JobQueue;
  pipeline: RenderPipeline;
  controls: JobControls;
};

export type WorkerOptions = {
  signal?: AbortSignal;
  jobTimeoutMs?: number;
  dequeueTimeoutSec?: number;
  /** Cleanup schedule; false leaves cleanup to another process. */
  sweep?: { intervalMs: number; maxAgeMs: number } | false;
};

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs one dequeued job. A job that is no longer pending (cancelled while
 * queued) is skipped. The job gets its own AbortController: cancellation
 * comes from `controls`, the wall-clock budget from a timer.
 */
export async function runJob(jobId: string, deps: WorkerDeps, options: { timeoutMs: number }): Promise<Job | null> {
  const job = await deps.tracker.get(jobId);
  if (!job) {
    console.warn(`[reel] job missing jobId=${jobId}`);
    return null;
  }
  if (job.status !== "pending") {
    console.log(`[reel] job skipped jobId=${jobId} status=${job.status}`);
    return job;
  }

  const controller = deps.controls.register(jobId);
  const timer = setTimeout(() => controller.abort(new RenderTimeoutError(options.timeoutMs)), options.timeoutMs);
  const bridge = new ProgressBridge(deps.tracker, jobId, controller.signal);
  try {
    const started = await deps.tracker.update(jobId, { status: "running", progress: 0, phase: "starting" });
    if (!started || started.status !== "running") {
      return started;
    }
    const result = await deps.pipeline.run(started, { bridge, signal: controller.signal });
    await bridge.flush();
    const finished = await deps.tracker.update(jobId, { status: "completed", phase: "done", result });
    console.log(`[reel] job completed jobId=${jobId} type=${job.type}`);
    return finished;
  } catch (err) {
    await bridge.flush();
    const reason = controller.signal.aborted ? abortReasonToError(controller.signal.reason) : err;
    if (reason instanceof RenderCancelledError) {
      console.log(`[reel] job cancelled jobId=${jobId}`);
      const current = await deps.tracker.get(jobId);
      if (current?.status === "cancelled") {
        return current;
      }
      return deps.tracker.update(jobId, { status: "cancelled", phase: "cancelled", error: reason.message });
    }
    const message = errorMessage(reason);
    console.warn(`[reel] job failed jobId=${jobId} error=${message}`);
    return deps.tracker.update(jobId, { status: "failed", phase: "failed", error: message });
  } finally {
    clearTimeout(timer);
    deps.controls.release(jobId);
  }
}

/** Dequeue loop; resolves once `options.signal` aborts and the current job settles. */
export async function startWorker(deps: WorkerDeps, options: WorkerOptions = {}) {
  const timeoutMs = options.jobTimeoutMs ?? getJobTimeoutMs();
  const dequeueTimeoutSec = options.dequeueTimeoutSec ?? (options.signal ? 2 : 30);
  const sweeper =
    options.sweep === false
      ? null
      : startSweeper(deps.tracker, options.sweep ?? { intervalMs: getSweepIntervalMs(), maxAgeMs: getJobMaxAgeMs() });
  let backoffMs = 1000;

  console.log(`[reel] worker listening queue=${deps.queue.backend} store=${deps.tracker.backend} timeoutMs=${timeoutMs}`);
  try {
    while (!options.signal?.aborted) {
      try {
        const jobId = await deps.queue.dequeue(dequeueTimeoutSec);
        if (!jobId) {
          backoffMs = 1000;
          continue;
        }
        console.log(`[reel] job picked jobId=${jobId}`);
        await runJob(jobId, deps, { timeoutMs });
        backoffMs = 1000;
      } catch (err) {
        console.error(`[reel] worker error error=${errorMessage(err)}`);
        await sleep(backoffMs);
        backoffMs = Math.min(backoffMs * 2, 10000);
      }
    }
  } finally {
    sweeper?.stop();
    console.log("[reel] worker stopped");
  }
}
