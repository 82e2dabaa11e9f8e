import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMemoryJobTracker } from "../jobs/jobTrackerMemory";
import { RenderCancelledError, abortReasonToError } from "../lib/errors";
import type { RenderPipeline } from "../pipeline/renderVideo";
import { createMemoryJobQueue } from "../queue/jobQueueMemory";
import { JobControls } from "./jobControls";
import { runJob, startWorker, type WorkerDeps } from "./runWorker";

function waitForAbort(): RenderPipeline {
  return {
    run: (_job, context) =>
      new Promise((_, reject) => {
        const signal = context.signal;
        signal?.addEventListener("abort", () => reject(abortReasonToError(signal.reason)), { once: true });
      })
  };
}

describe("worker", () => {
  let deps: WorkerDeps;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    deps = {
      tracker: createMemoryJobTracker(),
      queue: createMemoryJobQueue(),
      controls: new JobControls(),
      pipeline: {
        run: async (_job, context) => {
          context.bridge.stage("compose")(0.5);
          return { videoPath: "/out/video.mp4" };
        }
      }
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs a pending job to completion", async () => {
    await deps.tracker.create("j1", "video");
    const job = await runJob("j1", deps, { timeoutMs: 1000 });
    expect(job).toMatchObject({ status: "completed", progress: 100, phase: "done", result: { videoPath: "/out/video.mp4" } });
    expect(deps.controls.size).toBe(0);
  });

  it("records pipeline failures on the job", async () => {
    deps.pipeline = {
      run: async () => {
        throw new Error("encoder crashed");
      }
    };
    await deps.tracker.create("j1", "video");
    const job = await runJob("j1", deps, { timeoutMs: 1000 });
    expect(job).toMatchObject({ status: "failed", error: "encoder crashed", phase: "failed" });
  });

  it("fails a job that runs past its time budget", async () => {
    deps.pipeline = waitForAbort();
    await deps.tracker.create("j1", "video");
    const job = await runJob("j1", deps, { timeoutMs: 20 });
    expect(job).toMatchObject({ status: "failed", error: "Job timed out after 20ms" });
  });

  it("stops a running job when it is cancelled", async () => {
    deps.pipeline = waitForAbort();
    await deps.tracker.create("j1", "video");
    const pending = runJob("j1", deps, { timeoutMs: 5000 });
    await vi.waitFor(() => expect(deps.controls.has("j1")).toBe(true));

    await deps.tracker.update("j1", { status: "cancelled" });
    expect(deps.controls.abort("j1", new RenderCancelledError())).toBe(true);

    const job = await pending;
    expect(job?.status).toBe("cancelled");
    expect(deps.controls.has("j1")).toBe(false);
  });

  it("skips jobs that were cancelled while queued and ignores unknown ids", async () => {
    const run = vi.fn(deps.pipeline.run);
    deps.pipeline = { run };
    await deps.tracker.create("j1", "video");
    await deps.tracker.update("j1", { status: "cancelled" });

    expect((await runJob("j1", deps, { timeoutMs: 1000 }))?.status).toBe("cancelled");
    expect(await runJob("ghost", deps, { timeoutMs: 1000 })).toBeNull();
    expect(run).not.toHaveBeenCalled();
  });

  it("drains the queue until stopped", async () => {
    await deps.tracker.create("a", "video");
    await deps.tracker.create("b", "audio");
    await deps.queue.enqueue("a");
    await deps.queue.enqueue("b");

    const stop = new AbortController();
    const loop = startWorker(deps, { signal: stop.signal, dequeueTimeoutSec: 0.05, sweep: false, jobTimeoutMs: 1000 });
    await vi.waitFor(async () => {
      expect((await deps.tracker.get("b"))?.status).toBe("completed");
    });
    stop.abort();
    await loop;

    expect((await deps.tracker.get("a"))?.status).toBe("completed");
    expect(await deps.tracker.listActive()).toEqual([]);
  });
});
