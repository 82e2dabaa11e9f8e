import { Router } from "express";
import type { JobTracker } from "../jobs/jobTracker";
import { getInstanceId, getRunMode, getStartedAt, isRedisEnabled } from "../lib/config";
import { listGenres, listVoices } from "../lib/genres";
import type { JobQueue } from "../queue/jobQueue";
import type { JobControls } from "../worker/jobControls";
import { asyncHandler } from "./asyncHandler";

async function pingRedis(timeoutMs = 500) {
  const { getRedis } = await import("../redis/client");
  const redis = getRedis();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  const ping = redis
    .ping()
    .then(() => true)
    .catch(() => false);
  try {
    return await Promise.race([ping, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createHealthRouter(deps: { tracker: JobTracker; queue: JobQueue; controls: JobControls }) {
  const router = Router();

  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const redisOk = isRedisEnabled() ? await pingRedis() : null;
      res.json({
        ok: true,
        redisOk,
        mode: getRunMode(),
        store: deps.tracker.backend,
        queue: deps.queue.backend,
        version: process.env.APP_VERSION ?? "dev",
        instanceId: getInstanceId(),
        startedAt: getStartedAt(),
        runningJobs: deps.controls.size,
        genres: listGenres(),
        voices: listVoices()
      });
    })
  );

  return router;
}
