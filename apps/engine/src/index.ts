import "./lib/envBootstrap";
import express, { type NextFunction, type Request, type Response } from "express";
import type { HealthResponse } from "@reelsmith/shared";
import { createEngine, type Engine } from "./engine";
import { getBackgroundsDir, getInstanceId, getPort, getRunMode, isHttpLoggingEnabled } from "./lib/config";
import { ErrorCodes, toErrorResponse } from "./lib/errors";
import { assertBackgroundsAvailable } from "./render/background";
import { captionsRouter } from "./routes/captions";
import { createHealthRouter } from "./routes/health";
import { createJobsRouter } from "./routes/jobs";
import { startWorker } from "./worker/runWorker";

export type AppDeps = Pick<Engine, "tracker" | "queue" | "controls" | "requireText">;

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));
  if (isHttpLoggingEnabled()) {
    app.use((req, res, next) => {
      res.on("finish", () => {
        console.log(`[reel] http ${req.method} ${req.originalUrl} -> ${res.statusCode}`);
      });
      next();
    });
  }

  app.get("/health", (_req, res) => {
    const body: HealthResponse = { status: "ok" };
    res.json(body);
  });
  app.use("/v1", createHealthRouter(deps));
  app.use("/v1", captionsRouter);
  app.use("/v1/jobs", createJobsRouter(deps));

  app.use((req, res) => {
    res.status(404).json({ error: ErrorCodes.NOT_FOUND, message: `No route for ${req.method} ${req.path}` });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { statusCode, body } = toErrorResponse(err);
    if (statusCode >= 500) {
      console.error(`[reel] http ${req.method} ${req.originalUrl} failed error=${body.message}`);
    }
    res.status(statusCode).json(body);
  });

  return app;
}

/**
 * Boots the HTTP service. Missing background clips stop startup. With
 * `inlineWorker` the dequeue loop runs in this process, which a memory queue
 * requires.
 */
export async function startServer(options: { port?: number; inlineWorker?: boolean } = {}) {
  const backgrounds = await assertBackgroundsAvailable(getBackgroundsDir());
  const engine = await createEngine();
  const app = createApp(engine);
  const port = options.port ?? getPort();
  const mode = getRunMode();
  const inlineWorker = options.inlineWorker ?? (mode === "solo" || engine.queue.backend === "memory");

  const server = app.listen(port, () => {
    console.log(
      `[reel] listening port=${port} mode=${mode} store=${engine.tracker.backend} queue=${engine.queue.backend} instanceId=${getInstanceId()} backgrounds=${backgrounds}`
    );
  });

  if (inlineWorker) {
    console.log("[reel] inline-worker starting");
    startWorker(engine).catch((err) => {
      const message = err instanceof Error ? err.stack ?? err.message : String(err);
      console.error(`[reel] inline-worker crashed ${message}`);
    });
  }
  return { app, server, engine };
}

if (process.env.NODE_ENV !== "test" && require.main === module) {
  startServer().catch((err) => {
    console.error("[reel] server failed to start", err);
    process.exit(1);
  });
}
