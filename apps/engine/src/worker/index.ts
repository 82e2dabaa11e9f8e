import "../lib/envBootstrap";
import { createEngine } from "../engine";
import { closeRedis } from "../redis/client";
import { isRedisEnabled } from "../lib/config";
import { startWorker } from "./runWorker";

export { startWorker };

async function main() {
  const engine = await createEngine();
  const shutdown = new AbortController();
  const stop = () => {
    console.log("[reel] worker shutting down");
    shutdown.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  await startWorker(engine, { signal: shutdown.signal });
  await engine.queue.close();
  if (isRedisEnabled()) {
    await closeRedis();
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[reel] worker failed to start", err);
    process.exit(1);
  });
}
