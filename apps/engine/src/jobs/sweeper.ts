import { errorMessage } from "../lib/errors";
import type { JobTracker } from "./jobTracker";

export type Sweeper = {
  /** Runs one pass now; resolves to the number of jobs removed. */
  sweep: () => Promise<number>;
  stop: () => void;
};

/** One interval task removing terminal jobs older than `maxAgeMs`. */
export function startSweeper(
  tracker: JobTracker,
  options: { intervalMs: number; maxAgeMs: number }
): Sweeper {
  let sweeping: Promise<number> | null = null;

  const sweep = () => {
    if (!sweeping) {
      sweeping = tracker.cleanup(options.maxAgeMs).finally(() => {
        sweeping = null;
      });
    }
    return sweeping;
  };

  const timer = setInterval(() => {
    sweep().catch((err) => {
      console.warn(`[reel] job sweep failed error=${errorMessage(err)}`);
    });
  }, options.intervalMs);
  timer.unref();

  return {
    sweep,
    stop: () => clearInterval(timer)
  };
}
