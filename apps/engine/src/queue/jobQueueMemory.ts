import type { JobQueue } from "./jobQueue";

type Waiter = (jobId: string | null) => void;

/** In-process FIFO; a waiting dequeue is handed the next id directly. */
export function createMemoryJobQueue(): JobQueue & { size: () => number } {
  const queue: string[] = [];
  const waiters: Waiter[] = [];

  return {
    backend: "memory",
    size: () => queue.length,
    async enqueue(jobId: string) {
      const waiter = waiters.shift();
      if (waiter) {
        waiter(jobId);
        return;
      }
      queue.push(jobId);
    },
    async dequeue(timeoutSeconds = 30): Promise<string | null> {
      if (queue.length > 0) {
        return queue.shift() ?? null;
      }
      return new Promise((resolve) => {
        let settled = false;
        const timer = setTimeout(() => {
          if (settled) {
            return;
          }
          settled = true;
          const index = waiters.indexOf(waiter);
          if (index >= 0) {
            waiters.splice(index, 1);
          }
          resolve(null);
        }, timeoutSeconds * 1000);

        const waiter: Waiter = (jobId) => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timer);
          resolve(jobId);
        };

        waiters.push(waiter);
      });
    },
    async close() {
      for (const waiter of waiters.splice(0)) {
        waiter(null);
      }
      queue.length = 0;
    }
  };
}
