import { describe, expect, it } from "vitest";
import { createMemoryJobQueue } from "./jobQueueMemory";

describe("createMemoryJobQueue", () => {
  it("enqueues and dequeues job ids in order", async () => {
    const queue = createMemoryJobQueue();
    await queue.enqueue("job-1");
    await queue.enqueue("job-2");
    expect(await queue.dequeue(1)).toBe("job-1");
    expect(await queue.dequeue(1)).toBe("job-2");
  });

  it("hands an id straight to a waiting consumer", async () => {
    const queue = createMemoryJobQueue();
    const waiting = queue.dequeue(5);
    await queue.enqueue("job-3");
    expect(await waiting).toBe("job-3");
    expect(queue.size()).toBe(0);
  });

  it("times out and releases waiters on close", async () => {
    const queue = createMemoryJobQueue();
    expect(await queue.dequeue(0.01)).toBeNull();
    const waiting = queue.dequeue(30);
    await queue.close();
    expect(await waiting).toBeNull();
  });
});
