import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ReelError, RenderCancelledError, toErrorResponse, withRetry } from "./errors";

const busy = () => new ReelError("upstream busy", "provider_failed", 503, true);

describe("withRetry", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("retries retryable failures until one succeeds", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(busy()).mockResolvedValueOnce("ok");
    await expect(withRetry(fn, { initialDelayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("gives up on errors that are not retryable", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("bad request"));
    await expect(withRetry(fn, { initialDelayMs: 1 })).rejects.toThrow("bad request");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops waiting between attempts once the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async (): Promise<string> => {
      setTimeout(() => controller.abort(new RenderCancelledError()), 10);
      throw busy();
    });
    const started = Date.now();
    await expect(
      withRetry(fn, { initialDelayMs: 60_000, maxDelayMs: 60_000, signal: controller.signal })
    ).rejects.toBeInstanceOf(RenderCancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});

describe("toErrorResponse", () => {
  it("maps reel errors to their status and code", () => {
    expect(toErrorResponse(new RenderCancelledError())).toEqual({
      statusCode: 409,
      body: { error: "render_cancelled", message: "Job was cancelled", details: undefined }
    });
  });

  it("maps anything else to an internal error", () => {
    expect(toErrorResponse(new Error("boom"))).toEqual({
      statusCode: 500,
      body: { error: "internal_error", message: "boom" }
    });
  });
});
