import { promises as fs } from "node:fs";
import type { MediaBackend, ProbeResult, RunOptions } from "../mediaBackend";
import { RenderError, abortReasonToError } from "../../lib/errors";

export type FakeMediaBackend = MediaBackend & {
  runs: Array<{ args: string[]; options: RunOptions }>;
  probes: Map<string, Partial<ProbeResult>>;
  /** Probe result for paths with no entry in `probes`. */
  defaultProbe: ProbeResult;
  failNextRun: (message: string) => void;
  holdRuns: () => () => void;
};

/**
 * Writes a placeholder file for every run and answers probes from a table,
 * so render code can be exercised without an encoder.
 */
export function createFakeMediaBackend(defaults: Partial<ProbeResult> = {}): FakeMediaBackend {
  const runs: FakeMediaBackend["runs"] = [];
  const probes = new Map<string, Partial<ProbeResult>>();
  let failure: string | null = null;
  let gate: Promise<void> | null = null;

  const backend: FakeMediaBackend = {
    name: "fake",
    runs,
    probes,
    defaultProbe: {
      durationSec: 10,
      width: 1080,
      height: 1920,
      hasVideo: true,
      hasAudio: true,
      ...defaults
    },
    failNextRun(message) {
      failure = message;
    },
    holdRuns() {
      let release: () => void = () => undefined;
      gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      return () => {
        gate = null;
        release();
      };
    },
    async run(args, options = {}) {
      runs.push({ args, options });
      if (options.signal?.aborted) {
        throw abortReasonToError(options.signal.reason);
      }
      options.onProgress?.(0.5);
      if (gate) {
        const signal = options.signal;
        let onAbort: () => void = () => undefined;
        const aborted = new Promise<never>((_, reject) => {
          onAbort = () => reject(abortReasonToError(signal?.reason));
          signal?.addEventListener("abort", onAbort, { once: true });
        });
        try {
          await Promise.race([gate, aborted]);
        } finally {
          signal?.removeEventListener("abort", onAbort);
        }
      }
      if (failure) {
        const message = failure;
        failure = null;
        throw new RenderError(message);
      }
      const outPath = args[args.length - 1];
      await fs.writeFile(outPath, `fake-media:${runs.length}`);
      options.onProgress?.(1);
    },
    async probe(filePath) {
      return { ...backend.defaultProbe, ...(probes.get(filePath) ?? {}) };
    }
  };
  return backend;
}
