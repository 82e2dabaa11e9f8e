import { abortReasonToError, errorMessage } from "../lib/errors";
import type { JobTracker } from "./jobTracker";

export const RENDER_STAGES = {
  audio: [0, 20],
  captions: [20, 25],
  background: [25, 30],
  compose: [30, 95],
  metadata: [95, 100]
} as const satisfies Record<string, readonly [number, number]>;

export type RenderStage = keyof typeof RENDER_STAGES;

type ProgressEvent = { progress: number; phase?: string };

/**
 * Carries render progress into the tracker without making the render wait on
 * storage. `report` only fills a one-slot mailbox (newer events replace unsent
 * ones); a single drain task writes the latest event.
 */
export class ProgressBridge {
  private mailbox: ProgressEvent | null = null;
  private draining: Promise<void> | null = null;
  private lastProgress = -1;
  private lastPhase: string | undefined;
  private window: readonly [number, number] = [0, 100];

  constructor(
    private readonly tracker: JobTracker,
    readonly jobId: string,
    private readonly signal?: AbortSignal
  ) {}

  /** Throws the abort reason when the job was cancelled or timed out. */
  checkpoint() {
    if (this.signal?.aborted) {
      throw abortReasonToError(this.signal.reason);
    }
  }

  report(pct: number, phase?: string) {
    this.checkpoint();
    if (!Number.isFinite(pct)) {
      return;
    }
    const progress = Math.round(Math.min(100, Math.max(0, pct)) * 10) / 10;
    const phaseChanged = phase !== undefined && phase !== this.lastPhase;
    if (progress <= this.lastProgress && !phaseChanged) {
      return;
    }
    this.lastProgress = Math.max(this.lastProgress, progress);
    this.lastPhase = phase ?? this.lastPhase;
    this.mailbox = { progress: this.lastProgress, phase: this.lastPhase };
    this.startDrain();
  }

  /** Maps later stage reports into `[from, to]`, so several renders can share one job. */
  setWindow(from: number, to: number) {
    this.window = [from, to];
  }

  /** Reports the start of a stage and returns a reporter for fractions of it. */
  stage(name: RenderStage): (fraction: number) => void {
    const [low, high] = this.window;
    const scale = (pct: number) => low + ((high - low) * pct) / 100;
    const from = scale(RENDER_STAGES[name][0]);
    const to = scale(RENDER_STAGES[name][1]);
    this.report(from, name);
    return (fraction) => {
      const bounded = Math.min(1, Math.max(0, fraction));
      this.report(from + (to - from) * bounded, name);
    };
  }

  async flush() {
    while (this.draining) {
      await this.draining;
    }
  }

  private startDrain() {
    if (this.draining) {
      return;
    }
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.mailbox) {
        this.startDrain();
      }
    });
  }

  private async drain() {
    while (this.mailbox) {
      const event = this.mailbox;
      this.mailbox = null;
      try {
        await this.tracker.update(this.jobId, { status: "running", progress: event.progress, phase: event.phase });
      } catch (err) {
        console.warn(`[reel] progress write failed jobId=${this.jobId} error=${errorMessage(err)}`);
      }
    }
  }
}
