export type ProbeResult = {
  durationSec: number;
  width: number | null;
  height: number | null;
  hasVideo: boolean;
  hasAudio: boolean;
};

export type RunOptions = {
  signal?: AbortSignal;
  /** Expected output length; enables `onProgress`. */
  durationSec?: number;
  /** Fraction of `durationSec` encoded so far, in [0, 1]. */
  onProgress?: (fraction: number) => void;
  timeoutMs?: number;
};

/**
 * Process-level contract with the encoder: argv in, file out. The last
 * argument of `run` is always the output path.
 */
export interface MediaBackend {
  name: string;
  run(args: string[], options?: RunOptions): Promise<void>;
  probe(filePath: string, options?: { signal?: AbortSignal }): Promise<ProbeResult>;
}
