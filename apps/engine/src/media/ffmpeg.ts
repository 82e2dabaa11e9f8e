import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { RenderError, abortReasonToError } from "../lib/errors";
import type { MediaBackend, ProbeResult, RunOptions } from "./mediaBackend";

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const STDERR_TAIL_LINES = 4;

type BinaryResolution = { kind: "env" | "path"; path: string };

const loggedBinaries = new Set<string>();

function resolveBinary(envName: "REEL_FFMPEG_PATH" | "REEL_FFPROBE_PATH", fallback: string): BinaryResolution {
  const envPath = process.env[envName]?.trim();
  const resolution: BinaryResolution =
    envPath && existsSync(envPath) ? { kind: "env", path: envPath } : { kind: "path", path: fallback };
  if (!loggedBinaries.has(fallback)) {
    loggedBinaries.add(fallback);
    const reason = envPath && resolution.kind === "path" ? ` reason=${envName}-missing` : "";
    console.log(`[reel] ${fallback}=${resolution.kind} path=${resolution.path}${reason}`);
  }
  return resolution;
}

export function resolveFfmpegPath() {
  return resolveBinary("REEL_FFMPEG_PATH", "ffmpeg").path;
}

export function resolveFfprobePath() {
  return resolveBinary("REEL_FFPROBE_PATH", "ffprobe").path;
}

/** Returns seconds of output written, "end", or null for lines that carry no position. */
export function parseProgressLine(line: string): number | "end" | null {
  const [rawKey, rawValue] = line.trim().split("=", 2);
  if (rawValue === undefined) {
    return null;
  }
  if (rawKey === "progress") {
    return rawValue === "end" ? "end" : null;
  }
  if (rawKey === "out_time_us" || rawKey === "out_time_ms") {
    const micros = Number(rawValue);
    return Number.isFinite(micros) && micros >= 0 ? micros / 1_000_000 : null;
  }
  return null;
}

function readNumber(value: unknown): number | null {
  const parsed = typeof value === "string" ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : null;
}

export function parseProbeOutput(raw: string): ProbeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new RenderError("ffprobe returned invalid JSON");
  }
  if (!parsed || typeof parsed !== "object") {
    throw new RenderError("ffprobe returned no data");
  }
  const format: unknown = Reflect.get(parsed, "format");
  const streamsValue: unknown = Reflect.get(parsed, "streams");
  const streams: object[] = Array.isArray(streamsValue)
    ? streamsValue.filter((item): item is object => Boolean(item) && typeof item === "object")
    : [];

  const video = streams.find((stream) => Reflect.get(stream, "codec_type") === "video");
  const audio = streams.find((stream) => Reflect.get(stream, "codec_type") === "audio");
  const streamDurations = streams
    .map((stream) => readNumber(Reflect.get(stream, "duration")))
    .filter((value): value is number => value !== null);
  const formatDuration =
    format && typeof format === "object" ? readNumber(Reflect.get(format, "duration")) : null;

  return {
    durationSec: formatDuration ?? (streamDurations.length > 0 ? Math.max(...streamDurations) : 0),
    width: video ? readNumber(Reflect.get(video, "width")) : null,
    height: video ? readNumber(Reflect.get(video, "height")) : null,
    hasVideo: Boolean(video),
    hasAudio: Boolean(audio)
  };
}

type ProcessOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
  onStdoutLine?: (line: string) => void;
  label: string;
};

function runProcess(binary: string, args: string[], options: ProcessOptions) {
  return new Promise<{ stdout: string; stderr: string }>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(abortReasonToError(options.signal.reason));
      return;
    }
    const child = spawn(binary, args, { windowsHide: true, signal: options.signal });
    let stdout = "";
    let stderr = "";
    let pending = "";
    let timedOut = false;
    let settled = false;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    const finish = (err: Error | null) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (err) {
        reject(err);
      } else {
        resolve({ stdout, stderr });
      }
    };

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill();
    }, timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => {
      const text = chunk.toString();
      stdout += text;
      // ffmpeg flushes a last progress block after SIGTERM; nothing reads it once aborted.
      if (!options.onStdoutLine || settled || options.signal?.aborted) {
        return;
      }
      pending += text;
      const lines = pending.split("\n");
      pending = lines.pop() ?? "";
      try {
        for (const line of lines) {
          options.onStdoutLine(line);
        }
      } catch (err) {
        child.kill();
        finish(err instanceof Error ? err : new RenderError(String(err)));
      }
    });

    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (err) => {
      if (options.signal?.aborted) {
        finish(abortReasonToError(options.signal.reason));
        return;
      }
      finish(new RenderError(`${options.label} failed to start: ${err.message}`, { binary }));
    });

    child.on("close", (code) => {
      if (options.signal?.aborted) {
        finish(abortReasonToError(options.signal.reason));
        return;
      }
      if (timedOut) {
        finish(new RenderError(`${options.label} timed out after ${timeoutMs}ms`));
        return;
      }
      if (code === 0) {
        finish(null);
        return;
      }
      if (process.env.REEL_LOG_HTTP === "1") {
        console.warn(`[reel] ${options.label} failed argv: ${args.join(" ")}`);
      }
      const snippet = stderr.trim().split("\n").slice(-STDERR_TAIL_LINES).join("\n");
      finish(new RenderError(snippet || `${options.label} exited with code ${code}`, { code }));
    });
  });
}

export function createFfmpegBackend(options: { ffmpegPath?: string; ffprobePath?: string } = {}): MediaBackend {
  const ffmpegPath = options.ffmpegPath ?? resolveFfmpegPath();
  const ffprobePath = options.ffprobePath ?? resolveFfprobePath();

  return {
    name: "ffmpeg",
    async run(args: string[], runOptions: RunOptions = {}) {
      const { durationSec, onProgress } = runOptions;
      const trackProgress = Boolean(onProgress && durationSec && durationSec > 0);
      const argv = ["-hide_banner", "-y", ...(trackProgress ? ["-progress", "pipe:1", "-nostats"] : []), ...args];
      await runProcess(ffmpegPath, argv, {
        label: "ffmpeg",
        signal: runOptions.signal,
        timeoutMs: runOptions.timeoutMs,
        onStdoutLine:
          trackProgress && onProgress && durationSec
            ? (line) => {
                const position = parseProgressLine(line);
                if (position === "end") {
                  onProgress(1);
                } else if (position !== null) {
                  onProgress(Math.min(1, position / durationSec));
                }
              }
            : undefined
      });
    },
    async probe(filePath: string, probeOptions: { signal?: AbortSignal } = {}) {
      const { stdout } = await runProcess(
        ffprobePath,
        ["-v", "error", "-print_format", "json", "-show_format", "-show_streams", filePath],
        { label: "ffprobe", signal: probeOptions.signal, timeoutMs: 30_000 }
      );
      return parseProbeOutput(stdout);
    }
  };
}
