import { promises as fs } from "node:fs";
import path from "node:path";
import type { MediaBackend, ProbeResult } from "../media/mediaBackend";
import { MissingAssetError, RenderError } from "../lib/errors";

export const ASPECT_TOLERANCE = 0.01;
export const BACKGROUND_EXTENSIONS = [".mp4", ".mov", ".webm"];

export type ClipInfo = {
  path: string;
  width: number;
  height: number;
  durationSec: number;
};

export type TargetFormat = {
  width: number;
  height: number;
  durationSec: number;
  fps: number;
};

export type CropWindow = {
  width: number;
  height: number;
  x: number;
  y: number;
};

export type BackgroundPlan = {
  sourcePath: string;
  sourceDurationSec: number;
  crop: CropWindow | null;
  width: number;
  height: number;
  fps: number;
  /** Whole copies of the source played back to back. */
  loops: number;
  offsetSec: number;
  durationSec: number;
};

function floorEven(value: number) {
  const floored = Math.floor(value);
  return floored % 2 === 0 ? floored : floored - 1;
}

export function planCrop(width: number, height: number, targetAspect: number): CropWindow | null {
  const aspect = width / height;
  if (Math.abs(aspect - targetAspect) <= ASPECT_TOLERANCE) {
    return null;
  }
  if (aspect > targetAspect) {
    const cropWidth = Math.min(width, floorEven(height * targetAspect));
    return { width: cropWidth, height, x: Math.floor((width - cropWidth) / 2), y: 0 };
  }
  const cropHeight = Math.min(height, floorEven(width / targetAspect));
  return { width, height: cropHeight, x: 0, y: Math.floor((height - cropHeight) / 2) };
}

/**
 * Decides how a source clip becomes exactly `target`: center-crop to the
 * target aspect (never pad), scale, then loop whole copies when the source is
 * short or start at a random offset when it is long.
 */
export function planBackground(
  source: ClipInfo,
  target: TargetFormat,
  random: () => number = Math.random
): BackgroundPlan {
  if (!(source.durationSec > 0) || !(source.width > 0) || !(source.height > 0)) {
    throw new RenderError(`Background clip is unusable: ${source.path}`, {
      durationSec: source.durationSec,
      width: source.width,
      height: source.height
    });
  }
  if (!(target.durationSec > 0)) {
    throw new RenderError(`Target duration must be positive, got ${target.durationSec}`);
  }

  let loops = 1;
  let offsetSec = 0;
  if (source.durationSec < target.durationSec) {
    loops = Math.ceil(target.durationSec / source.durationSec);
  } else if (source.durationSec > target.durationSec) {
    const slack = source.durationSec - target.durationSec;
    const draw = Math.min(1, Math.max(0, random()));
    offsetSec = Math.floor(draw * slack * 1000) / 1000;
  }

  return {
    sourcePath: source.path,
    sourceDurationSec: source.durationSec,
    crop: planCrop(source.width, source.height, target.width / target.height),
    width: target.width,
    height: target.height,
    fps: target.fps,
    loops,
    offsetSec,
    durationSec: target.durationSec
  };
}

export function backgroundInputArgs(plan: BackgroundPlan): string[] {
  return [
    ...(plan.loops > 1 ? ["-stream_loop", String(plan.loops - 1)] : []),
    ...(plan.offsetSec > 0 ? ["-ss", plan.offsetSec.toFixed(3)] : []),
    "-i",
    plan.sourcePath
  ];
}

export function backgroundFilter(plan: BackgroundPlan, input = "0:v", output = "bg") {
  const steps = [
    plan.crop ? `crop=${plan.crop.width}:${plan.crop.height}:${plan.crop.x}:${plan.crop.y}` : null,
    `scale=${plan.width}:${plan.height}`,
    "setsar=1",
    `fps=${plan.fps}`,
    `trim=duration=${plan.durationSec.toFixed(3)}`,
    "setpts=PTS-STARTPTS"
  ].filter((step): step is string => step !== null);
  return `[${input}]${steps.join(",")}[${output}]`;
}

export function normalizeBackgroundArgs(plan: BackgroundPlan, outPath: string): string[] {
  return [
    ...backgroundInputArgs(plan),
    "-filter_complex",
    backgroundFilter(plan),
    "-map",
    "[bg]",
    "-an",
    "-c:v",
    "libx264",
    "-preset",
    "veryfast",
    "-pix_fmt",
    "yuv420p",
    "-t",
    plan.durationSec.toFixed(3),
    outPath
  ];
}

/** Duration must be within one frame of the target and the frame size exact. */
export function verifyNormalized(probe: ProbeResult, target: TargetFormat) {
  const frame = 1 / target.fps;
  if (Math.abs(probe.durationSec - target.durationSec) > frame + 1e-6) {
    throw new RenderError(
      `Normalized background is ${probe.durationSec.toFixed(3)}s, expected ${target.durationSec.toFixed(3)}s`
    );
  }
  if (probe.width !== target.width || probe.height !== target.height) {
    throw new RenderError(
      `Normalized background is ${probe.width}x${probe.height}, expected ${target.width}x${target.height}`
    );
  }
}

export async function probeClip(backend: MediaBackend, clipPath: string, signal?: AbortSignal): Promise<ClipInfo> {
  const probe = await backend.probe(clipPath, { signal });
  return {
    path: clipPath,
    width: probe.width ?? 0,
    height: probe.height ?? 0,
    durationSec: probe.durationSec
  };
}

export async function normalizeBackground(args: {
  backend: MediaBackend;
  source: ClipInfo;
  target: TargetFormat;
  outPath: string;
  random?: () => number;
  signal?: AbortSignal;
}): Promise<BackgroundPlan> {
  const plan = planBackground(args.source, args.target, args.random);
  await args.backend.run(normalizeBackgroundArgs(plan, args.outPath), {
    signal: args.signal,
    durationSec: plan.durationSec
  });
  verifyNormalized(await args.backend.probe(args.outPath, { signal: args.signal }), args.target);
  console.log(
    `[reel] background normalized source=${path.basename(plan.sourcePath)} loops=${plan.loops} offset=${plan.offsetSec} crop=${plan.crop ? `${plan.crop.width}x${plan.crop.height}` : "none"}`
  );
  return plan;
}

export async function listBackgrounds(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch {
    return [];
  }
  return names
    .filter((name) => BACKGROUND_EXTENSIONS.includes(path.extname(name).toLowerCase()))
    .sort()
    .map((name) => path.join(dir, name));
}

export async function pickBackground(dir: string, random: () => number = Math.random) {
  const candidates = await listBackgrounds(dir);
  if (candidates.length === 0) {
    throw new MissingAssetError(`No background videos (.mp4, .mov, .webm) found in ${dir}`, { dir });
  }
  const index = Math.min(candidates.length - 1, Math.floor(Math.max(0, random()) * candidates.length));
  return candidates[index];
}

export async function assertBackgroundsAvailable(dir: string) {
  const candidates = await listBackgrounds(dir);
  if (candidates.length === 0) {
    throw new MissingAssetError(`No background videos (.mp4, .mov, .webm) found in ${dir}`, { dir });
  }
  return candidates.length;
}
