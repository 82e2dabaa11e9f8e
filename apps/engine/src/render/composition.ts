import { randomUUID } from "node:crypto";
import { existsSync, promises as fs } from "node:fs";
import path from "node:path";
import type { CaptionCue } from "@reelsmith/shared";
import type { MediaBackend } from "../media/mediaBackend";
import { MissingAssetError, ReelError, RenderError, errorMessage } from "../lib/errors";
import { formatFontPathForFfmpeg, type ResolvedFont } from "./fonts";
import {
  clampOverlayWindows,
  enableExpression,
  imageStreamFilters,
  overlayPositionExpressions,
  type ImageOverlay,
  type Overlay,
  type TextOverlay
} from "./overlays";
import { DEFAULT_CAPTION_LAYOUT, layoutCaption, type TextMeasurer } from "./textLayout";

export type CompositionFrame = {
  width: number;
  height: number;
  fps: number;
  safeMargin: number;
};

export type CaptionStyle = {
  fontSize: number;
  color: string;
  strokeColor: string;
  strokeWidth: number;
};

export const DEFAULT_CAPTION_STYLE: CaptionStyle = {
  fontSize: 80,
  color: "yellow",
  strokeColor: "black",
  strokeWidth: DEFAULT_CAPTION_LAYOUT.strokeWidth
};

export type ComposeOptions = {
  backend: MediaBackend;
  frame: CompositionFrame;
  durationSec: number;
  outPath: string;
  audioPath?: string | null;
  font: ResolvedFont | null;
  measurer: TextMeasurer;
  style?: CaptionStyle;
  signal?: AbortSignal;
  /** Fraction of the encode completed, in [0, 1]. */
  onProgress?: (fraction: number) => void;
};

export type CompositionPlan = {
  overlays: Overlay[];
  args: string[];
};

export function captionOverlays(cues: CaptionCue[]): TextOverlay[] {
  return cues
    .filter((cue) => cue.text.trim().length > 0)
    .map((cue) => ({ kind: "text", text: cue.text, start: cue.start, duration: cue.end - cue.start }));
}

const DRAWTEXT_LOOKALIKES: Record<string, string> = {
  "'": "\u2019",
  ":": "\uFF1A",
  ";": "\uFF1B",
  ",": "\uFF0C",
  "%": "\uFF05",
  "[": "\uFF3B",
  "]": "\uFF3D"
};

/**
 * Single-quoted drawtext value. Characters the filtergraph or drawtext parsers
 * treat as syntax become full-width lookalikes; backslashes are dropped.
 */
export function escapeDrawtext(text: string) {
  const safe = text.replace(/\\/g, "").replace(/[':;,%[\]]/g, (char) => DRAWTEXT_LOOKALIKES[char] ?? "");
  return `'${safe}'`;
}

function drawtextFilters(overlay: TextOverlay, options: ComposeOptions, style: CaptionStyle): string[] {
  const layout = layoutCaption(overlay.text, options.measurer, {
    ...DEFAULT_CAPTION_LAYOUT,
    strokeWidth: style.strokeWidth,
    frameWidth: options.frame.width,
    frameHeight: options.frame.height,
    safeMargin: options.frame.safeMargin
  });
  const fontfile = options.font ? `fontfile=${formatFontPathForFfmpeg(options.font.path)}:` : "";
  return layout.lines.map(
    (line) =>
      `drawtext=${fontfile}text=${escapeDrawtext(line.text)}:fontsize=${style.fontSize}:fontcolor=${style.color}` +
      `:borderw=${style.strokeWidth}:bordercolor=${style.strokeColor}:expansion=none` +
      `:x=${line.x}:y=${line.y}:enable='${enableExpression(overlay)}'`
  );
}

/**
 * Input 0 is the normalized background, input 1 the narration when present,
 * then one looped still per image overlay. Images are composited first and
 * captions drawn on top.
 */
export function buildCompositionPlan(background: string, overlays: Overlay[], options: ComposeOptions): CompositionPlan {
  const style = options.style ?? DEFAULT_CAPTION_STYLE;
  const total = options.durationSec;
  const kept = clampOverlayWindows(overlays, total);
  const images = kept.filter((overlay): overlay is ImageOverlay => overlay.kind === "image");
  const texts = kept.filter((overlay): overlay is TextOverlay => overlay.kind === "text");
  const audioIndex = options.audioPath ? 1 : null;
  const firstImageIndex = audioIndex === null ? 1 : 2;

  const inputs = ["-i", background];
  if (options.audioPath) {
    inputs.push("-i", options.audioPath);
  }
  for (const image of images) {
    inputs.push("-loop", "1", "-t", total.toFixed(3), "-i", image.path);
  }

  const graph: string[] = [];
  let current = "0:v";
  images.forEach((image, index) => {
    const stream = `img${index}`;
    const next = `ov${index}`;
    const { x, y } = overlayPositionExpressions(image);
    graph.push(`[${firstImageIndex + index}:v]${imageStreamFilters(image).join(",")}[${stream}]`);
    graph.push(`[${current}][${stream}]overlay=x=${x}:y=${y}:enable='${enableExpression(image)}'[${next}]`);
    current = next;
  });
  const captionFilters = texts.flatMap((text) => drawtextFilters(text, options, style));
  graph.push(`[${current}]${captionFilters.length > 0 ? captionFilters.join(",") : "null"},format=yuv420p[vout]`);

  const args = [
    ...inputs,
    "-filter_complex",
    graph.join(";"),
    "-map",
    "[vout]",
    ...(audioIndex === null ? ["-an"] : ["-map", `${audioIndex}:a`, "-c:a", "aac", "-b:a", "192k"]),
    "-c:v",
    "libx264",
    "-preset",
    "veryfast",
    "-r",
    String(options.frame.fps),
    "-t",
    total.toFixed(3),
    "-movflags",
    "+faststart",
    options.outPath
  ];
  return { overlays: kept, args };
}

/**
 * Renders `overlays` over the normalized background into `options.outPath`.
 * The encoder writes to a temp file beside the target, renamed on success and
 * removed on failure.
 */
export async function compose(background: string, overlays: Overlay[], options: ComposeOptions): Promise<string> {
  if (!(options.durationSec > 0)) {
    throw new RenderError(`Composition duration must be positive, got ${options.durationSec}`);
  }
  for (const overlay of overlays) {
    if (overlay.kind === "image" && !existsSync(overlay.path)) {
      throw new MissingAssetError(`Screenshot not found: ${overlay.path}`, { path: overlay.path });
    }
  }

  const tempPath = path.join(
    path.dirname(options.outPath),
    `.tmp-${randomUUID()}-${path.basename(options.outPath)}`
  );
  const plan = buildCompositionPlan(background, overlays, { ...options, outPath: tempPath });
  console.log(
    `[reel] compose start out=${path.basename(options.outPath)} overlays=${plan.overlays.length} durationSec=${options.durationSec.toFixed(2)}`
  );

  try {
    await fs.mkdir(path.dirname(options.outPath), { recursive: true });
    await options.backend.run(plan.args, {
      signal: options.signal,
      durationSec: options.durationSec,
      onProgress: options.onProgress
    });
    await fs.rename(tempPath, options.outPath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    if (err instanceof ReelError) {
      throw err;
    }
    throw new RenderError(`Composition failed: ${errorMessage(err)}`);
  }
  return options.outPath;
}
