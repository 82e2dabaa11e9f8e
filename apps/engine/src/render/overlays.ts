import type { DisplayMode, OverlayPosition } from "@reelsmith/shared";

export type Frame = { width: number; height: number };

export type Animation = "none" | "fade" | "slide" | "zoom" | "enter_right";

export type ImageSource = { path: string; width: number; height: number };

export type OverlayWindow = { start: number; duration: number };

export type ImageOverlay = OverlayWindow & {
  kind: "image";
  path: string;
  width: number;
  height: number;
  x: number;
  y: number;
  animation: Animation;
  rampSec: number;
};

export type TextOverlay = OverlayWindow & {
  kind: "text";
  text: string;
};

export type Overlay = ImageOverlay | TextOverlay;

export type AnimationState = {
  alpha: number;
  scale: number;
  /** Eased travel from the entry edge to the resting position, in [0, 1]. */
  travel: number;
};

export const SEQUENTIAL_CYCLE: Animation[] = ["fade", "slide", "zoom"];
export const SEQUENTIAL_RAMP_SEC = 0.4;
export const OVERLAY_RAMP_SEC = 0.3;
export const OVERLAY_STAGGER_SEC = 0.5;
export const OVERLAY_TOP = 150;
export const OVERLAY_GAP = 20;
export const SLIDE_RAMP_SEC = 0.5;
export const SINGLE_IMAGE_FADE_SEC = 0.5;
export const ZOOM_FROM = 0.8;
export const EDGE_OFFSET = 100;

function clamp01(value: number) {
  return Math.min(1, Math.max(0, value));
}

export function easeOutCubic(progress: number) {
  const p = clamp01(progress);
  return 1 - Math.pow(1 - p, 3);
}

/** Animation state `t` seconds after the overlay appears. */
export function animationValueAt(kind: Animation, t: number, rampSec: number): AnimationState {
  if (t < 0) {
    return { alpha: 0, scale: kind === "zoom" ? ZOOM_FROM : 1, travel: 0 };
  }
  const linear = rampSec > 0 ? clamp01(t / rampSec) : 1;
  switch (kind) {
    case "fade":
      return { alpha: linear, scale: 1, travel: 1 };
    case "slide":
    case "enter_right":
      return { alpha: 1, scale: 1, travel: easeOutCubic(linear) };
    case "zoom":
      return { alpha: 1, scale: ZOOM_FROM + (1 - ZOOM_FROM) * linear, travel: 1 };
    default:
      return { alpha: 1, scale: 1, travel: 1 };
  }
}

function toEven(value: number) {
  const floored = Math.max(2, Math.floor(value));
  return floored % 2 === 0 ? floored : floored - 1;
}

/** Largest size within the box that keeps the aspect ratio; never upscales. */
export function fitImage(width: number, height: number, maxWidth: number, maxHeight: number) {
  const ratio = Math.min(1, maxWidth / width, maxHeight / height);
  return { width: toEven(width * ratio), height: toEven(height * ratio) };
}

export function placeImage(position: OverlayPosition, size: { width: number; height: number }, frame: Frame) {
  const x = Math.round((frame.width - size.width) / 2);
  if (position === "top") {
    return { x, y: EDGE_OFFSET };
  }
  if (position === "bottom") {
    return { x, y: frame.height - size.height - EDGE_OFFSET };
  }
  return { x, y: Math.round((frame.height - size.height) / 2) };
}

export function defaultImageBox(frame: Frame) {
  return { maxWidth: frame.width - 80, maxHeight: frame.height * 0.7 };
}

export function stackedImageBox(frame: Frame) {
  return { maxWidth: frame.width - 200, maxHeight: frame.height * 0.3 };
}

/**
 * Turns caller-supplied screenshots into timed overlays:
 * - one image stays up for the whole video with a short fade;
 * - `sequential` splits the video evenly and cycles fade, slide and zoom;
 * - `overlay` stacks every image from the top with a staggered fade;
 * - `slide` brings each image in from the right and holds it until the next.
 */
export function scheduleImageOverlays(
  images: ImageSource[],
  totalDuration: number,
  options: { mode: DisplayMode; position: OverlayPosition; frame: Frame }
): ImageOverlay[] {
  const { frame, position } = options;
  if (images.length === 0 || !(totalDuration > 0)) {
    return [];
  }

  if (images.length === 1) {
    const box = defaultImageBox(frame);
    const size = fitImage(images[0].width, images[0].height, box.maxWidth, box.maxHeight);
    return [
      {
        kind: "image",
        path: images[0].path,
        ...size,
        ...placeImage(position, size, frame),
        start: 0,
        duration: totalDuration,
        animation: "fade",
        rampSec: SINGLE_IMAGE_FADE_SEC
      }
    ];
  }

  const slot = totalDuration / images.length;

  if (options.mode === "overlay") {
    const box = stackedImageBox(frame);
    return images.map((image, index) => {
      const size = fitImage(image.width, image.height, box.maxWidth, box.maxHeight);
      const start = Math.min(index * OVERLAY_STAGGER_SEC, totalDuration);
      return {
        kind: "image",
        path: image.path,
        ...size,
        x: Math.round((frame.width - size.width) / 2),
        y: OVERLAY_TOP + index * (size.height + OVERLAY_GAP),
        start,
        duration: totalDuration - start,
        animation: "fade",
        rampSec: OVERLAY_RAMP_SEC
      };
    });
  }

  const box = defaultImageBox(frame);
  return images.map((image, index) => {
    const size = fitImage(image.width, image.height, box.maxWidth, box.maxHeight);
    const start = index * slot;
    const end = index === images.length - 1 ? totalDuration : (index + 1) * slot;
    const slide = options.mode === "slide";
    return {
      kind: "image",
      path: image.path,
      ...size,
      ...placeImage(position, size, frame),
      start,
      duration: end - start,
      animation: slide ? "enter_right" : SEQUENTIAL_CYCLE[index % SEQUENTIAL_CYCLE.length],
      rampSec: slide ? SLIDE_RAMP_SEC : SEQUENTIAL_RAMP_SEC
    };
  });
}

/** Clamps every window into [0, total]; windows left empty are dropped. */
export function clampOverlayWindows<T extends OverlayWindow>(overlays: T[], totalDuration: number): T[] {
  const kept: T[] = [];
  for (const overlay of overlays) {
    const start = Math.min(Math.max(0, overlay.start), totalDuration);
    const end = Math.min(Math.max(0, overlay.start + overlay.duration), totalDuration);
    if (end - start <= 0) {
      continue;
    }
    kept.push({ ...overlay, start, duration: end - start });
  }
  return kept;
}

function num(value: number) {
  return Number(value.toFixed(3)).toString();
}

export function enableExpression(window: OverlayWindow) {
  return `between(t,${num(window.start)},${num(window.start + window.duration)})`;
}

/** Eased 0..1 progress expression for an ffmpeg filter, matching {@link easeOutCubic}. */
function easedProgressExpression(start: number, rampSec: number) {
  return `(1-pow(1-min(1,max(0,(t-${num(start)})/${num(rampSec)})),3))`;
}

/** Filters applied to the image stream before it is overlaid. */
export function imageStreamFilters(overlay: ImageOverlay): string[] {
  const filters = [`scale=${overlay.width}:${overlay.height}`, "format=rgba"];
  if (overlay.animation === "fade" && overlay.rampSec > 0) {
    filters.push(`fade=t=in:st=${num(overlay.start)}:d=${num(overlay.rampSec)}:alpha=1`);
  }
  if (overlay.animation === "zoom" && overlay.rampSec > 0) {
    const factor = `(${ZOOM_FROM}+${num(1 - ZOOM_FROM)}*min(1,max(0,(t-${num(overlay.start)})/${num(overlay.rampSec)})))`;
    filters.push(`scale=w='trunc(${overlay.width}*${factor}/2)*2':h=-2:eval=frame`);
  }
  return filters;
}

/** x/y expressions for the overlay filter, in frame coordinates. */
export function overlayPositionExpressions(overlay: ImageOverlay): { x: string; y: string } {
  const x = String(overlay.x);
  const y = String(overlay.y);
  if (overlay.rampSec <= 0) {
    return { x, y };
  }
  const eased = easedProgressExpression(overlay.start, overlay.rampSec);
  switch (overlay.animation) {
    case "slide":
      return { x, y: `'H-(H-${y})*${eased}'` };
    case "enter_right":
      return { x: `'W-(W-${x})*${eased}'`, y };
    case "zoom":
      return { x: `'${x}+(${overlay.width}-w)/2'`, y: `'${y}+(${overlay.height}-h)/2'` };
    default:
      return { x, y };
  }
}
