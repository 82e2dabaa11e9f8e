import { describe, expect, it } from "vitest";
import {
  animationValueAt,
  clampOverlayWindows,
  easeOutCubic,
  enableExpression,
  fitImage,
  imageStreamFilters,
  overlayPositionExpressions,
  placeImage,
  scheduleImageOverlays,
  type ImageOverlay
} from "./overlays";

const frame = { width: 1080, height: 1920 };

describe("animation curves", () => {
  it("eases out cubically and clamps", () => {
    expect(easeOutCubic(0)).toBe(0);
    expect(easeOutCubic(0.5)).toBe(0.875);
    expect(easeOutCubic(1)).toBe(1);
    expect(easeOutCubic(3)).toBe(1);
  });

  it("reports per-kind state over the ramp", () => {
    expect(animationValueAt("fade", 0.2, 0.4).alpha).toBe(0.5);
    expect(animationValueAt("zoom", 0.2, 0.4).scale).toBeCloseTo(0.9, 10);
    expect(animationValueAt("slide", 0.25, 0.5).travel).toBe(0.875);
    expect(animationValueAt("enter_right", 5, 0.5)).toEqual({ alpha: 1, scale: 1, travel: 1 });
    expect(animationValueAt("fade", -1, 0.4).alpha).toBe(0);
    expect(animationValueAt("none", 0, 0)).toEqual({ alpha: 1, scale: 1, travel: 1 });
  });
});

describe("image sizing", () => {
  it("fits within the box without upscaling", () => {
    expect(fitImage(2000, 1000, 1000, 1344)).toEqual({ width: 1000, height: 500 });
    expect(fitImage(400, 300, 1000, 1344)).toEqual({ width: 400, height: 300 });
    expect(fitImage(401, 301, 1000, 1344)).toEqual({ width: 400, height: 300 });
  });

  it("places images at the requested position", () => {
    const size = { width: 1000, height: 500 };
    expect(placeImage("top", size, frame)).toEqual({ x: 40, y: 100 });
    expect(placeImage("center", size, frame)).toEqual({ x: 40, y: 710 });
    expect(placeImage("bottom", size, frame)).toEqual({ x: 40, y: 1320 });
  });
});

describe("scheduleImageOverlays", () => {
  const images = [
    { path: "/img/a.png", width: 2000, height: 1000 },
    { path: "/img/b.png", width: 2000, height: 1000 },
    { path: "/img/c.png", width: 2000, height: 1000 }
  ];

  it("keeps a single image up for the whole video with a fade", () => {
    const [only] = scheduleImageOverlays(images.slice(0, 1), 12, { mode: "sequential", position: "center", frame });
    expect(only).toMatchObject({ start: 0, duration: 12, animation: "fade", rampSec: 0.5, x: 40, y: 710 });
  });

  it("splits sequential mode evenly and cycles animations", () => {
    const overlays = scheduleImageOverlays(images, 9, { mode: "sequential", position: "center", frame });
    expect(overlays.map((o) => [o.start, o.duration, o.animation, o.rampSec])).toEqual([
      [0, 3, "fade", 0.4],
      [3, 3, "slide", 0.4],
      [6, 3, "zoom", 0.4]
    ]);
  });

  it("stacks overlay mode from the top with staggered fades", () => {
    const stacked = [
      { path: "/img/a.png", width: 880, height: 440 },
      { path: "/img/b.png", width: 880, height: 440 }
    ];
    const overlays = scheduleImageOverlays(stacked, 10, { mode: "overlay", position: "center", frame });
    expect(overlays.map((o) => [o.y, o.start, o.duration, o.rampSec])).toEqual([
      [150, 0, 10, 0.3],
      [610, 0.5, 9.5, 0.3]
    ]);
  });

  it("brings slides in from the right and holds until the next", () => {
    const overlays = scheduleImageOverlays(images.slice(0, 2), 8, { mode: "slide", position: "top", frame });
    expect(overlays.map((o) => [o.start, o.duration, o.animation, o.y])).toEqual([
      [0, 4, "enter_right", 100],
      [4, 4, "enter_right", 100]
    ]);
  });

  it("returns nothing without images or duration", () => {
    expect(scheduleImageOverlays([], 10, { mode: "sequential", position: "center", frame })).toEqual([]);
    expect(scheduleImageOverlays(images, 0, { mode: "sequential", position: "center", frame })).toEqual([]);
  });
});

describe("clampOverlayWindows", () => {
  it("clamps windows into the video and drops empty ones", () => {
    const clamped = clampOverlayWindows(
      [
        { start: -1, duration: 3 },
        { start: 8, duration: 5 },
        { start: 12, duration: 1 }
      ],
      10
    );
    expect(clamped).toEqual([
      { start: 0, duration: 2 },
      { start: 8, duration: 2 }
    ]);
  });
});

describe("ffmpeg expressions", () => {
  const base: ImageOverlay = {
    kind: "image",
    path: "/img/a.png",
    width: 1000,
    height: 500,
    x: 40,
    y: 710,
    start: 2,
    duration: 3,
    animation: "fade",
    rampSec: 0.5
  };

  it("gates visibility on the window", () => {
    expect(enableExpression({ start: 2, duration: 3 })).toBe("between(t,2,5)");
  });

  it("fades the image stream in at the window start", () => {
    expect(imageStreamFilters(base)).toEqual(["scale=1000:500", "format=rgba", "fade=t=in:st=2:d=0.5:alpha=1"]);
  });

  it("slides up from the bottom edge", () => {
    expect(overlayPositionExpressions({ ...base, animation: "slide" })).toEqual({
      x: "40",
      y: "'H-(H-710)*(1-pow(1-min(1,max(0,(t-2)/0.5)),3))'"
    });
  });

  it("enters from the right edge", () => {
    expect(overlayPositionExpressions({ ...base, animation: "enter_right" }).x).toBe(
      "'W-(W-40)*(1-pow(1-min(1,max(0,(t-2)/0.5)),3))'"
    );
  });

  it("scales per frame and keeps a zoom centered on its box", () => {
    const zoom = { ...base, animation: "zoom" as const };
    expect(imageStreamFilters(zoom)[2]).toBe(
      "scale=w='trunc(1000*(0.8+0.2*min(1,max(0,(t-2)/0.5)))/2)*2':h=-2:eval=frame"
    );
    expect(overlayPositionExpressions(zoom)).toEqual({ x: "'40+(1000-w)/2'", y: "'710+(500-h)/2'" });
  });
});
