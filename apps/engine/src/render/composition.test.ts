import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { createFakeMediaBackend } from "../media/__testutils__/fakeMediaBackend";
import { MissingAssetError, RenderError } from "../lib/errors";
import { buildCompositionPlan, captionOverlays, compose, escapeDrawtext, type ComposeOptions } from "./composition";
import type { ImageOverlay } from "./overlays";
import { createApproxMeasurer } from "./textLayout";

const frame = { width: 1080, height: 1920, fps: 30, safeMargin: 320 };

describe("composition plan", () => {
  const options: ComposeOptions = {
    backend: createFakeMediaBackend(),
    frame,
    durationSec: 4,
    outPath: "/out/video.mp4",
    audioPath: "/out/voice.mp3",
    font: null,
    measurer: createApproxMeasurer(80)
  };

  it("escapes caption text for drawtext", () => {
    expect(escapeDrawtext("it's a C:\\path")).toBe("'it\u2019s a C\uFF1Apath'");
  });

  it("replaces filtergraph separators in caption text", () => {
    expect(escapeDrawtext("UPDATE: 3:00 AM, 50% [live]; ok")).toBe(
      "'UPDATE\uFF1A 3\uFF1A00 AM\uFF0C 50\uFF05 \uFF3Blive\uFF3D\uFF1B ok'"
    );
  });

  it("turns cues into caption overlays and skips blank ones", () => {
    expect(
      captionOverlays([
        { start: 0, end: 2, text: "hello" },
        { start: 2, end: 3, text: " " }
      ])
    ).toEqual([{ kind: "text", text: "hello", start: 0, duration: 2 }]);
  });

  it("draws each caption line above the safe zone", () => {
    const plan = buildCompositionPlan("/bg.mp4", captionOverlays([{ start: 0, end: 2, text: "hello" }]), options);
    const graph = plan.args[plan.args.indexOf("-filter_complex") + 1];
    expect(graph).toBe(
      "[0:v]drawtext=text='HELLO':fontsize=80:fontcolor=yellow:borderw=5:bordercolor=black:expansion=none" +
        ":x=420:y=1459:enable='between(t,0,2)',format=yuv420p[vout]"
    );
    expect(plan.args.slice(0, 4)).toEqual(["-i", "/bg.mp4", "-i", "/out/voice.mp3"]);
    expect(plan.args).toContain("1:a");
    expect(plan.args[plan.args.length - 1]).toBe("/out/video.mp4");
  });

  it("loops each image input and chains overlays", () => {
    const image: ImageOverlay = {
      kind: "image",
      path: "/shots/a.png",
      width: 1000,
      height: 500,
      x: 40,
      y: 710,
      start: 0,
      duration: 4,
      animation: "none",
      rampSec: 0
    };
    const plan = buildCompositionPlan("/bg.mp4", [image], { ...options, audioPath: null });
    expect(plan.args.slice(0, 8)).toEqual(["-i", "/bg.mp4", "-loop", "1", "-t", "4.000", "-i", "/shots/a.png"]);
    expect(plan.args).toContain("-an");
    const graph = plan.args[plan.args.indexOf("-filter_complex") + 1];
    expect(graph.split(";")).toEqual([
      "[1:v]scale=1000:500,format=rgba[img0]",
      "[0:v][img0]overlay=x=40:y=710:enable='between(t,0,4)'[ov0]",
      "[ov0]null,format=yuv420p[vout]"
    ]);
  });

  it("drops overlays outside the video", () => {
    const plan = buildCompositionPlan("/bg.mp4", captionOverlays([{ start: 5, end: 6, text: "late" }]), options);
    expect(plan.overlays).toEqual([]);
  });
});

describe("compose", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "reel-compose-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function optionsFor(backend = createFakeMediaBackend()): ComposeOptions {
    return {
      backend,
      frame,
      durationSec: 4,
      outPath: path.join(dir, "out", "video.mp4"),
      font: null,
      measurer: createApproxMeasurer(80)
    };
  }

  it("renders through a temp file and reports progress", async () => {
    const backend = createFakeMediaBackend();
    const fractions: number[] = [];
    const result = await compose("/bg.mp4", captionOverlays([{ start: 0, end: 4, text: "hi" }]), {
      ...optionsFor(backend),
      onProgress: (fraction) => fractions.push(fraction)
    });
    expect(result).toBe(path.join(dir, "out", "video.mp4"));
    expect(await fs.readFile(result, "utf8")).toBe("fake-media:1");
    expect(await fs.readdir(path.join(dir, "out"))).toEqual(["video.mp4"]);
    expect(fractions).toEqual([0.5, 1]);
    expect(path.basename(backend.runs[0].args[backend.runs[0].args.length - 1])).toMatch(/^\.tmp-.+-video\.mp4$/);
  });

  it("surfaces backend failures as RenderError and removes the temp file", async () => {
    const backend = createFakeMediaBackend();
    backend.failNextRun("encoder exploded");
    await expect(compose("/bg.mp4", [], optionsFor(backend))).rejects.toBeInstanceOf(RenderError);
    expect(await fs.readdir(path.join(dir, "out"))).toEqual([]);
  });

  it("rejects missing screenshots before encoding", async () => {
    const backend = createFakeMediaBackend();
    const missing: ImageOverlay = {
      kind: "image",
      path: path.join(dir, "nope.png"),
      width: 100,
      height: 100,
      x: 0,
      y: 0,
      start: 0,
      duration: 4,
      animation: "fade",
      rampSec: 0.5
    };
    await expect(compose("/bg.mp4", [missing], optionsFor(backend))).rejects.toBeInstanceOf(MissingAssetError);
    expect(backend.runs).toHaveLength(0);
  });
});
