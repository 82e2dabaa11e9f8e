import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { createCaptionMeasurer, formatFontPathForFfmpeg, resolveGenreFont } from "./fonts";
import type { FontMetrics } from "./textLayout";

const fakeMetrics: FontMetrics = {
  unitsPerEm: 1000,
  ascender: 800,
  descender: -250,
  getAdvanceWidth: (text, fontSize) => text.length * fontSize * 0.5
};

describe("resolveGenreFont", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "reel-fonts-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("walks the genre preference list and skips fonts that fail to load", async () => {
    await fs.writeFile(path.join(dir, "Montserrat-Black.ttf"), "broken");
    await fs.writeFile(path.join(dir, "Anton-Regular.ttf"), "fine");
    const resolved = resolveGenreFont("terror", {
      fontsDir: dir,
      platformFonts: [],
      load: (filePath) => {
        if (filePath.endsWith("Montserrat-Black.ttf")) {
          throw new Error("bad table");
        }
        return fakeMetrics;
      }
    });
    expect(resolved?.path).toBe(path.join(dir, "Anton-Regular.ttf"));
  });

  it("falls back to platform fonts, then to none", async () => {
    const platform = path.join(dir, "platform.ttf");
    await fs.writeFile(platform, "x");
    const load = () => fakeMetrics;
    expect(resolveGenreFont("comedy", { fontsDir: path.join(dir, "missing"), platformFonts: [platform], load })?.path).toBe(
      platform
    );
    expect(resolveGenreFont("comedy", { fontsDir: path.join(dir, "missing"), platformFonts: [], load })).toBeNull();
  });

  it("measures with font metrics when a font resolves", () => {
    const measurer = createCaptionMeasurer({ path: "/fonts/x.ttf", metrics: fakeMetrics }, 80);
    expect(measurer.width("ABCD")).toBe(160);
    expect(measurer.ascent).toBe(64);
    expect(measurer.descent).toBe(20);
    expect(measurer.lineHeight).toBe(84);
    expect(createCaptionMeasurer(null, 80).lineHeight).toBe(96);
  });
});

describe("formatFontPathForFfmpeg", () => {
  it("escapes drive colons and spaces", () => {
    expect(formatFontPathForFfmpeg("C:\\Windows\\Fonts\\Arial Bold.ttf")).toBe("C\\:/Windows/Fonts/Arial\\ Bold.ttf");
  });
});
