import { describe, expect, it } from "vitest";
import { DEFAULT_CAPTION_LAYOUT, createApproxMeasurer, layoutCaption, wrapText } from "./textLayout";

const measurer = createApproxMeasurer(80);
const options = { ...DEFAULT_CAPTION_LAYOUT, frameWidth: 1080, frameHeight: 1920, safeMargin: 320 };

describe("wrapText", () => {
  it("wraps on word boundaries within the measured width", () => {
    expect(wrapText("THIS IS A VERY LONG CAPTION THAT WRAPS", 940, measurer)).toEqual([
      "THIS IS A VERY LONG",
      "CAPTION THAT WRAPS"
    ]);
  });

  it("keeps an oversized word on its own line", () => {
    expect(wrapText("A SUPERCALIFRAGILISTICEXPIALIDOCIOUS B", 500, measurer)).toEqual([
      "A",
      "SUPERCALIFRAGILISTICEXPIALIDOCIOUS",
      "B"
    ]);
  });
});

describe("layoutCaption", () => {
  it("upper-cases and centers a single line above the safe zone", () => {
    const layout = layoutCaption("hello", measurer, options);
    expect(layout.textHeight).toBe(106);
    expect(layout.top).toBe(1454);
    expect(layout.lines).toEqual([{ text: "HELLO", width: 240, x: 420, y: 1459 }]);
  });

  it("raises the block by the height of every wrapped line", () => {
    const layout = layoutCaption("this is a very long caption that wraps", measurer, options);
    expect(layout.boxWidth).toBe(940);
    expect(layout.textHeight).toBe(202);
    expect(layout.top).toBe(1358);
    expect(layout.lines.map((line) => [line.x, line.y])).toEqual([
      [84, 1363],
      [108, 1459]
    ]);
    expect(layout.top + layout.textHeight).toBe(1920 - 320 - 40);
  });

  it("never places text above the top padding", () => {
    const layout = layoutCaption("hello", measurer, { ...options, frameHeight: 400 });
    expect(layout.top).toBe(40);
  });
});
