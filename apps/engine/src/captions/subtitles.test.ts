import { describe, expect, it } from "vitest";
import { formatTimeSrt, parseSrt, toSrt, toVtt } from "./subtitles";
import { allocateCues } from "./timing";
import { InputValidationError } from "../lib/errors";

describe("subtitles", () => {
  it("formats srt timestamps with rounded milliseconds", () => {
    expect(formatTimeSrt(0)).toBe("00:00:00,000");
    expect(formatTimeSrt(3723.4567)).toBe("01:02:03,457");
  });

  it("writes numbered srt blocks", () => {
    const srt = toSrt([
      { start: 0, end: 1.5, text: "HELLO THERE" },
      { start: 1.5, end: 3, text: "GENERAL" }
    ]);
    expect(srt).toBe(
      [
        "1",
        "00:00:00,000 --> 00:00:01,500",
        "HELLO THERE",
        "",
        "2",
        "00:00:01,500 --> 00:00:03,000",
        "GENERAL",
        ""
      ].join("\n")
    );
  });

  it("writes webvtt with a header", () => {
    expect(toVtt([{ start: 0.25, end: 1, text: "hi" }])).toBe(
      ["WEBVTT", "", "00:00:00.250 --> 00:00:01.000", "hi", ""].join("\n")
    );
  });

  it("round-trips allocated cues within a millisecond", () => {
    const cues = allocateCues("so I walked in... and everyone just STOPPED talking at once", 7.3, {
      wordsPerChunk: 3
    });
    const parsed = parseSrt(toSrt(cues));
    expect(parsed).toHaveLength(cues.length);
    parsed.forEach((cue, index) => {
      expect(Math.abs(cue.start - cues[index].start)).toBeLessThanOrEqual(0.001);
      expect(Math.abs(cue.end - cues[index].end)).toBeLessThanOrEqual(0.001);
      expect(cue.text).toBe(cues[index].text);
    });
  });

  it("tolerates CRLF line endings and joins wrapped lines", () => {
    const parsed = parseSrt("1\r\n00:00:01,000 --> 00:00:02,250\r\nfirst line\r\nsecond line\r\n\r\n\r\n");
    expect(parsed).toEqual([{ start: 1, end: 2.25, text: "first line second line" }]);
  });

  it("rejects a malformed timing line", () => {
    expect(() => parseSrt("1\n00:00:01 -> 00:00:02\nnope\n")).toThrow(InputValidationError);
  });
});
