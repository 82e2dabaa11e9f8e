import { describe, expect, it } from "vitest";
import {
  allocateCues,
  allocateWordCues,
  estimateSpeechDuration,
  fitCuesToDuration
} from "./timing";
import { InputValidationError } from "../lib/errors";

describe("allocateCues", () => {
  it("splits four words into two timed pairs", () => {
    expect(allocateCues("AAAA BBBB CCCC DDDD", 10, { wordsPerChunk: 2 })).toEqual([
      { start: 0, end: 5, text: "AAAA BBBB" },
      { start: 5, end: 10, text: "CCCC DDDD" }
    ]);
  });

  it("covers the duration contiguously when there are no pauses", () => {
    const text = "one two three four five six seven eight nine ten eleven";
    const cues = allocateCues(text, 7.7);
    expect(cues.map((cue) => cue.text)).toEqual([
      "one two three four",
      "five six seven eight",
      "nine ten eleven"
    ]);
    expect(cues[0].start).toBe(0);
    for (let i = 1; i < cues.length; i += 1) {
      expect(cues[i].start).toBe(cues[i - 1].end);
    }
    expect(cues[cues.length - 1].end).toBeCloseTo(7.7, 9);
  });

  it("lengthens the timeline by the pause offset for each marker", () => {
    const cues = allocateCues("wait... what", 2, { wordsPerChunk: 1 });
    expect(cues).toHaveLength(2);
    expect(cues[0]).toEqual({ start: 0, end: 1.075, text: "wait" });
    expect(cues[1].end).toBeCloseTo(2.15, 9);
  });

  it("keeps emphasis markup on the word", () => {
    const cues = allocateCues("I was *SO* mad", 4, { wordsPerChunk: 2 });
    expect(cues.map((cue) => cue.text)).toEqual(["I was", "*SO* mad"]);
  });

  it("returns no cues for empty text", () => {
    expect(allocateCues("   ", 5)).toEqual([]);
  });

  it("produces zero-width cues for a zero duration", () => {
    expect(allocateCues("a b c", 0, { wordsPerChunk: 2 })).toEqual([
      { start: 0, end: 0, text: "a b" },
      { start: 0, end: 0, text: "c" }
    ]);
  });

  it("rejects negative durations and bad chunk sizes", () => {
    expect(() => allocateCues("a b", -1)).toThrow(InputValidationError);
    expect(() => allocateCues("a b", Number.NaN)).toThrow(InputValidationError);
    expect(() => allocateCues("a b", 2, { wordsPerChunk: 0 })).toThrow(InputValidationError);
  });

  it("allocates one cue per word", () => {
    expect(allocateWordCues("a b", 1)).toEqual([
      { start: 0, end: 0.5, text: "a" },
      { start: 0.5, end: 1, text: "b" }
    ]);
  });
});

describe("fitCuesToDuration", () => {
  it("pins the last cue to the measured duration", () => {
    const raw = allocateCues("wait... what now", 3, { wordsPerChunk: 1 });
    const fitted = fitCuesToDuration(raw, 3);
    expect(fitted[fitted.length - 1].end).toBe(3);
    expect(fitted[0].start).toBe(0);
    expect(fitted[1].start).toBeCloseTo(fitted[0].end, 9);
    expect(fitted.map((cue) => cue.text)).toEqual(["wait", "what", "now"]);
  });

  it("leaves an empty list alone", () => {
    expect(fitCuesToDuration([], 4)).toEqual([]);
  });
});

describe("estimateSpeechDuration", () => {
  it("uses two and a half words per second", () => {
    expect(estimateSpeechDuration(125)).toBe(50);
    expect(estimateSpeechDuration(0)).toBe(0);
  });
});
