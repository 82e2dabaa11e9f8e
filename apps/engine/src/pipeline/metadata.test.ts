import { describe, expect, it } from "vitest";
import { buildVideoMetadata, calculateViralScore, generateCaption, generateHashtags } from "./metadata";

describe("generateHashtags", () => {
  it("takes three genre tags and three general tags", () => {
    expect(generateHashtags("comedy")).toEqual(["#funny", "#comedy", "#funnyvideos", "#fyp", "#foryou", "#foryoupage"]);
  });

  it("adds story tags for reddit-style genres and caps at ten", () => {
    const tags = generateHashtags("aita");
    expect(tags).toEqual([
      "#aita",
      "#relationship",
      "#drama",
      "#fyp",
      "#foryou",
      "#foryoupage",
      "#redditstories",
      "#reddit",
      "#aita"
    ]);
    expect(tags.length).toBeLessThanOrEqual(10);
  });

  it("uses the default genre's tags for unknown genres", () => {
    expect(generateHashtags("opera").slice(0, 3)).toEqual(["#funny", "#comedy", "#funnyvideos"]);
  });
});

describe("generateCaption", () => {
  it("joins the hook and the call to action", () => {
    expect(generateCaption("I did a thing. Then more happened.", "terror")).toBe(
      "I did a thing\n\nWould you survive this?"
    );
  });

  it("truncates long hooks to 150 characters", () => {
    const caption = generateCaption(`${"a".repeat(200)}. rest`, "comedy");
    const [hook] = caption.split("\n\n");
    expect(hook).toHaveLength(150);
    expect(hook.endsWith("...")).toBe(true);
  });
});

describe("calculateViralScore", () => {
  it("rewards the short-form sweet spot", () => {
    expect(calculateViralScore({ durationSec: 45, wordCount: 120, hook: "Hook" })).toBe(100);
  });

  it("penalizes very short and very long videos", () => {
    expect(calculateViralScore({ durationSec: 10, wordCount: 20, hook: "" })).toBe(30);
    expect(calculateViralScore({ durationSec: 90, wordCount: 200, hook: "" })).toBe(30);
    expect(calculateViralScore({ durationSec: 70, wordCount: 90, hook: "x" })).toBe(65);
  });
});

describe("buildVideoMetadata", () => {
  it("assembles the publishing document", () => {
    const doc = buildVideoMetadata({
      videoPath: "/out/comedy_abc.mp4",
      audioPath: "/cache/a.mp3",
      subtitlePath: "/out/comedy_abc.srt",
      backgroundPath: "/bg/one.mp4",
      fontPath: null,
      genre: "comedy",
      story: "Wait for it. It gets worse.",
      contentHash: "abc",
      durationSec: 12.3456,
      width: 1080,
      height: 1920,
      wordsPerChunk: 2,
      now: new Date("2024-05-01T10:00:00.000Z")
    });
    expect(doc.video).toEqual({
      path: "/out/comedy_abc.mp4",
      durationSec: 12.346,
      format: "vertical_9:16",
      resolution: "1080x1920",
      createdAt: "2024-05-01T10:00:00.000Z"
    });
    expect(doc.content.wordCount).toBe(6);
    expect(doc.content.hook).toBe("Wait for it");
    expect(doc.publishing.hashtagsString).toBe("#funny #comedy #funnyvideos #fyp #foryou #foryoupage");
    expect(doc.publishing.suggestedMusic).toEqual(["Upbeat pop", "Meme sounds", "Trending viral audio"]);
    expect(doc.optimization.viralScore).toBe(45);
  });
});
