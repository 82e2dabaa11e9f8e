import { countWords, normalizeSpacing } from "@reelsmith/shared";
import { estimateSpeechDuration } from "../captions/timing";
import type { Story } from "./types";

export const STORY_LIMITS = {
  minDurationSec: 20,
  maxDurationSec: 65,
  minWords: 50,
  maxWords: 160
};

/** First line, cut at its first sentence break. */
export function extractHook(text: string) {
  const firstLine = text.trim().split("\n")[0] ?? "";
  const match = firstLine.match(/^[^.!?]*[.!?]?/);
  return (match ? match[0] : firstLine).trim();
}

export function buildStory(genre: string, rawText: string): Story {
  const text = rawText.trim();
  const wordCount = countWords(text);
  return {
    genre,
    text,
    hook: extractHook(text),
    wordCount,
    estimatedDurationSec: Math.round(estimateSpeechDuration(wordCount) * 10) / 10
  };
}

/** Issues that make a story a poor fit for a 30-60 second short; empty when it fits. */
export function validateStory(story: Story): string[] {
  const issues: string[] = [];
  const duration = story.estimatedDurationSec;
  if (duration < STORY_LIMITS.minDurationSec) {
    issues.push(`Too short: ${duration}s (min ${STORY_LIMITS.minDurationSec}s)`);
  } else if (duration > STORY_LIMITS.maxDurationSec) {
    issues.push(`Too long: ${duration}s (max ${STORY_LIMITS.maxDurationSec}s)`);
  }
  if (story.wordCount < STORY_LIMITS.minWords) {
    issues.push(`Too few words: ${story.wordCount} (min ${STORY_LIMITS.minWords})`);
  } else if (story.wordCount > STORY_LIMITS.maxWords) {
    issues.push(`Too many words: ${story.wordCount} (max ${STORY_LIMITS.maxWords})`);
  }
  if (!normalizeSpacing(story.hook)) {
    issues.push("Missing hook");
  }
  return issues;
}
