import { countPauseMarkers, countWords, splitCaptionWords, type CaptionCue } from "@reelsmith/shared";
import { InputValidationError } from "../lib/errors";

export const DEFAULT_WORDS_PER_CHUNK = 4;
export const DEFAULT_PAUSE_OFFSET_SEC = 0.15;
export const SPEECH_WORDS_PER_SECOND = 2.5;

export type AllocateOptions = {
  wordsPerChunk?: number;
  pauseOffsetSec?: number;
};

function assertDuration(durationSec: number) {
  if (!Number.isFinite(durationSec) || durationSec < 0) {
    throw new InputValidationError(`Duration must be a non-negative number, got ${durationSec}`);
  }
}

/**
 * Spreads the words of `text` evenly over the audio duration and groups them
 * into cues of `wordsPerChunk` words.
 *
 * Every `...` pause marker lengthens the effective duration by
 * `pauseOffsetSec`, so text with pauses ends slightly after `durationSec`.
 * Use {@link fitCuesToDuration} to pin the last cue to the measured audio.
 */
export function allocateCues(
  text: string,
  durationSec: number,
  options: AllocateOptions = {}
): CaptionCue[] {
  const wordsPerChunk = options.wordsPerChunk ?? DEFAULT_WORDS_PER_CHUNK;
  const pauseOffsetSec = options.pauseOffsetSec ?? DEFAULT_PAUSE_OFFSET_SEC;
  if (!Number.isInteger(wordsPerChunk) || wordsPerChunk < 1) {
    throw new InputValidationError(`wordsPerChunk must be a positive integer, got ${wordsPerChunk}`);
  }
  assertDuration(durationSec);

  const words = splitCaptionWords(text);
  if (words.length === 0) {
    return [];
  }

  const effectiveDuration = durationSec + countPauseMarkers(text) * pauseOffsetSec;
  const timePerWord = effectiveDuration / words.length;

  const cues: CaptionCue[] = [];
  for (let i = 0; i < words.length; i += wordsPerChunk) {
    const chunk = words.slice(i, i + wordsPerChunk);
    cues.push({
      start: i * timePerWord,
      end: (i + chunk.length) * timePerWord,
      text: chunk.join(" ")
    });
  }
  return cues;
}

export function allocateWordCues(text: string, durationSec: number, pauseOffsetSec?: number) {
  return allocateCues(text, durationSec, { wordsPerChunk: 1, pauseOffsetSec });
}

/** Rescales cue times so the last cue ends exactly at `durationSec`. */
export function fitCuesToDuration(cues: CaptionCue[], durationSec: number): CaptionCue[] {
  assertDuration(durationSec);
  if (cues.length === 0) {
    return cues;
  }
  const lastEnd = cues[cues.length - 1].end;
  if (lastEnd <= 0) {
    return cues;
  }
  const ratio = durationSec / lastEnd;
  return cues.map((cue, index) => ({
    text: cue.text,
    start: cue.start * ratio,
    end: index === cues.length - 1 ? durationSec : cue.end * ratio
  }));
}

export function estimateSpeechDuration(wordCount: number) {
  return Math.max(0, wordCount) / SPEECH_WORDS_PER_SECOND;
}

export function estimateTextDuration(text: string) {
  return estimateSpeechDuration(countWords(text));
}
