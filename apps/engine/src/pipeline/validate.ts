import {
  JOB_TYPES,
  type CaptionsRequest,
  type DisplayMode,
  type JobType,
  type OverlayPosition,
  type VoiceSettings
} from "@reelsmith/shared";
import { InputValidationError } from "../lib/errors";
import { getGenre, getGenreTable, getVoice, getVoiceTable } from "../lib/genres";
import { DEFAULT_VOICE_SETTINGS } from "../providers/types";

export const DEFAULT_VIDEO_WORDS_PER_CHUNK = 2;
export const MAX_WORDS_PER_CHUNK = 12;
export const MAX_SCREENSHOTS = 10;
export const MAX_BATCH_COUNT = 10;

const DISPLAY_MODES: readonly DisplayMode[] = ["sequential", "overlay", "slide"];
const POSITIONS: readonly OverlayPosition[] = ["top", "center", "bottom"];

/** A create-job body after defaults are applied; stored on the job as `metadata.request`. */
export type JobRequest = {
  type: JobType;
  text: string | null;
  prompt: string | null;
  genre: string;
  voice: string;
  voiceSettings: VoiceSettings;
  wordsPerChunk: number;
  background: string | null;
  screenshots: string[];
  displayMode: DisplayMode;
  position: OverlayPosition;
  skipCaptions: boolean;
  count: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, field: string): string | null {
  const value = body[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string") {
    throw new InputValidationError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InputValidationError(`${field} must not be empty`);
  }
  return trimmed;
}

function optionalInteger(body: Record<string, unknown>, field: string, min: number, max: number): number | null {
  const value = body[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new InputValidationError(`${field} must be an integer between ${min} and ${max}`);
  }
  return value;
}

function oneOf<T extends string>(body: Record<string, unknown>, field: string, allowed: readonly T[], fallback: T): T {
  const value = body[field];
  if (value === undefined || value === null) {
    return fallback;
  }
  const match = allowed.find((item) => item === value);
  if (!match) {
    throw new InputValidationError(`${field} must be one of: ${allowed.join(", ")}`);
  }
  return match;
}

function parseVoiceSettings(value: unknown): VoiceSettings {
  if (value === undefined || value === null) {
    return { ...DEFAULT_VOICE_SETTINGS };
  }
  if (!isRecord(value)) {
    throw new InputValidationError("voiceSettings must be an object");
  }
  const settings = { ...DEFAULT_VOICE_SETTINGS };
  for (const field of ["stability", "similarityBoost", "style"] as const) {
    const raw = value[field];
    if (raw === undefined) {
      continue;
    }
    if (typeof raw !== "number" || !Number.isFinite(raw) || raw < 0 || raw > 1) {
      throw new InputValidationError(`voiceSettings.${field} must be a number between 0 and 1`);
    }
    settings[field] = raw;
  }
  if (value.modelId !== undefined) {
    if (typeof value.modelId !== "string" || !value.modelId.trim()) {
      throw new InputValidationError("voiceSettings.modelId must be a non-empty string");
    }
    settings.modelId = value.modelId.trim();
  }
  return settings;
}

function parseScreenshots(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string" || !item.trim())) {
    throw new InputValidationError("screenshots must be an array of file paths");
  }
  if (value.length > MAX_SCREENSHOTS) {
    throw new InputValidationError(`screenshots accepts at most ${MAX_SCREENSHOTS} images`);
  }
  return value.map((item) => String(item).trim());
}

/**
 * Checks a create-job body and fills in defaults. `requireText` is set when
 * the story provider cannot write stories itself.
 */
export function parseJobRequest(body: unknown, options: { requireText: boolean }): JobRequest {
  if (!isRecord(body)) {
    throw new InputValidationError("Request body must be a JSON object");
  }
  const type = oneOf(body, "type", JOB_TYPES, "video");
  const text = optionalString(body, "text");
  if (!text && options.requireText) {
    throw new InputValidationError("text is required");
  }

  const genre = optionalString(body, "genre") ?? getGenreTable().defaultGenre;
  getGenre(genre);
  const voice = optionalString(body, "voice") ?? getVoiceTable().defaultVoice;
  getVoice(voice);

  const background = optionalString(body, "background");
  if (background && /[\\/]/.test(background)) {
    throw new InputValidationError("background must be a file name inside the backgrounds directory");
  }

  const count = optionalInteger(body, "count", 1, MAX_BATCH_COUNT);
  if (count !== null && type !== "batch") {
    throw new InputValidationError("count is only accepted for batch jobs");
  }

  const skipCaptions = body.skipCaptions ?? false;
  if (typeof skipCaptions !== "boolean") {
    throw new InputValidationError("skipCaptions must be a boolean");
  }

  return {
    type,
    text,
    prompt: optionalString(body, "prompt"),
    genre,
    voice,
    voiceSettings: parseVoiceSettings(body.voiceSettings),
    wordsPerChunk: optionalInteger(body, "wordsPerChunk", 1, MAX_WORDS_PER_CHUNK) ?? DEFAULT_VIDEO_WORDS_PER_CHUNK,
    background,
    screenshots: parseScreenshots(body.screenshots),
    displayMode: oneOf(body, "displayMode", DISPLAY_MODES, "sequential"),
    position: oneOf(body, "position", POSITIONS, "center"),
    skipCaptions,
    count: count ?? 1
  };
}

export function parseCaptionsRequest(body: unknown): Required<CaptionsRequest> {
  if (!isRecord(body)) {
    throw new InputValidationError("Request body must be a JSON object");
  }
  const text = optionalString(body, "text");
  if (!text) {
    throw new InputValidationError("text is required");
  }
  const duration = body.duration;
  if (typeof duration !== "number" || !Number.isFinite(duration) || duration <= 0) {
    throw new InputValidationError("duration must be a positive number of seconds");
  }
  return {
    text,
    duration,
    wordsPerChunk: optionalInteger(body, "wordsPerChunk", 1, MAX_WORDS_PER_CHUNK) ?? 4
  };
}
