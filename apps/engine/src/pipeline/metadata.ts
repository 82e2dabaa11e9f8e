import { countWords } from "@reelsmith/shared";
import { getGenreOrDefault, getGenreTable } from "../lib/genres";

export const MAX_HASHTAGS = 10;
export const MAX_CAPTION_HOOK_CHARS = 150;
export const PLATFORMS = ["tiktok", "instagram", "youtube_shorts"];
export const BEST_POST_TIMES = ["7-9pm EST", "12-2pm EST", "6-8am EST"];

export type ViralScoreInput = {
  durationSec: number;
  wordCount: number;
  hook: string;
};

export type VideoMetadataDocument = {
  video: {
    path: string;
    durationSec: number;
    format: string;
    resolution: string;
    createdAt: string;
  };
  content: {
    genre: string;
    story: string;
    wordCount: number;
    hook: string;
    contentHash: string;
  };
  assets: {
    audio: string;
    subtitles: string | null;
    background: string | null;
    font: string | null;
  };
  publishing: {
    platforms: string[];
    caption: string;
    hashtags: string[];
    hashtagsString: string;
    bestPostTimes: string[];
    suggestedMusic: string[];
  };
  optimization: {
    textColor: string;
    wordsPerChunk: number;
    viralScore: number;
  };
};

export function generateHashtags(genre: string): string[] {
  const table = getGenreTable();
  const hashtags = [...getGenreOrDefault(genre).hashtags.slice(0, 3), ...table.generalHashtags.slice(0, 3)];
  if (table.redditHashtagGenres.includes(genre)) {
    hashtags.push(...table.redditHashtags.slice(0, 3));
  }
  return hashtags.slice(0, MAX_HASHTAGS);
}

/** Text before the first sentence break. */
export function captionHook(story: string) {
  return story.split(/[.!?]/)[0].trim();
}

export function generateCaption(story: string, genre: string) {
  let hook = captionHook(story);
  if (hook.length > MAX_CAPTION_HOOK_CHARS) {
    hook = `${hook.slice(0, MAX_CAPTION_HOOK_CHARS - 3)}...`;
  }
  return `${hook}\n\n${getGenreOrDefault(genre).callToAction}`;
}

export function calculateViralScore(input: ViralScoreInput) {
  let score = 50;
  if (input.durationSec >= 30 && input.durationSec <= 60) {
    score += 20;
  } else if (input.durationSec < 30) {
    score -= 10;
  } else if (input.durationSec > 80) {
    score -= 20;
  }
  if (input.wordCount >= 100 && input.wordCount <= 150) {
    score += 15;
  } else if (input.wordCount < 80) {
    score -= 10;
  }
  if (input.hook.trim()) {
    score += 15;
  }
  return Math.max(0, Math.min(100, score));
}

export function buildVideoMetadata(input: {
  videoPath: string;
  audioPath: string;
  subtitlePath: string | null;
  backgroundPath: string | null;
  fontPath: string | null;
  genre: string;
  story: string;
  contentHash: string;
  durationSec: number;
  width: number;
  height: number;
  wordsPerChunk: number;
  now?: Date;
}): VideoMetadataDocument {
  const wordCount = countWords(input.story);
  const hook = captionHook(input.story);
  const hashtags = generateHashtags(input.genre);
  return {
    video: {
      path: input.videoPath,
      durationSec: Math.round(input.durationSec * 1000) / 1000,
      format: "vertical_9:16",
      resolution: `${input.width}x${input.height}`,
      createdAt: (input.now ?? new Date()).toISOString()
    },
    content: {
      genre: input.genre,
      story: input.story,
      wordCount,
      hook,
      contentHash: input.contentHash
    },
    assets: {
      audio: input.audioPath,
      subtitles: input.subtitlePath,
      background: input.backgroundPath,
      font: input.fontPath
    },
    publishing: {
      platforms: PLATFORMS,
      caption: generateCaption(input.story, input.genre),
      hashtags,
      hashtagsString: hashtags.join(" "),
      bestPostTimes: BEST_POST_TIMES,
      suggestedMusic: getGenreOrDefault(input.genre).music
    },
    optimization: {
      textColor: "yellow",
      wordsPerChunk: input.wordsPerChunk,
      viralScore: calculateViralScore({ durationSec: input.durationSec, wordCount, hook })
    }
  };
}
