import genresData from "../../data/genres.json";
import voicesData from "../../data/voices.json";
import { InputValidationError } from "./errors";

export type GenreProfile = {
  name: string;
  fonts: string[];
  hashtags: string[];
  callToAction: string;
  music: string[];
  hookPatterns: string[];
  systemPrompt: string;
};

export type GenreTable = {
  defaultGenre: string;
  generalHashtags: string[];
  redditHashtags: string[];
  redditHashtagGenres: string[];
  platformFonts: string[];
  genres: Record<string, GenreProfile>;
};

export type VoiceProfile = {
  voiceId: string;
  label: string;
  description: string;
};

export type VoiceTable = {
  defaultVoice: string;
  fallbackVoice: string;
  voices: Record<string, VoiceProfile>;
};

const genreTable: GenreTable = genresData;
const voiceTable: VoiceTable = voicesData;

export function getGenreTable() {
  return genreTable;
}

export function listGenres() {
  return Object.keys(genreTable.genres);
}

export function isKnownGenre(genre: string) {
  return Object.prototype.hasOwnProperty.call(genreTable.genres, genre);
}

export function getGenre(genre: string): GenreProfile {
  if (!isKnownGenre(genre)) {
    throw new InputValidationError(`Unknown genre "${genre}". Supported: ${listGenres().join(", ")}`);
  }
  return genreTable.genres[genre];
}

/** Genre used for styling lookups; unknown names fall back to the default genre. */
export function getGenreOrDefault(genre: string | undefined): GenreProfile {
  if (genre && isKnownGenre(genre)) {
    return genreTable.genres[genre];
  }
  return genreTable.genres[genreTable.defaultGenre];
}

export function getVoiceTable() {
  return voiceTable;
}

export function listVoices() {
  return Object.keys(voiceTable.voices);
}

export function getVoice(name: string): VoiceProfile {
  if (!Object.prototype.hasOwnProperty.call(voiceTable.voices, name)) {
    throw new InputValidationError(`Unknown voice "${name}". Supported: ${listVoices().join(", ")}`);
  }
  return voiceTable.voices[name];
}
