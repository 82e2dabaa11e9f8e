import type { VoiceSettings } from "@reelsmith/shared";
import type { StoryProviderName, TtsProviderName } from "../lib/config";

export const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
  stability: 0.45,
  similarityBoost: 0.75,
  style: 0.3,
  modelId: "eleven_turbo_v2_5"
};

export type StoryRequest = {
  genre: string;
  /** Caller-written story text; required by the pass-through provider. */
  text?: string;
  /** Extra steering appended to the generation prompt. */
  prompt?: string;
};

export type Story = {
  genre: string;
  text: string;
  /** Opening sentence, used as the publishing caption. */
  hook: string;
  wordCount: number;
  estimatedDurationSec: number;
};

export interface StoryProvider {
  name: StoryProviderName;
  generate(request: StoryRequest, options?: { signal?: AbortSignal }): Promise<Story>;
}

export type SynthesizeRequest = {
  text: string;
  /** Name from the voices table. */
  voice: string;
  settings: VoiceSettings;
  outPath: string;
  signal?: AbortSignal;
};

export interface TtsProvider {
  name: TtsProviderName;
  /** Container extension of the files `synthesize` writes. */
  extension: string;
  synthesize(request: SynthesizeRequest): Promise<void>;
}
