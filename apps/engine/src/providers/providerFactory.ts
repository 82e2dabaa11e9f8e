import { getStoryProviderName, getTtsProviderName } from "../lib/config";
import type { MediaBackend } from "../media/mediaBackend";
import { createCustomStoryProvider } from "./customStory";
import { createElevenLabsTts, getElevenLabsConfig } from "./elevenLabsTts";
import { createGroqStoryProvider, getGroqConfig } from "./groqStory";
import { createStubTts } from "./stubTts";
import type { StoryProvider, TtsProvider } from "./types";

const loggedProviders = new Set<string>();

function logProvider(kind: string, provider: string, reason: string) {
  if (loggedProviders.has(kind)) {
    return;
  }
  loggedProviders.add(kind);
  console.log(`[reel] ${kind}=${provider} reason=${reason}`);
}

export function getTtsProviderFromEnv(backend: MediaBackend): TtsProvider {
  const name = getTtsProviderName();
  if (name === "elevenlabs") {
    logProvider("tts", name, "env");
    return createElevenLabsTts(getElevenLabsConfig());
  }
  logProvider("tts", "stub", process.env.REEL_TTS_PROVIDER ? "env" : "missing-config");
  return createStubTts(backend);
}

export function getStoryProviderFromEnv(): StoryProvider {
  const name = getStoryProviderName();
  if (name === "groq") {
    logProvider("story", name, "env");
    return createGroqStoryProvider(getGroqConfig());
  }
  logProvider("story", "custom", process.env.REEL_STORY_PROVIDER ? "env" : "missing-config");
  return createCustomStoryProvider();
}
