import { promises as fs } from "node:fs";
import { getVoice, getVoiceTable } from "../lib/genres";
import { ProviderError, withRetry } from "../lib/errors";
import { isTransientProviderError, makeBodySnippet, makeUrl, requestBody } from "./http";
import type { SynthesizeRequest, TtsProvider } from "./types";

export const ELEVENLABS_DEFAULT_BASE_URL = "https://api.elevenlabs.io";
export const ELEVENLABS_OUTPUT_FORMAT = "mp3_44100_128";

export type ElevenLabsConfig = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  retryDelayMs: number;
};

export function getElevenLabsConfig(env: NodeJS.ProcessEnv = process.env): ElevenLabsConfig {
  const apiKey = env.ELEVENLABS_API_KEY?.trim() ?? "";
  if (!apiKey) {
    throw new Error("ELEVENLABS_API_KEY is required when REEL_TTS_PROVIDER=elevenlabs");
  }
  return {
    apiKey,
    baseUrl: env.ELEVENLABS_BASE_URL?.trim() || ELEVENLABS_DEFAULT_BASE_URL,
    timeoutMs: 120_000,
    retryDelayMs: 1000
  };
}

function isVoiceUnavailable(status: number, body: string) {
  return status >= 400 && status < 500 && status !== 429 && /voice/i.test(body);
}

export function createElevenLabsTts(config: ElevenLabsConfig): TtsProvider {
  async function convert(voiceId: string, request: SynthesizeRequest) {
    const url = makeUrl(config.baseUrl, `/v1/text-to-speech/${voiceId}?output_format=${ELEVENLABS_OUTPUT_FORMAT}`);
    return requestBody(
      url,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "audio/mpeg",
          "xi-api-key": config.apiKey
        },
        body: JSON.stringify({
          text: request.text,
          model_id: request.settings.modelId,
          voice_settings: {
            stability: request.settings.stability,
            similarity_boost: request.settings.similarityBoost,
            style: request.settings.style,
            use_speaker_boost: true
          }
        })
      },
      { provider: "elevenlabs", timeoutMs: config.timeoutMs, signal: request.signal }
    );
  }

  return {
    name: "elevenlabs",
    extension: ".mp3",
    async synthesize(request) {
      const voice = getVoice(request.voice);
      const fallback = getVoice(getVoiceTable().fallbackVoice);

      const audio = await withRetry(
        async () => {
          let res = await convert(voice.voiceId, request);
          if (!res.ok && voice.voiceId !== fallback.voiceId && isVoiceUnavailable(res.status, res.body.toString("utf8"))) {
            console.warn(`[reel] elevenlabs voice unavailable voice=${request.voice} fallback=${getVoiceTable().fallbackVoice}`);
            res = await convert(fallback.voiceId, request);
          }
          if (!res.ok) {
            throw new ProviderError("elevenlabs", res.status, makeBodySnippet(res.body.toString("utf8")));
          }
          if (res.body.length === 0) {
            throw new ProviderError("elevenlabs", res.status, "empty audio response");
          }
          return res.body;
        },
        {
          label: "elevenlabs",
          initialDelayMs: config.retryDelayMs,
          retryIf: isTransientProviderError,
          signal: request.signal
        }
      );

      await fs.writeFile(request.outPath, audio);
      console.log(`[reel] elevenlabs synthesized voice=${request.voice} bytes=${audio.length}`);
    }
  };
}
