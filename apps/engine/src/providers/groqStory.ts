import { getGenre } from "../lib/genres";
import { ProviderError, withRetry } from "../lib/errors";
import { isTransientProviderError, makeBodySnippet, makeUrl, requestBody } from "./http";
import { buildStory } from "./story";
import type { StoryProvider, StoryRequest } from "./types";

export const GROQ_DEFAULT_BASE_URL = "https://api.groq.com/openai";

export type GroqConfig = {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  retryDelayMs: number;
};

function readNumber(value: string | undefined, fallback: number) {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) ? parsed : fallback;
}

export function getGroqConfig(env: NodeJS.ProcessEnv = process.env): GroqConfig {
  const apiKey = env.GROQ_API_KEY?.trim() ?? "";
  if (!apiKey) {
    throw new Error("GROQ_API_KEY is required when REEL_STORY_PROVIDER=groq");
  }
  return {
    apiKey,
    baseUrl: env.GROQ_BASE_URL?.trim() || GROQ_DEFAULT_BASE_URL,
    model: env.GROQ_MODEL?.trim() || "llama-3.3-70b-versatile",
    temperature: readNumber(env.REEL_STORY_TEMPERATURE, 0.9),
    maxTokens: readNumber(env.REEL_STORY_MAX_TOKENS, 400),
    timeoutMs: 60_000,
    retryDelayMs: 1000
  };
}

export function buildStoryPrompt(request: StoryRequest, random: () => number = Math.random) {
  const genre = getGenre(request.genre);
  const hooks = genre.hookPatterns;
  const hook = hooks[Math.min(hooks.length - 1, Math.floor(random() * hooks.length))] ?? "";
  const lines = [
    `Generate a short ${genre.name} story.`,
    "",
    `Hook to use: "${hook}"`,
    "",
    "Requirements:",
    "- Start with the hook exactly as written",
    "- 30 to 60 seconds read aloud (75 to 150 words total)",
    "- A complete beginning, middle and end with a twist or punchline",
    "- First person, conversational, fast-paced",
    "- Plain text only, no title"
  ];
  if (request.prompt?.trim()) {
    lines.push("", request.prompt.trim());
  }
  return { system: genre.systemPrompt, user: lines.join("\n") };
}

function readCompletionText(payload: unknown): string | null {
  if (!payload || typeof payload !== "object") {
    return null;
  }
  const choices: unknown = Reflect.get(payload, "choices");
  if (!Array.isArray(choices) || choices.length === 0) {
    return null;
  }
  const first: unknown = choices[0];
  const message: unknown = first && typeof first === "object" ? Reflect.get(first, "message") : null;
  const content: unknown = message && typeof message === "object" ? Reflect.get(message, "content") : null;
  return typeof content === "string" && content.trim() ? content.trim() : null;
}

/** Story generation over Groq's OpenAI-compatible chat completions endpoint. */
export function createGroqStoryProvider(config: GroqConfig, random: () => number = Math.random): StoryProvider {
  return {
    name: "groq",
    async generate(request, options = {}) {
      const prompt = buildStoryPrompt(request, random);
      const text = await withRetry(
        async () => {
          const res = await requestBody(
            makeUrl(config.baseUrl, "/v1/chat/completions"),
            {
              method: "POST",
              headers: {
                "Content-Type": "application/json",
                Authorization: `Bearer ${config.apiKey}`
              },
              body: JSON.stringify({
                model: config.model,
                messages: [
                  { role: "system", content: prompt.system },
                  { role: "user", content: prompt.user }
                ],
                temperature: config.temperature,
                max_tokens: config.maxTokens,
                top_p: 0.95,
                stream: false
              })
            },
            { provider: "groq", timeoutMs: config.timeoutMs, signal: options.signal }
          );
          const raw = res.body.toString("utf8");
          if (!res.ok) {
            throw new ProviderError("groq", res.status, makeBodySnippet(raw));
          }
          let payload: unknown;
          try {
            payload = JSON.parse(raw);
          } catch {
            throw new ProviderError("groq", res.status, "Invalid JSON response");
          }
          const content = readCompletionText(payload);
          if (!content) {
            throw new ProviderError("groq", res.status, "Empty completion");
          }
          return content;
        },
        {
          label: "groq",
          initialDelayMs: config.retryDelayMs,
          retryIf: isTransientProviderError,
          signal: options.signal
        }
      );
      const story = buildStory(request.genre, text);
      console.log(`[reel] story generated genre=${request.genre} words=${story.wordCount}`);
      return story;
    }
  };
}
