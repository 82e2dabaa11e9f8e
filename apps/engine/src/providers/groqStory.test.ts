import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InputValidationError, ProviderError } from "../lib/errors";
import { startProviderEmulator, type ProviderEmulator } from "./__testutils__/providerEmulator";
import { createCustomStoryProvider } from "./customStory";
import { buildStoryPrompt, createGroqStoryProvider } from "./groqStory";
import { buildStory, extractHook, validateStory } from "./story";

function completion(content: string) {
  return JSON.stringify({ choices: [{ message: { role: "assistant", content } }] });
}

describe("createGroqStoryProvider", () => {
  let emulator: ProviderEmulator | null = null;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await emulator?.close();
    emulator = null;
  });

  function providerFor(url: string) {
    return createGroqStoryProvider(
      {
        apiKey: "test-secret",
        baseUrl: url,
        model: "llama-3.3-70b-versatile",
        temperature: 0.9,
        maxTokens: 400,
        timeoutMs: 5000,
        retryDelayMs: 1
      },
      () => 0
    );
  }

  it("sends the genre prompt and builds a story from the completion", async () => {
    emulator = await startProviderEmulator([
      { status: 200, body: completion("  I still cannot believe this actually happened. Then the cat sat down.  ") }
    ]);
    const story = await providerFor(emulator.url).generate({ genre: "comedy" });

    expect(story).toEqual({
      genre: "comedy",
      text: "I still cannot believe this actually happened. Then the cat sat down.",
      hook: "I still cannot believe this actually happened.",
      wordCount: 12,
      estimatedDurationSec: 4.8
    });
    const [request] = emulator.requests;
    expect(request.url).toBe("/v1/chat/completions");
    expect(request.headers.authorization).toBe("Bearer test-secret");
    const body: unknown = JSON.parse(request.body);
    expect(body).toMatchObject({ model: "llama-3.3-70b-versatile", temperature: 0.9, top_p: 0.95, stream: false });
  });

  it("retries server errors and fails on an empty completion", async () => {
    emulator = await startProviderEmulator([
      { status: 503, body: "busy" },
      { status: 200, body: completion("   ") }
    ]);
    await expect(providerFor(emulator.url).generate({ genre: "terror" })).rejects.toThrow(
      "groq request failed (200): Empty completion"
    );
    expect(emulator.requests).toHaveLength(2);
  });

  it("rejects unknown genres", async () => {
    await expect(providerFor("http://127.0.0.1:9").generate({ genre: "opera" })).rejects.toBeInstanceOf(
      InputValidationError
    );
  });

  it("puts the hook and caller steering into the prompt", () => {
    const prompt = buildStoryPrompt({ genre: "comedy", prompt: "Set it at a wedding." }, () => 0);
    expect(prompt.user).toContain('Hook to use: "Okay so nobody warned me about this"');
    expect(prompt.user.endsWith("Set it at a wedding.")).toBe(true);
  });

  it("surfaces client errors without retrying", async () => {
    emulator = await startProviderEmulator([{ status: 400, body: "bad request" }]);
    await expect(providerFor(emulator.url).generate({ genre: "comedy" })).rejects.toBeInstanceOf(ProviderError);
    expect(emulator.requests).toHaveLength(1);
  });
});

describe("story helpers", () => {
  it("extracts the first sentence of the first line as the hook", () => {
    expect(extractHook("Wait for it! Then more.\nSecond line")).toBe("Wait for it!");
    expect(extractHook("no punctuation here")).toBe("no punctuation here");
  });

  it("flags stories outside the short-form window", () => {
    const short = buildStory("comedy", "Too short.");
    expect(validateStory(short)).toEqual(["Too short: 0.8s (min 20s)", "Too few words: 2 (min 50)"]);
    const fits = buildStory("comedy", Array.from({ length: 100 }, (_, i) => `w${i}.`).join(" "));
    expect(validateStory(fits)).toEqual([]);
  });

  it("passes custom text through and requires it", async () => {
    const provider = createCustomStoryProvider();
    expect((await provider.generate({ genre: "aita", text: "AITA for this?" })).hook).toBe("AITA for this?");
    await expect(provider.generate({ genre: "aita" })).rejects.toBeInstanceOf(InputValidationError);
  });
});
