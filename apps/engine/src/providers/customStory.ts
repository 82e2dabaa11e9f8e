import { getGenre } from "../lib/genres";
import { InputValidationError } from "../lib/errors";
import { buildStory } from "./story";
import type { StoryProvider } from "./types";

/** Passes caller-written text through as the story. */
export function createCustomStoryProvider(): StoryProvider {
  return {
    name: "custom",
    async generate(request) {
      getGenre(request.genre);
      const text = request.text?.trim();
      if (!text) {
        throw new InputValidationError("Story text is required when no story generator is configured");
      }
      return buildStory(request.genre, text);
    }
  };
}
