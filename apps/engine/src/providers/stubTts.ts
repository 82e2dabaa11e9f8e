import type { MediaBackend } from "../media/mediaBackend";
import { estimateTextDuration } from "../captions/timing";
import { getVoice } from "../lib/genres";
import type { TtsProvider } from "./types";

const MIN_STUB_SECONDS = 1;

/** Silent narration of the estimated spoken length, for development and tests. */
export function createStubTts(backend: MediaBackend): TtsProvider {
  return {
    name: "stub",
    extension: ".mp3",
    async synthesize(request) {
      getVoice(request.voice);
      const durationSec = Math.max(MIN_STUB_SECONDS, estimateTextDuration(request.text));
      await backend.run(
        [
          "-f",
          "lavfi",
          "-i",
          "anullsrc=r=44100:cl=mono",
          "-t",
          durationSec.toFixed(3),
          "-c:a",
          "libmp3lame",
          "-b:a",
          "128k",
          request.outPath
        ],
        { signal: request.signal }
      );
    }
  };
}
