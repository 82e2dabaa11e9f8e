import { createContentCache } from "./cache/contentCache";
import type { JobTracker } from "./jobs/jobTracker";
import { getJobTracker } from "./jobs/jobTrackerFactory";
import { getBackgroundsDir, getFontsDir, getOutputDir, getVideoConfig } from "./lib/config";
import { createFfmpegBackend } from "./media/ffmpeg";
import type { MediaBackend } from "./media/mediaBackend";
import { createRenderPipeline, type RenderPipeline } from "./pipeline/renderVideo";
import { getStoryProviderFromEnv, getTtsProviderFromEnv } from "./providers/providerFactory";
import { getJobQueue, type JobQueue } from "./queue/jobQueue";
import { JobControls } from "./worker/jobControls";

/** Everything the HTTP layer and the worker share within one process. */
export type Engine = {
  tracker: JobTracker;
  queue: JobQueue;
  pipeline: RenderPipeline;
  controls: JobControls;
  backend: MediaBackend;
  /** True when the story provider only passes caller text through. */
  requireText: boolean;
};

export async function createEngine(): Promise<Engine> {
  const backend = createFfmpegBackend();
  const tts = getTtsProviderFromEnv(backend);
  const story = getStoryProviderFromEnv();
  const audioCache = await createContentCache({ namespace: tts.name, extension: tts.extension });
  const pipeline = createRenderPipeline({
    backend,
    tts,
    story,
    audioCache,
    frame: getVideoConfig(),
    outputDir: getOutputDir(),
    backgroundsDir: getBackgroundsDir(),
    fontsDir: getFontsDir()
  });
  return {
    tracker: getJobTracker(),
    queue: await getJobQueue(),
    pipeline,
    controls: new JobControls(),
    backend,
    requireText: story.name === "custom"
  };
}
