import { promises as fs } from "node:fs";
import path from "node:path";
import { createContentCache } from "../../cache/contentCache";
import { createApp } from "../../index";
import { createMemoryJobTracker } from "../../jobs/jobTrackerMemory";
import { createFakeMediaBackend } from "../../media/__testutils__/fakeMediaBackend";
import { createRenderPipeline } from "../../pipeline/renderVideo";
import { createCustomStoryProvider } from "../../providers/customStory";
import { createStubTts } from "../../providers/stubTts";
import { createMemoryJobQueue } from "../../queue/jobQueueMemory";
import { JobControls } from "../../worker/jobControls";

/** In-process engine on a fake encoder, served on an ephemeral port. */
export async function startTestApp(root: string) {
  const backend = createFakeMediaBackend();
  const backgroundsDir = path.join(root, "backgrounds");
  const outputDir = path.join(root, "output");
  await fs.mkdir(backgroundsDir, { recursive: true });
  await fs.writeFile(path.join(backgroundsDir, "loop.mp4"), "clip");

  const engine = {
    tracker: createMemoryJobTracker(),
    queue: createMemoryJobQueue(),
    controls: new JobControls(),
    requireText: true,
    pipeline: createRenderPipeline({
      backend,
      tts: createStubTts(backend),
      story: createCustomStoryProvider(),
      audioCache: await createContentCache({ namespace: "stub", backend: "file", rootDir: path.join(root, "cache") }),
      frame: { width: 1080, height: 1920, fps: 30, safeMargin: 320 },
      outputDir,
      backgroundsDir,
      fontsDir: path.join(root, "fonts"),
      platformFonts: [],
      random: () => 0
    })
  };

  const server = createApp(engine).listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("test server has no port");
  }
  const port = address.port;

  return {
    engine,
    backend,
    outputDir,
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}
