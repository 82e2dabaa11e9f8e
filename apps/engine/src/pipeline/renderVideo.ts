import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import type { CaptionCue, Job, JobResult, VideoJobResult } from "@reelsmith/shared";
import type { ContentCache } from "../cache/contentCache";
import { allocateCues, fitCuesToDuration } from "../captions/timing";
import { toSrt } from "../captions/subtitles";
import type { ProgressBridge } from "../jobs/progressBridge";
import { InputValidationError, MissingAssetError, RenderError } from "../lib/errors";
import { contentHash } from "../lib/hashing";
import type { MediaBackend } from "../media/mediaBackend";
import type { Story, StoryProvider, TtsProvider } from "../providers/types";
import { validateStory } from "../providers/story";
import { normalizeBackground, pickBackground, probeClip } from "../render/background";
import {
  DEFAULT_CAPTION_STYLE,
  captionOverlays,
  compose,
  type CompositionFrame
} from "../render/composition";
import { createCaptionMeasurer, resolveGenreFont } from "../render/fonts";
import { scheduleImageOverlays, type ImageSource, type Overlay } from "../render/overlays";
import { buildVideoMetadata } from "./metadata";
import { parseJobRequest, type JobRequest } from "./validate";

export const OUTPUT_HASH_CHARS = 12;

export type RenderDeps = {
  backend: MediaBackend;
  tts: TtsProvider;
  story: StoryProvider;
  audioCache: ContentCache;
  frame: CompositionFrame;
  outputDir: string;
  backgroundsDir: string;
  fontsDir: string;
  /** Fonts tried after the genre's own; defaults to the genre table's list. */
  platformFonts?: string[];
  random?: () => number;
  now?: () => Date;
};

export type RenderContext = {
  bridge: ProgressBridge;
  signal?: AbortSignal;
};

export interface RenderPipeline {
  run(job: Job, context: RenderContext): Promise<JobResult>;
}

type Narration = {
  path: string;
  key: string;
  hit: boolean;
  durationSec: number;
};

async function fileExists(filePath: string) {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function writeOutput(filePath: string, contents: string) {
  const tempPath = path.join(path.dirname(filePath), `.tmp-${randomUUID()}-${path.basename(filePath)}`);
  try {
    await fs.writeFile(tempPath, contents, "utf8");
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

export function outputBaseName(genre: string, contentKey: string) {
  return `${genre}_${contentKey.slice(0, OUTPUT_HASH_CHARS)}`;
}

/** One rendered output within a job; batch items count up from 0. */
export type OutputScope = { jobId: string; item: number };

/**
 * Key for the files one render writes. Narration alone is shared between
 * renders of the same text, so the full request and the job item are hashed in.
 */
export function outputKey(request: JobRequest, narrationKey: string, scope: OutputScope) {
  return contentHash({ narration: narrationKey, request, job: scope.jobId, item: scope.item });
}

export function readJobRequest(job: Job): JobRequest {
  if (job.metadata.request === undefined) {
    throw new InputValidationError(`Job ${job.id} has no request`);
  }
  return parseJobRequest(job.metadata.request, { requireText: false });
}

/**
 * Runs a job end to end: story, narration (through the audio cache), caption
 * cues, background normalization, composition and publishing metadata. Each
 * step reports through the job's progress bridge, which also stops the run
 * once the job is cancelled or times out.
 */
export function createRenderPipeline(deps: RenderDeps): RenderPipeline {
  const random = deps.random ?? Math.random;
  const now = deps.now ?? (() => new Date());

  async function tellStory(request: JobRequest, context: RenderContext): Promise<Story> {
    context.bridge.checkpoint();
    const story = await deps.story.generate(
      { genre: request.genre, text: request.text ?? undefined, prompt: request.prompt ?? undefined },
      { signal: context.signal }
    );
    const issues = validateStory(story);
    if (issues.length > 0) {
      console.warn(`[reel] story outside short-form limits genre=${story.genre} issues="${issues.join("; ")}"`);
    }
    return story;
  }

  async function narrate(story: Story, request: JobRequest, context: RenderContext): Promise<Narration> {
    const report = context.bridge.stage("audio");
    const cached = await deps.audioCache.getOrCreate(story.text, request.voice, request.voiceSettings, (outPath) =>
      deps.tts.synthesize({
        text: story.text,
        voice: request.voice,
        settings: request.voiceSettings,
        outPath,
        signal: context.signal
      })
    );
    const probe = await deps.backend.probe(cached.path, { signal: context.signal });
    if (!(probe.durationSec > 0)) {
      throw new RenderError(`Narration has no measurable duration: ${cached.path}`);
    }
    report(1);
    return { path: cached.path, key: cached.key, hit: cached.hit, durationSec: probe.durationSec };
  }

  async function writeCaptions(
    story: Story,
    narration: Narration,
    request: JobRequest,
    baseName: string,
    context: RenderContext
  ) {
    const report = context.bridge.stage("captions");
    const cues = fitCuesToDuration(
      allocateCues(story.text, narration.durationSec, { wordsPerChunk: request.wordsPerChunk }),
      narration.durationSec
    );
    const subtitlePath = path.join(deps.outputDir, `${baseName}.srt`);
    await writeOutput(subtitlePath, toSrt(cues));
    report(1);
    return { cues, subtitlePath };
  }

  async function resolveBackground(request: JobRequest) {
    if (!request.background) {
      return pickBackground(deps.backgroundsDir, random);
    }
    const candidate = path.join(deps.backgroundsDir, request.background);
    if (!(await fileExists(candidate))) {
      throw new MissingAssetError(`Background not found: ${request.background}`, { dir: deps.backgroundsDir });
    }
    return candidate;
  }

  async function screenshotOverlays(request: JobRequest, durationSec: number, signal?: AbortSignal) {
    const images: ImageSource[] = [];
    for (const screenshot of request.screenshots) {
      if (!(await fileExists(screenshot))) {
        throw new MissingAssetError(`Screenshot not found: ${screenshot}`, { path: screenshot });
      }
      const probe = await deps.backend.probe(screenshot, { signal });
      if (!probe.width || !probe.height) {
        throw new RenderError(`Screenshot has no image stream: ${screenshot}`);
      }
      images.push({ path: screenshot, width: probe.width, height: probe.height });
    }
    return scheduleImageOverlays(images, durationSec, {
      mode: request.displayMode,
      position: request.position,
      frame: deps.frame
    });
  }

  async function renderOne(request: JobRequest, scope: OutputScope, context: RenderContext): Promise<VideoJobResult> {
    const story = await tellStory(request, context);
    const narration = await narrate(story, request, context);
    const baseName = outputBaseName(request.genre, outputKey(request, narration.key, scope));
    const captions: { cues: CaptionCue[]; subtitlePath: string | null } = request.skipCaptions
      ? { cues: [], subtitlePath: null }
      : await writeCaptions(story, narration, request, baseName, context);

    const reportBackground = context.bridge.stage("background");
    const backgroundPath = await resolveBackground(request);
    const source = await probeClip(deps.backend, backgroundPath, context.signal);
    const tempBackground = path.join(deps.outputDir, `.tmp-${randomUUID()}-background.mp4`);
    const videoPath = path.join(deps.outputDir, `${baseName}.mp4`);
    const metadataPath = path.join(deps.outputDir, `${baseName}.json`);

    try {
      await normalizeBackground({
        backend: deps.backend,
        source,
        target: {
          width: deps.frame.width,
          height: deps.frame.height,
          durationSec: narration.durationSec,
          fps: deps.frame.fps
        },
        outPath: tempBackground,
        random,
        signal: context.signal
      });
      reportBackground(1);

      const reportCompose = context.bridge.stage("compose");
      const font = resolveGenreFont(request.genre, { fontsDir: deps.fontsDir, platformFonts: deps.platformFonts });
      const overlays: Overlay[] =
        request.screenshots.length > 0
          ? await screenshotOverlays(request, narration.durationSec, context.signal)
          : captionOverlays(captions.cues);
      await compose(tempBackground, overlays, {
        backend: deps.backend,
        frame: deps.frame,
        durationSec: narration.durationSec,
        outPath: videoPath,
        audioPath: narration.path,
        font,
        measurer: createCaptionMeasurer(font, DEFAULT_CAPTION_STYLE.fontSize),
        signal: context.signal,
        onProgress: reportCompose
      });

      const reportMetadata = context.bridge.stage("metadata");
      const metadata = buildVideoMetadata({
        videoPath,
        audioPath: narration.path,
        subtitlePath: captions.subtitlePath,
        backgroundPath,
        fontPath: font?.path ?? null,
        genre: request.genre,
        story: story.text,
        contentHash: narration.key,
        durationSec: narration.durationSec,
        width: deps.frame.width,
        height: deps.frame.height,
        wordsPerChunk: request.wordsPerChunk,
        now: now()
      });
      await writeOutput(metadataPath, `${JSON.stringify(metadata, null, 2)}\n`);
      reportMetadata(1);
    } finally {
      await fs.rm(tempBackground, { force: true });
    }

    console.log(
      `[reel] video rendered out=${path.basename(videoPath)} durationSec=${narration.durationSec.toFixed(2)} cues=${captions.cues.length} audioCacheHit=${narration.hit}`
    );
    return {
      videoPath,
      subtitlePath: captions.subtitlePath,
      metadataPath,
      audioPath: narration.path,
      durationSec: narration.durationSec,
      cueCount: captions.cues.length,
      audioCacheHit: narration.hit
    };
  }

  return {
    async run(job, context) {
      const request = readJobRequest(job);
      await fs.mkdir(deps.outputDir, { recursive: true });

      switch (request.type) {
        case "story": {
          const story = await tellStory(request, context);
          return { ...story, issues: validateStory(story) };
        }
        case "audio": {
          const story = await tellStory(request, context);
          const narration = await narrate(story, request, context);
          return {
            text: story.text,
            audioPath: narration.path,
            durationSec: narration.durationSec,
            audioCacheHit: narration.hit
          };
        }
        case "subtitles": {
          const story = await tellStory(request, context);
          const narration = await narrate(story, request, context);
          const baseName = outputBaseName(request.genre, outputKey(request, narration.key, { jobId: job.id, item: 0 }));
          const captions = await writeCaptions(story, narration, request, baseName, context);
          return {
            text: story.text,
            audioPath: narration.path,
            durationSec: narration.durationSec,
            subtitlePath: captions.subtitlePath,
            cueCount: captions.cues.length,
            cues: captions.cues
          };
        }
        case "batch": {
          const videos: VideoJobResult[] = [];
          for (let index = 0; index < request.count; index++) {
            context.bridge.setWindow((index * 100) / request.count, ((index + 1) * 100) / request.count);
            videos.push(await renderOne(request, { jobId: job.id, item: index }, context));
          }
          return { videos };
        }
        default:
          return renderOne(request, { jobId: job.id, item: 0 }, context);
      }
    }
  };
}
