export type HealthResponse = {
  status: "ok" | string;
};

export type CaptionCue = {
  start: number;
  end: number;
  text: string;
};

export const JOB_TYPES = ["story", "audio", "subtitles", "video", "batch"] as const;
export type JobType = (typeof JOB_TYPES)[number];

export const JOB_STATUSES = ["pending", "running", "completed", "failed", "cancelled"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ["completed", "failed", "cancelled"];
export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = ["pending", "running"];

export type JobResult = Record<string, unknown>;
export type JobMetadata = Record<string, unknown>;

export interface Job {
  id: string;
  type: JobType;
  status: JobStatus;
  progress: number;
  phase?: string;
  result: JobResult;
  error?: string;
  metadata: JobMetadata;
  createdAt: string;
  updatedAt: string;
}

export type JobPatch = Partial<Pick<Job, "status" | "progress" | "phase" | "result" | "error" | "metadata">>;

export type DisplayMode = "sequential" | "overlay" | "slide";
export type OverlayPosition = "top" | "center" | "bottom";

export type VoiceSettings = {
  stability: number;
  similarityBoost: number;
  style: number;
  modelId: string;
};

export interface CreateJobRequest {
  type?: JobType;
  /** Story text; required unless a generating story provider is configured. */
  text?: string;
  /** Extra steering for generated stories. */
  prompt?: string;
  genre?: string;
  voice?: string;
  voiceSettings?: Partial<VoiceSettings>;
  wordsPerChunk?: number;
  background?: string;
  screenshots?: string[];
  displayMode?: DisplayMode;
  position?: OverlayPosition;
  skipCaptions?: boolean;
  /** Number of videos for a batch job. */
  count?: number;
}

export interface CreateJobResponse {
  jobId: string;
  status: JobStatus;
}

export interface CaptionsRequest {
  text: string;
  duration: number;
  wordsPerChunk?: number;
}

export interface CaptionsResponse {
  cues: CaptionCue[];
  srt: string;
}

export interface VideoJobResult extends JobResult {
  videoPath: string;
  subtitlePath: string | null;
  metadataPath: string;
  audioPath: string;
  durationSec: number;
  cueCount: number;
  audioCacheHit: boolean;
}

export type ApiError = {
  error: string;
  message?: string;
};
