import { Weekday } from './schedule.js';

export type VideoResolution = '1080p' | '720p' | '480p';
export type PrivacyStatus = 'private' | 'unlisted' | 'public';
export type UploadDestination = 'channel' | 'shorts';
export type PlanningProvider = 'gemini' | 'openai';

export const PIPELINE_STEPS = [
  'planning',
  'generation',
  'watermark-removal',
  'enhancement',
  'upload'
] as const;

export type PipelineStep = (typeof PIPELINE_STEPS)[number];

export const STEP_LABELS: Record<PipelineStep, string> = {
  planning: 'AI Agent Planning',
  generation: 'Sora Video Generation',
  'watermark-removal': 'Watermark Removal',
  enhancement: 'Video Enhancement',
  upload: 'YouTube Upload'
};

export type StepStatus = 'pending' | 'running' | 'completed' | 'error';

export type ProgressReporter = (step: PipelineStep, percent: number, status: StepStatus) => void;

export type RunTrigger = 'manual' | 'scheduled';

export interface RunState {
  runId: string;
  trigger: RunTrigger;
  currentStep: PipelineStep;
  stopRequested: boolean;
  startedAt: string;
}

export interface VideoMetadata {
  title: string;
  description: string;
  tags: string[];
}

export interface UploadRequest extends VideoMetadata {
  videoPath: string;
  privacy: PrivacyStatus;
  /** Publish as a short-form video instead of a regular channel upload. */
  asShort: boolean;
}

// ─── Stage adapter contracts ───────────────────────────────────────

export interface PlanningAdapter {
  generatePrompt(): Promise<string>;
  generateMetadata(prompt: string): Promise<VideoMetadata>;
}

export interface GenerationAdapter {
  /** Resolves with the local path of the rendered video. */
  generate(prompt: string, durationSeconds: number, resolution: VideoResolution): Promise<string>;
}

export interface PostProcessAdapter {
  /** Must fall back to a degraded transformation rather than fail when its tooling is missing. */
  process(inputPath: string): Promise<string>;
}

export interface UploadAdapter {
  /** Resolves with the platform video id. */
  upload(request: UploadRequest): Promise<string>;
}

export interface StageAdapters {
  planner: PlanningAdapter;
  generator: GenerationAdapter;
  postProcessor: PostProcessAdapter;
  uploader: UploadAdapter;
}

// ─── Collaborators ─────────────────────────────────────────────────

export interface RunLedgerPort {
  hasPublishedToday(weekday: Weekday): Promise<boolean>;
  markPublished(videoId: string, videoTitle: string): Promise<unknown>;
}

export interface RunResult {
  ok: boolean;
  runId: string;
  trigger: RunTrigger;
  videoId?: string;
  title?: string;
  failedStep?: PipelineStep;
  error?: string;
  stopped?: boolean;
}
