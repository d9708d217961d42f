import axios, { AxiosInstance } from 'axios';
import { createWriteStream } from 'fs';
import { mkdir, rm } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { z } from 'zod';
import { GenerationAdapter, VideoResolution } from '../types/pipeline.js';
import { ConfigError, ProviderError, describeError, toProviderError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { SettingsSource } from './settings-store.js';

export const OPENAI_API_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_POLL_INTERVAL_MS = 10_000;

export const SUPPORTED_CLIP_SECONDS = [4, 8, 12] as const;
export type ClipSeconds = (typeof SUPPORTED_CLIP_SECONDS)[number];

// Landscape frame sizes; 1792x1024 is only offered by the pro model.
const RESOLUTION_SIZES: Record<VideoResolution, string> = {
  '1080p': '1792x1024',
  '720p': '1280x720',
  '480p': '1280x720'
};
const PRO_ONLY_SIZES = new Set(['1792x1024', '1024x1792']);
const STANDARD_SIZE = '1280x720';

const videoJobSchema = z.object({
  id: z.string().min(1),
  status: z.enum(['queued', 'in_progress', 'completed', 'failed']),
  progress: z.number().nullish(),
  error: z
    .object({
      code: z.string().nullish(),
      message: z.string().nullish()
    })
    .nullish()
});

export type VideoJob = z.infer<typeof videoJobSchema>;

/** Smallest supported clip length that covers the request, capped at the longest. */
export function resolveClipSeconds(durationSeconds: number): ClipSeconds {
  for (const seconds of SUPPORTED_CLIP_SECONDS) {
    if (durationSeconds <= seconds) return seconds;
  }
  return SUPPORTED_CLIP_SECONDS[SUPPORTED_CLIP_SECONDS.length - 1];
}

export function resolveFrameSize(resolution: VideoResolution, model: string): string {
  const size = RESOLUTION_SIZES[resolution];
  if (PRO_ONLY_SIZES.has(size) && !model.includes('pro')) return STANDARD_SIZE;
  return size;
}

export interface SoraGeneratorOptions {
  pollIntervalMs?: number;
  baseUrl?: string;
  now?: () => number;
  logger?: Logger;
}

export class SoraGenerator implements GenerationAdapter {
  private readonly pollIntervalMs: number;
  private readonly baseUrl: string;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly settings: SettingsSource,
    options: SoraGeneratorOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.baseUrl = options.baseUrl ?? OPENAI_API_BASE_URL;
    this.now = options.now ?? Date.now;
    this.logger = createComponentLogger('sora-generator', options.logger);
  }

  async generate(prompt: string, durationSeconds: number, resolution: VideoResolution): Promise<string> {
    const settings = this.settings.get();
    if (!settings.openaiApiKey) {
      throw new ConfigError('OpenAI API key not configured');
    }

    const http = axios.create({
      baseURL: this.baseUrl,
      timeout: 60_000,
      headers: { Authorization: `Bearer ${settings.openaiApiKey}` }
    });

    const seconds = resolveClipSeconds(durationSeconds);
    const size = resolveFrameSize(resolution, settings.soraModel);
    if (seconds !== durationSeconds) {
      this.logger.info({ requested: durationSeconds, seconds }, 'Requested duration mapped to a supported clip length');
    }

    const job = await this.createJob(http, { model: settings.soraModel, prompt, seconds: String(seconds), size });
    this.logger.info({ jobId: job.id, model: settings.soraModel, seconds, size }, 'Video generation started');

    const timeoutMs = settings.generationTimeoutMinutes * 60_000;
    const completed = await this.waitForCompletion(http, job, timeoutMs);

    await mkdir(settings.tempDirectory, { recursive: true });
    const outputPath = path.join(settings.tempDirectory, `generated_video_${this.now()}.mp4`);
    await this.download(http, completed.id, outputPath);

    this.logger.info({ jobId: completed.id, outputPath }, 'Video downloaded');
    return outputPath;
  }

  private async createJob(http: AxiosInstance, body: Record<string, string>): Promise<VideoJob> {
    let data: unknown;
    try {
      const response = await http.post('/videos', body);
      data = response.data;
    } catch (error) {
      throw toProviderError('sora', error, 'creating the video job');
    }
    return this.parseJob(data);
  }

  private async waitForCompletion(http: AxiosInstance, job: VideoJob, timeoutMs: number): Promise<VideoJob> {
    const deadline = this.now() + timeoutMs;
    let current = job;
    let lastProgress: number | null = null;

    while (current.status === 'queued' || current.status === 'in_progress') {
      if (this.now() >= deadline) {
        throw new ProviderError('sora', `Video generation timed out after ${Math.round(timeoutMs / 60_000)} minutes`, {
          reason: 'timeout'
        });
      }

      await sleep(this.pollIntervalMs);

      try {
        const response = await http.get(`/videos/${current.id}`);
        current = this.parseJob(response.data);
      } catch (error) {
        throw toProviderError('sora', error, 'polling the video job');
      }

      const progress = current.progress ?? null;
      if (progress !== lastProgress) {
        lastProgress = progress;
        this.logger.info({ jobId: current.id, status: current.status, progress }, 'Video generation progress');
      }
    }

    if (current.status === 'failed') {
      const reason = current.error?.message || current.error?.code || 'unknown error';
      throw new ProviderError('sora', `Video generation failed: ${reason}`);
    }
    return current;
  }

  private async download(http: AxiosInstance, jobId: string, outputPath: string): Promise<void> {
    try {
      const response = await http.get<Readable>(`/videos/${jobId}/content`, {
        responseType: 'stream',
        timeout: 0
      });
      await pipeline(response.data, createWriteStream(outputPath));
    } catch (error) {
      await rm(outputPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn({ outputPath, error: describeError(cleanupError) }, 'Could not remove partial download');
      });
      throw toProviderError('sora', error, 'downloading the video');
    }
  }

  private parseJob(data: unknown): VideoJob {
    const parsed = videoJobSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('sora', `Unexpected video job response: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
