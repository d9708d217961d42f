import ffmpeg from 'fluent-ffmpeg';
import { execFile } from 'child_process';
import { copyFile, mkdir, stat } from 'fs/promises';
import path from 'path';
import { promisify } from 'util';
import type { Logger } from 'pino';
import { PostProcessAdapter } from '../types/pipeline.js';
import { ProviderError, describeError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { SettingsSource } from './settings-store.js';

const execFileAsync = promisify(execFile);

/** Keeps the top-left 90% of the frame, dropping the corner the watermark sits in. */
export const WATERMARK_CROP_FILTER = 'crop=iw*0.9:ih*0.9:0:0';

export type EncoderProfile = {
  codec: 'h264_nvenc' | 'libx264' | 'copy';
  inputOptions: string[];
  outputOptions: string[];
};

const NVENC_PROFILE: EncoderProfile = {
  codec: 'h264_nvenc',
  inputOptions: ['-hwaccel', 'cuda'],
  outputOptions: ['-preset', 'p4', '-cq', '23', '-b:v', '0']
};

const X264_PROFILE: EncoderProfile = {
  codec: 'libx264',
  inputOptions: [],
  outputOptions: ['-preset', 'medium', '-crf', '23', '-pix_fmt', 'yuv420p']
};

const COPY_PROFILE: EncoderProfile = { codec: 'copy', inputOptions: [], outputOptions: [] };

export function selectEncoderProfile(availableEncoders: string[], hasNvidiaGpu: boolean): EncoderProfile {
  if (hasNvidiaGpu && availableEncoders.includes('h264_nvenc')) return NVENC_PROFILE;
  if (availableEncoders.includes('libx264')) return X264_PROFILE;
  return COPY_PROFILE;
}

function listEncoders(): Promise<string[]> {
  return new Promise((resolve, reject) => {
    ffmpeg.getAvailableEncoders((err, encoders) => {
      if (err) reject(err);
      else resolve(Object.keys(encoders));
    });
  });
}

async function detectNvidiaGpu(): Promise<boolean> {
  try {
    await execFileAsync('nvidia-smi', [], { timeout: 5000 });
    return true;
  } catch {
    return false;
  }
}

async function isNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile() && info.size > 0;
  } catch {
    return false;
  }
}

export interface WatermarkRemoverOptions {
  /** Overrides encoder detection. */
  detectEncoder?: () => Promise<EncoderProfile>;
  now?: () => number;
  logger?: Logger;
}

/**
 * Crops the generator's watermark and re-encodes. Any ffmpeg failure degrades to
 * copying the input unchanged.
 */
export class WatermarkRemover implements PostProcessAdapter {
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly detectEncoder: () => Promise<EncoderProfile>;
  private encoder: Promise<EncoderProfile> | null = null;

  constructor(
    private readonly settings: SettingsSource,
    options: WatermarkRemoverOptions = {}
  ) {
    this.logger = createComponentLogger('watermark-remover', options.logger);
    this.now = options.now ?? Date.now;
    this.detectEncoder = options.detectEncoder ?? (() => this.probeEncoder());
  }

  async process(inputPath: string): Promise<string> {
    const { outputDirectory } = this.settings.get();
    await mkdir(outputDirectory, { recursive: true });
    const outputPath = path.join(outputDirectory, `cleaned_video_${this.now()}.mp4`);

    const encoder = await this.getEncoder();
    if (encoder.codec !== 'copy') {
      try {
        await this.encode(inputPath, outputPath, encoder);
        if (await isNonEmptyFile(outputPath)) {
          this.logger.info({ outputPath, codec: encoder.codec }, 'Watermark removed');
          return outputPath;
        }
        this.logger.warn({ outputPath }, 'FFmpeg produced no output, copying original');
      } catch (error) {
        this.logger.warn({ error: describeError(error), codec: encoder.codec }, 'FFmpeg failed, copying original');
      }
    } else {
      this.logger.warn('No usable video encoder, copying original without watermark removal');
    }

    try {
      await copyFile(inputPath, outputPath);
    } catch (error) {
      throw new ProviderError('watermark-remover', `Could not produce processed video: ${describeError(error)}`, {
        cause: error
      });
    }
    return outputPath;
  }

  private getEncoder(): Promise<EncoderProfile> {
    if (!this.encoder) {
      this.encoder = this.detectEncoder().catch((error: unknown) => {
        this.logger.warn({ error: describeError(error) }, 'Encoder detection failed, falling back to stream copy');
        return COPY_PROFILE;
      });
    }
    return this.encoder;
  }

  private async probeEncoder(): Promise<EncoderProfile> {
    const [encoders, hasGpu] = await Promise.all([listEncoders(), detectNvidiaGpu()]);
    const profile = selectEncoderProfile(encoders, hasGpu);
    this.logger.info({ codec: profile.codec, hasGpu }, 'Video encoder selected');
    return profile;
  }

  private encode(inputPath: string, outputPath: string, encoder: EncoderProfile): Promise<void> {
    return new Promise((resolve, reject) => {
      const command = ffmpeg(inputPath);
      if (encoder.inputOptions.length > 0) {
        command.inputOptions(encoder.inputOptions);
      }
      command
        .videoFilters(WATERMARK_CROP_FILTER)
        .videoCodec(encoder.codec)
        .outputOptions(encoder.outputOptions)
        .audioCodec('copy')
        .on('start', (commandLine: string) => {
          this.logger.debug({ commandLine }, 'FFmpeg started');
        })
        .on('error', (err: Error) => {
          reject(err);
        })
        .on('end', () => {
          resolve();
        })
        .save(outputPath);
    });
  }
}
