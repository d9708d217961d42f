import crypto from 'crypto';
import type { Logger } from 'pino';
import { Settings } from '../schemas/settings.js';
import { SettingsSource } from '../services/settings-store.js';
import { Weekday } from '../types/schedule.js';
import {
  PipelineStep,
  ProgressReporter,
  RunLedgerPort,
  RunResult,
  RunState,
  RunTrigger,
  STEP_LABELS,
  StageAdapters,
  StepStatus,
  VideoMetadata
} from '../types/pipeline.js';
import { ConfigError, UploadError, UserStop, describeError, isPipelineError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { verifyArtifact } from '../utils/verify-artifact.js';

export interface PublishPipelineOptions {
  settings: SettingsSource;
  adapters: StageAdapters;
  ledger: RunLedgerPort;
  logger?: Logger;
  onProgress?: ProgressReporter;
  /** Threshold below which a verified artifact is logged as suspicious. */
  minArtifactBytes?: number;
}

/**
 * Plan → Generate → Watermark removal → Enhancement → Upload, strictly in sequence.
 *
 * Artifacts are verified between stages, a stop request is honoured at every stage
 * boundary, and a publish record is written only after the upload returned an id.
 * Callers must keep runs from overlapping; a second `run()` while one is active is
 * refused.
 */
export class PublishPipeline {
  private readonly settings: SettingsSource;
  private readonly adapters: StageAdapters;
  private readonly ledger: RunLedgerPort;
  private readonly logger: Logger;
  private readonly minArtifactBytes: number | undefined;
  private onProgress: ProgressReporter | undefined;

  private state: RunState | null = null;
  private activeRun: Promise<boolean> | null = null;
  private shuttingDown = false;
  private lastResult: RunResult | null = null;

  constructor(options: PublishPipelineOptions) {
    this.settings = options.settings;
    this.adapters = options.adapters;
    this.ledger = options.ledger;
    this.logger = createComponentLogger('pipeline', options.logger);
    this.onProgress = options.onProgress;
    this.minArtifactBytes = options.minArtifactBytes;
  }

  setProgressReporter(reporter: ProgressReporter | undefined): void {
    this.onProgress = reporter;
  }

  getState(): RunState | null {
    return this.state ? { ...this.state } : null;
  }

  getLastResult(): RunResult | null {
    return this.lastResult ? { ...this.lastResult } : null;
  }

  isRunning(): boolean {
    return this.state !== null;
  }

  /** Stops the active run at its next stage boundary and refuses new runs. */
  shutdown(): void {
    this.shuttingDown = true;
    if (this.state) this.requestStop();
  }

  /** Resolves once the active run, if any, has finished. */
  async whenIdle(): Promise<void> {
    await this.activeRun;
  }

  requestStop(): void {
    if (!this.state) {
      this.logger.info('Stop requested but no run is active');
      return;
    }
    this.state.stopRequested = true;
    this.logger.info({ runId: this.state.runId, step: this.state.currentStep }, 'Workflow stop requested');
  }

  /** Scheduler callback: skips when today's slot was already published. */
  async scheduledTrigger(weekday: Weekday): Promise<void> {
    if (await this.ledger.hasPublishedToday(weekday)) {
      this.logger.info({ weekday }, `Video already uploaded today (${weekday}), skipping`);
      return;
    }

    this.logger.info({ weekday }, `Starting scheduled workflow for ${weekday}`);
    await this.run('scheduled');
  }

  async run(trigger: RunTrigger = 'manual'): Promise<boolean> {
    if (this.shuttingDown) {
      this.logger.warn({ trigger }, 'Shutting down, not starting a workflow run');
      return false;
    }
    if (this.state) {
      this.logger.warn({ activeRunId: this.state.runId }, 'A workflow run is already active, refusing to start another');
      return false;
    }

    const state: RunState = {
      runId: crypto.randomUUID(),
      trigger,
      currentStep: 'planning',
      stopRequested: false,
      startedAt: new Date().toISOString()
    };
    this.state = state;

    const execution = this.execute(state);
    this.activeRun = execution;
    try {
      return await execution;
    } finally {
      this.activeRun = null;
    }
  }

  private async execute(state: RunState): Promise<boolean> {
    const { trigger } = state;
    const log = this.logger.child({ runId: state.runId, trigger });
    const settings = this.settings.get();

    log.info('Starting AI agent workflow');

    try {
      // Step 1: planning
      this.enterStep(state, 'planning');
      const { prompt, metadata } = await this.plan(settings, log);
      this.report('planning', 100, 'completed');
      this.throwIfStopped(state);

      // Step 2: generation
      this.enterStep(state, 'generation');
      const generatedPath = await this.generate(prompt, settings, log);
      await verifyArtifact(generatedPath, 'Generated video', log, this.minArtifactBytes);
      this.report('generation', 100, 'completed');
      this.throwIfStopped(state);

      // Step 3: watermark removal
      this.enterStep(state, 'watermark-removal');
      await verifyArtifact(generatedPath, 'Watermark removal input', log, this.minArtifactBytes);
      log.info({ input: generatedPath }, 'Step 3: Removing watermark');
      const cleanedPath = await this.adapters.postProcessor.process(generatedPath);
      await verifyArtifact(cleanedPath, 'Processed video', log, this.minArtifactBytes);
      log.info({ output: cleanedPath }, 'Watermark removed');
      this.report('watermark-removal', 100, 'completed');
      this.throwIfStopped(state);

      // Step 4: enhancement runs inside the post-processing tool
      this.enterStep(state, 'enhancement');
      this.report('enhancement', 100, 'completed');
      this.throwIfStopped(state);

      // Step 5: upload
      this.enterStep(state, 'upload');
      await verifyArtifact(cleanedPath, 'Upload input', log, this.minArtifactBytes);
      const videoId = await this.upload(cleanedPath, metadata, settings, log);

      await this.ledger.markPublished(videoId, metadata.title);
      this.report('upload', 100, 'completed');

      log.info({ videoId, title: metadata.title }, 'Workflow completed successfully');
      this.lastResult = { ok: true, runId: state.runId, trigger, videoId, title: metadata.title };
      return true;
    } catch (error) {
      if (error instanceof UserStop) {
        log.info({ step: state.currentStep }, 'Workflow stopped at stage boundary');
        this.lastResult = { ok: false, runId: state.runId, trigger, stopped: true };
        return false;
      }

      const message = describeError(error);
      log.error(
        {
          step: state.currentStep,
          code: isPipelineError(error) ? error.code : undefined,
          error: message
        },
        `Workflow failed: ${message}`
      );
      this.report(state.currentStep, 0, 'error');
      this.lastResult = {
        ok: false,
        runId: state.runId,
        trigger,
        failedStep: state.currentStep,
        error: message
      };
      return false;
    } finally {
      this.state = null;
    }
  }

  private async plan(settings: Settings, log: Logger): Promise<{ prompt: string; metadata: VideoMetadata }> {
    const provider = settings.planningProvider;
    const apiKey = provider === 'gemini' ? settings.geminiApiKey : settings.openaiApiKey;
    if (!apiKey) {
      throw new ConfigError(`${provider === 'gemini' ? 'Gemini' : 'OpenAI'} API key not configured`);
    }

    log.info({ provider }, 'Step 1: AI agent planning');
    const prompt = await this.adapters.planner.generatePrompt();
    log.info({ prompt }, 'Video prompt generated');

    const metadata = await this.adapters.planner.generateMetadata(prompt);
    log.info({ title: metadata.title, tags: metadata.tags.length }, `Metadata: Title='${metadata.title}'`);

    return { prompt, metadata };
  }

  private async generate(prompt: string, settings: Settings, log: Logger): Promise<string> {
    if (!settings.openaiApiKey) {
      throw new ConfigError('OpenAI API key not configured');
    }

    log.info(
      { duration: settings.videoDuration, resolution: settings.videoResolution },
      `Step 2: Generating ${settings.videoDuration}s video at ${settings.videoResolution}`
    );
    const videoPath = await this.adapters.generator.generate(prompt, settings.videoDuration, settings.videoResolution);
    log.info({ videoPath }, 'Video generated');
    return videoPath;
  }

  private async upload(videoPath: string, metadata: VideoMetadata, settings: Settings, log: Logger): Promise<string> {
    const asShort = settings.uploadDestination === 'shorts';
    log.info({ title: metadata.title, asShort, privacy: settings.privacyStatus }, 'Step 5: Uploading video');

    const videoId = await this.adapters.uploader.upload({
      videoPath,
      title: metadata.title,
      description: metadata.description,
      tags: metadata.tags,
      privacy: settings.privacyStatus,
      asShort
    });

    if (!videoId || !videoId.trim()) {
      throw new UploadError('Upload finished without a video id');
    }

    log.info({ videoId }, `Video uploaded successfully! ID: ${videoId}`);
    return videoId;
  }

  private enterStep(state: RunState, step: PipelineStep): void {
    state.currentStep = step;
    this.report(step, 0, 'running');
  }

  private throwIfStopped(state: RunState): void {
    if (state.stopRequested) throw new UserStop();
  }

  private report(step: PipelineStep, percent: number, status: StepStatus): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(step, percent, status);
    } catch (error) {
      this.logger.warn({ step, label: STEP_LABELS[step], error: describeError(error) }, 'Progress observer failed');
    }
  }
}
