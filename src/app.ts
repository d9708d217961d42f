import type { Logger } from 'pino';
import { resolveStoragePaths } from './config/defaults.js';
import { ArtifactCleanup, retentionDaysFromEnv } from './services/artifact-cleanup.js';
import { PlannerFactory } from './services/planner-factory.js';
import { RunLedger } from './services/run-ledger.js';
import { SettingsStore } from './services/settings-store.js';
import { SoraGenerator } from './services/sora-generator.js';
import { WatermarkRemover } from './services/watermark-remover.js';
import { WeeklyScheduler } from './services/weekly-scheduler.js';
import { YouTubeUploader } from './services/youtube-uploader.js';
import { StageAdapters } from './types/pipeline.js';
import { logger as rootLogger } from './utils/logger.js';
import { PublishPipeline } from './workflows/publish-pipeline.js';

export interface AppContext {
  settings: SettingsStore;
  ledger: RunLedger;
  pipeline: PublishPipeline;
  scheduler: WeeklyScheduler;
  uploader: YouTubeUploader;
  cleanup: ArtifactCleanup;
  logger: Logger;
}

export interface AppContextOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Replaces individual stage adapters, e.g. with fakes. */
  adapters?: Partial<StageAdapters>;
}

export function defaultRedirectUri(env: NodeJS.ProcessEnv): string {
  return env.YOUTUBE_REDIRECT_URI || `http://localhost:${env.PORT || 3000}/api/youtube/oauth/callback`;
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? rootLogger;
  const paths = resolveStoragePaths(env);

  const settings = await SettingsStore.open(paths.settingsPath, { env, logger });
  const initial = settings.get();

  const uploader = new YouTubeUploader({
    credentialsPath: initial.youtubeClientSecretsPath,
    tokensPath: initial.youtubeTokensPath,
    redirectUri: defaultRedirectUri(env),
    env,
    logger
  });

  const adapters: StageAdapters = {
    planner: options.adapters?.planner ?? new PlannerFactory(settings, logger),
    generator: options.adapters?.generator ?? new SoraGenerator(settings, { logger }),
    postProcessor: options.adapters?.postProcessor ?? new WatermarkRemover(settings, { logger }),
    uploader: options.adapters?.uploader ?? uploader
  };

  const ledger = new RunLedger(paths.ledgerPath, { logger });
  const pipeline = new PublishPipeline({ settings, adapters, ledger, logger });
  const scheduler = new WeeklyScheduler(initial.weeklySchedule, (weekday) => pipeline.scheduledTrigger(weekday), {
    logger
  });
  const cleanup = new ArtifactCleanup({
    directories: [initial.tempDirectory, initial.outputDirectory],
    retentionDays: retentionDaysFromEnv(env),
    logger
  });

  return { settings, ledger, pipeline, scheduler, uploader, cleanup, logger };
}

/** Starts the scheduler when at least one weekday has a slot. */
export function startScheduler(context: AppContext): boolean {
  const schedule = context.settings.get().weeklySchedule;
  if (Object.keys(schedule).length === 0) {
    context.logger.info('No schedule configured, scheduler not started');
    return false;
  }

  context.scheduler.updateSchedule(schedule);
  context.scheduler.start();
  context.logger.info({ nextRun: context.scheduler.getNextRun() }, `Next run: ${context.scheduler.getNextRun()}`);
  return true;
}

/**
 * Stops the active run at its next stage boundary, stops the scheduler and waits until
 * neither a scheduled trigger nor a manual run is still in flight.
 */
export async function stopContext(context: AppContext): Promise<void> {
  context.pipeline.shutdown();
  await context.scheduler.stop();
  await context.scheduler.whenIdle();
  await context.pipeline.whenIdle();
}
