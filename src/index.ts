export { createAppContext, startScheduler, stopContext } from './app.js';
export type { AppContext, AppContextOptions } from './app.js';
export { createControlServer } from './server.js';
export type { ControlServer, ProgressEvent } from './server.js';

export { PublishPipeline } from './workflows/publish-pipeline.js';
export type { PublishPipelineOptions } from './workflows/publish-pipeline.js';
export { WeeklyScheduler, isTimeMatch, describeNextRun, DEFAULT_CHECK_INTERVAL_MS } from './services/weekly-scheduler.js';
export { RunLedger } from './services/run-ledger.js';
export { SettingsStore, maskSecret } from './services/settings-store.js';
export type { SettingsSource } from './services/settings-store.js';

export { PlannerFactory } from './services/planner-factory.js';
export { GeminiPlanner } from './services/gemini-planner.js';
export { OpenAIPlanner } from './services/openai-planner.js';
export { SoraGenerator } from './services/sora-generator.js';
export { WatermarkRemover } from './services/watermark-remover.js';
export { YouTubeUploader } from './services/youtube-uploader.js';
export { ArtifactCleanup } from './services/artifact-cleanup.js';

export { settingsSchema, settingsUpdateSchema } from './schemas/settings.js';
export type { Settings, SettingsUpdate } from './schemas/settings.js';
export { verifyArtifact, MIN_ARTIFACT_BYTES } from './utils/verify-artifact.js';
export * from './utils/errors.js';
export * from './types/pipeline.js';
export * from './types/schedule.js';
