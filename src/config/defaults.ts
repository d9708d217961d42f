import { SettingsInput } from '../schemas/settings.js';

export interface StoragePaths {
  settingsPath: string;
  ledgerPath: string;
}

export function resolveStoragePaths(env: NodeJS.ProcessEnv = process.env): StoragePaths {
  return {
    settingsPath: env.SETTINGS_PATH || './data/settings.json',
    ledgerPath: env.LEDGER_PATH || './logs/upload_tracker.json'
  };
}

/**
 * Settings seeded from the environment. Anything not set here falls through to the
 * schema defaults.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): SettingsInput {
  const seed: SettingsInput = {};

  if (env.GEMINI_API_KEY) seed.geminiApiKey = env.GEMINI_API_KEY;
  if (env.OPENAI_API_KEY) seed.openaiApiKey = env.OPENAI_API_KEY;
  if (env.PLANNING_PROVIDER === 'gemini' || env.PLANNING_PROVIDER === 'openai') {
    seed.planningProvider = env.PLANNING_PROVIDER;
  }
  if (env.YOUTUBE_OAUTH_CLIENT_PATH) seed.youtubeClientSecretsPath = env.YOUTUBE_OAUTH_CLIENT_PATH;
  if (env.YOUTUBE_TOKENS_PATH) seed.youtubeTokensPath = env.YOUTUBE_TOKENS_PATH;
  if (env.OUTPUT_DIR) seed.outputDirectory = env.OUTPUT_DIR;
  if (env.TEMP_DIR) seed.tempDirectory = env.TEMP_DIR;

  return seed;
}
