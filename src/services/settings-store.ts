import type { Logger } from 'pino';
import { settingsFromEnv } from '../config/defaults.js';
import { Settings, SettingsInput, SettingsUpdate, settingsSchema } from '../schemas/settings.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { atomicWriteJson, isRecord, readJsonFile } from '../utils/json-file.js';
import { createComponentLogger } from '../utils/logger.js';

const SECRET_KEYS = ['geminiApiKey', 'openaiApiKey'] as const;

/** Read-only view the pipeline and adapters depend on. */
export interface SettingsSource {
  get(): Settings;
}

export function maskSecret(value: string): string {
  if (!value) return '';
  return value.length <= 4 ? '****' : `****${value.slice(-4)}`;
}

export class SettingsStore implements SettingsSource {
  private current: Settings;
  private readonly logger: Logger;

  private constructor(
    private readonly filePath: string,
    private readonly envSeed: SettingsInput,
    initial: Settings,
    logger: Logger
  ) {
    this.current = initial;
    this.logger = logger;
  }

  static async open(
    filePath: string,
    options: { env?: NodeJS.ProcessEnv; logger?: Logger } = {}
  ): Promise<SettingsStore> {
    const log = createComponentLogger('settings', options.logger);
    const envSeed = settingsFromEnv(options.env ?? process.env);

    let stored: Record<string, unknown> = {};
    try {
      const raw = await readJsonFile(filePath);
      if (raw === null) {
        log.info({ filePath }, 'No settings file found, using defaults');
      } else if (isRecord(raw)) {
        stored = raw;
      } else {
        log.warn({ filePath }, 'Settings file is not a JSON object, using defaults');
      }
    } catch (error) {
      log.warn({ filePath, error: describeError(error) }, 'Error loading settings, using defaults');
    }

    // Empty credentials in the file fall back to the environment.
    for (const key of SECRET_KEYS) {
      if (stored[key] === '') delete stored[key];
    }

    const parsed = settingsSchema.safeParse({ ...envSeed, ...stored });
    if (!parsed.success) {
      const details = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      throw new ConfigError(`Invalid settings in ${filePath}: ${details}`);
    }

    return new SettingsStore(filePath, envSeed, parsed.data, log);
  }

  get(): Settings {
    return { ...this.current, weeklySchedule: { ...this.current.weeklySchedule } };
  }

  async update(patch: SettingsUpdate): Promise<Settings> {
    const parsed = settingsSchema.safeParse({ ...this.current, ...patch });
    if (!parsed.success) {
      const details = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      throw new ConfigError(`Invalid settings: ${details}`);
    }

    const next = this.withEnvCredentials(parsed.data);
    await atomicWriteJson(this.filePath, this.toStored(next));
    this.current = next;
    this.logger.info({ keys: Object.keys(patch) }, 'Settings updated');
    return this.get();
  }

  redacted(): Settings {
    const copy = this.get();
    for (const key of SECRET_KEYS) {
      copy[key] = maskSecret(copy[key]);
    }
    return copy;
  }

  /** A cleared credential falls back to the environment, as it does on the next `open()`. */
  private withEnvCredentials(settings: Settings): Settings {
    const resolved = { ...settings };
    for (const key of SECRET_KEYS) {
      const fromEnv = this.envSeed[key];
      if (resolved[key] === '' && fromEnv) {
        resolved[key] = fromEnv;
      }
    }
    return resolved;
  }

  /** Credentials that only come from the environment are not written to disk. */
  private toStored(settings: Settings): Settings {
    const stored = { ...settings };
    for (const key of SECRET_KEYS) {
      if (this.envSeed[key] && this.envSeed[key] === stored[key]) {
        stored[key] = '';
      }
    }
    return stored;
  }
}
