import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { settingsFromEnv } from '../config/defaults.js';
import { settingsSchema, settingsUpdateSchema, weeklyScheduleSchema } from '../schemas/settings.js';
import { SettingsStore, maskSecret } from '../services/settings-store.js';
import { ConfigError } from '../utils/errors.js';
import { makeTempDir, removeDir } from './test-helpers.js';

describe('weeklyScheduleSchema', () => {
  it('trims times and orders slots Monday first', () => {
    const result = weeklyScheduleSchema.parse({ Friday: ' 14:30 ', Monday: '09:00' });
    expect(result).toEqual({ Monday: '09:00', Friday: '14:30' });
    expect(Object.keys(result)).toEqual(['Monday', 'Friday']);
  });

  it('rejects unknown weekdays', () => {
    const result = weeklyScheduleSchema.safeParse({ Funday: '09:00' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0].message).toBe('Unknown weekday: Funday');
    }
  });

  it.each(['24:00', '12:60', '1200', 'noon'])('rejects the time %s', (time) => {
    expect(weeklyScheduleSchema.safeParse({ Monday: time }).success).toBe(false);
  });
});

describe('settingsSchema', () => {
  it('fills every default', () => {
    const settings = settingsSchema.parse({});
    expect(settings).toMatchObject({
      geminiApiKey: '',
      openaiApiKey: '',
      planningProvider: 'gemini',
      videoDuration: 30,
      videoResolution: '1080p',
      soraModel: 'sora-2',
      generationTimeoutMinutes: 20,
      weeklySchedule: {},
      uploadDestination: 'channel',
      privacyStatus: 'public'
    });
  });

  it('bounds the video duration', () => {
    expect(settingsSchema.safeParse({ videoDuration: 4 }).success).toBe(false);
    expect(settingsSchema.safeParse({ videoDuration: 61 }).success).toBe(false);
    expect(settingsSchema.safeParse({ videoDuration: 12.5 }).success).toBe(false);
  });
});

describe('settingsUpdateSchema', () => {
  it('accepts a partial update', () => {
    expect(settingsUpdateSchema.parse({ privacyStatus: 'unlisted' })).toEqual({ privacyStatus: 'unlisted' });
  });

  it('rejects an empty update', () => {
    const result = settingsUpdateSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0].message).toBe('At least one setting must be provided');
    }
  });

  it('rejects values outside their enum', () => {
    expect(settingsUpdateSchema.safeParse({ videoResolution: '4k' }).success).toBe(false);
  });
});

describe('settingsFromEnv', () => {
  it('seeds credentials, provider and paths', () => {
    expect(
      settingsFromEnv({
        GEMINI_API_KEY: 'test-gemini-key',
        PLANNING_PROVIDER: 'openai',
        OUTPUT_DIR: '/srv/out'
      })
    ).toEqual({ geminiApiKey: 'test-gemini-key', planningProvider: 'openai', outputDirectory: '/srv/out' });
  });

  it('ignores an unknown planning provider', () => {
    expect(settingsFromEnv({ PLANNING_PROVIDER: 'llama' })).toEqual({});
  });
});

describe('maskSecret', () => {
  it('keeps only the last four characters', () => {
    expect(maskSecret('test-gemini-key')).toBe('****-key');
    expect(maskSecret('abc')).toBe('****');
    expect(maskSecret('')).toBe('');
  });
});

describe('SettingsStore', () => {
  let dir: string;
  let filePath: string;
  const env = { GEMINI_API_KEY: 'test-gemini-key', OPENAI_API_KEY: 'test-openai-key' };

  beforeEach(async () => {
    dir = await makeTempDir('settings-');
    filePath = path.join(dir, 'data', 'settings.json');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('starts from defaults and the environment when no file exists', async () => {
    const store = await SettingsStore.open(filePath, { env });
    const settings = store.get();

    expect(settings.geminiApiKey).toBe('test-gemini-key');
    expect(settings.openaiApiKey).toBe('test-openai-key');
    expect(settings.videoDuration).toBe(30);
  });

  it('lets stored values win over the environment, except empty credentials', async () => {
    await writeFile(path.join(dir, 'settings.json'), JSON.stringify({ geminiApiKey: '', openaiApiKey: 'test-stored-key', videoDuration: 45 }));

    const store = await SettingsStore.open(path.join(dir, 'settings.json'), { env });
    const settings = store.get();

    expect(settings.geminiApiKey).toBe('test-gemini-key');
    expect(settings.openaiApiKey).toBe('test-stored-key');
    expect(settings.videoDuration).toBe(45);
  });

  it('uses defaults when the file is not valid JSON', async () => {
    const badPath = path.join(dir, 'settings.json');
    await writeFile(badPath, '{ not json');

    const store = await SettingsStore.open(badPath, { env: {} });
    expect(store.get().planningProvider).toBe('gemini');
  });

  it('refuses a file with invalid values', async () => {
    const badPath = path.join(dir, 'settings.json');
    await writeFile(badPath, JSON.stringify({ videoDuration: 500 }));

    await expect(SettingsStore.open(badPath, { env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('persists updates without writing credentials that came from the environment', async () => {
    const store = await SettingsStore.open(filePath, { env });

    const updated = await store.update({ videoDuration: 20, weeklySchedule: { Monday: '09:00' } });

    expect(updated.videoDuration).toBe(20);
    expect(updated.openaiApiKey).toBe('test-openai-key');

    const onDisk = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(onDisk.videoDuration).toBe(20);
    expect(onDisk.weeklySchedule).toEqual({ Monday: '09:00' });
    expect(onDisk.geminiApiKey).toBe('');
    expect(onDisk.openaiApiKey).toBe('');

    const reopened = await SettingsStore.open(filePath, { env });
    expect(reopened.get().openaiApiKey).toBe('test-openai-key');
    expect(reopened.get().videoDuration).toBe(20);
  });

  it('writes a credential entered through the control surface', async () => {
    const store = await SettingsStore.open(filePath, { env });
    await store.update({ geminiApiKey: 'test-new-key' });

    const onDisk = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(onDisk.geminiApiKey).toBe('test-new-key');
  });

  it('falls back to the environment credential when one is cleared', async () => {
    const store = await SettingsStore.open(filePath, { env });
    await store.update({ geminiApiKey: 'test-new-key' });

    const updated = await store.update({ geminiApiKey: '' });

    expect(updated.geminiApiKey).toBe('test-gemini-key');
    expect(store.get().geminiApiKey).toBe('test-gemini-key');
    const onDisk = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(onDisk.geminiApiKey).toBe('');
    const reopened = await SettingsStore.open(filePath, { env });
    expect(reopened.get().geminiApiKey).toBe('test-gemini-key');
  });

  it('keeps a cleared credential empty when the environment has none', async () => {
    const store = await SettingsStore.open(filePath, { env: {} });
    await store.update({ openaiApiKey: 'test-new-key' });

    expect((await store.update({ openaiApiKey: '' })).openaiApiKey).toBe('');
  });

  it('rejects an invalid update and keeps the previous values', async () => {
    const store = await SettingsStore.open(filePath, { env });

    await expect(store.update({ videoDuration: 500 })).rejects.toBeInstanceOf(ConfigError);
    expect(store.get().videoDuration).toBe(30);
  });

  it('hands out copies', async () => {
    const store = await SettingsStore.open(filePath, { env });
    const settings = store.get();
    settings.weeklySchedule.Monday = '09:00';

    expect(store.get().weeklySchedule).toEqual({});
  });

  it('masks credentials in the redacted view', async () => {
    const store = await SettingsStore.open(filePath, { env });
    const redacted = store.redacted();

    expect(redacted.geminiApiKey).toBe('****-key');
    expect(redacted.openaiApiKey).toBe('****-key');
    expect(store.get().geminiApiKey).toBe('test-gemini-key');
  });
});
