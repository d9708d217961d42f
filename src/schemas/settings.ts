import { z } from 'zod';
import { WEEKDAYS } from '../types/schedule.js';
import { parseTimeOfDay } from '../utils/weekday.js';

export const timeOfDaySchema = z
  .string()
  .refine((val) => parseTimeOfDay(val) !== null, {
    message: 'Time must be HH:MM with hour 0-23 and minute 0-59'
  });

export const weekdaySchema = z.enum(WEEKDAYS);

export const weeklyScheduleSchema = z
  .record(z.string(), timeOfDaySchema)
  .superRefine((val, ctx) => {
    for (const key of Object.keys(val)) {
      if (!weekdaySchema.safeParse(key).success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Unknown weekday: ${key}`
        });
      }
    }
  })
  .transform((val) => {
    const schedule: Partial<Record<z.infer<typeof weekdaySchema>, string>> = {};
    for (const day of WEEKDAYS) {
      const time = val[day];
      if (time) schedule[day] = time.trim();
    }
    return schedule;
  });

export const DEFAULT_AGENT_INSTRUCTIONS =
  'Generate engaging, high-quality videos suitable for YouTube. Focus on trending topics, ' +
  'educational content, or entertainment. Keep videos between 30-60 seconds.';

export const settingsSchema = z.object({
  geminiApiKey: z.string().default(''),
  openaiApiKey: z.string().default(''),
  planningProvider: z.enum(['gemini', 'openai']).default('gemini'),
  planningModel: z.string().min(1).optional(),
  agentInstructions: z.string().max(5000).default(DEFAULT_AGENT_INSTRUCTIONS),
  videoDuration: z.number().int().min(5).max(60).default(30),
  videoResolution: z.enum(['1080p', '720p', '480p']).default('1080p'),
  soraModel: z.string().min(1).default('sora-2'),
  generationTimeoutMinutes: z.number().int().min(1).max(120).default(20),
  weeklySchedule: weeklyScheduleSchema.default({}),
  uploadDestination: z.enum(['channel', 'shorts']).default('channel'),
  privacyStatus: z.enum(['private', 'unlisted', 'public']).default('public'),
  youtubeClientSecretsPath: z.string().min(1).default('./secrets/youtube_oauth_client.json'),
  youtubeTokensPath: z.string().min(1).default('./secrets/youtube_tokens.json'),
  outputDirectory: z.string().min(1).default('./output'),
  tempDirectory: z.string().min(1).default('./temp')
});

/** Partial update from the control surface; every field optional, no defaults applied. */
export const settingsUpdateSchema = z
  .object({
    geminiApiKey: z.string().max(200),
    openaiApiKey: z.string().max(200),
    planningProvider: z.enum(['gemini', 'openai']),
    planningModel: z.string().min(1).max(100),
    agentInstructions: z.string().max(5000),
    videoDuration: z.number().int().min(5).max(60),
    videoResolution: z.enum(['1080p', '720p', '480p']),
    soraModel: z.string().min(1).max(100),
    generationTimeoutMinutes: z.number().int().min(1).max(120),
    weeklySchedule: weeklyScheduleSchema,
    uploadDestination: z.enum(['channel', 'shorts']),
    privacyStatus: z.enum(['private', 'unlisted', 'public'])
  })
  .partial()
  .refine((data) => Object.keys(data).length > 0, {
    message: 'At least one setting must be provided'
  });

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;
export type SettingsUpdate = z.infer<typeof settingsUpdateSchema>;
