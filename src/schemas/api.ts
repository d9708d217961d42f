import { z } from 'zod';

export { settingsUpdateSchema } from './settings.js';

export const loginSchema = z.object({
  username: z.string().min(1, 'username is required').max(100),
  password: z.string().min(1, 'password is required').max(200)
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(365).default(30)
});

export const oauthCallbackQuerySchema = z.object({
  code: z.string().min(1, 'code is required'),
  state: z.string().optional()
});

export type LoginInput = z.infer<typeof loginSchema>;
export type HistoryQuery = z.infer<typeof historyQuerySchema>;
export type OAuthCallbackQuery = z.infer<typeof oauthCallbackQuerySchema>;
