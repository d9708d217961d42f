import pino from 'pino';
import type { Logger } from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isDev = process.env.NODE_ENV !== 'production';
const level = isTest ? 'silent' : process.env.LOG_LEVEL || (isDev ? 'debug' : 'info');

function buildTransport(): { targets: pino.TransportTargetOptions[] } | undefined {
  if (isTest) return undefined;

  const targets: pino.TransportTargetOptions[] = [];
  if (isDev) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname'
      }
    });
  }

  // Workflow log persistence
  if (process.env.LOG_FILE) {
    if (!isDev) {
      targets.push({ target: 'pino/file', level, options: { destination: 1 } });
    }
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: process.env.LOG_FILE, mkdir: true }
    });
  }

  return targets.length > 0 ? { targets } : undefined;
}

export const logger: Logger = pino({
  level,
  transport: buildTransport(),
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'password',
      'apiKey',
      'geminiApiKey',
      'openaiApiKey',
      'settings.geminiApiKey',
      'settings.openaiApiKey',
      'GEMINI_API_KEY',
      'OPENAI_API_KEY',
      'secret',
      'token',
      'accessToken',
      'refreshToken'
    ],
    censor: '[REDACTED]'
  }
});

export const createComponentLogger = (component: string, parent: Logger = logger): Logger => {
  return parent.child({ component });
};

export type { Logger };

export default logger;
