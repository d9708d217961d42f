import express, { Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Server } from 'socket.io';
import { createServer, Server as HttpServer } from 'http';
import crypto from 'crypto';
import { AppContext, startScheduler } from './app.js';
import { authenticateOperator, isAuthEnabled, issueToken, requireAuth, requireOperator } from './middleware/auth.js';
import { authRateLimiter, globalRateLimiter, runRateLimiter } from './middleware/rate-limiter.js';
import { validateBody, validateQuery } from './middleware/validation.js';
import {
  HistoryQuery,
  LoginInput,
  OAuthCallbackQuery,
  historyQuerySchema,
  loginSchema,
  oauthCallbackQuerySchema,
  settingsUpdateSchema
} from './schemas/api.js';
import { SettingsUpdate } from './schemas/settings.js';
import { PipelineStep, STEP_LABELS, StepStatus } from './types/pipeline.js';
import { describeError, isPipelineError } from './utils/errors.js';
import { createComponentLogger } from './utils/logger.js';

export interface ProgressEvent {
  runId: string | null;
  step: PipelineStep;
  label: string;
  percent: number;
  status: StepStatus;
}

export interface ControlServer {
  app: express.Express;
  httpServer: HttpServer;
  io: Server;
  listen(port: number | string): Promise<void>;
  close(): Promise<void>;
}

const OAUTH_STATE_TTL_MS = 10 * 60 * 1000;

function allowedOrigins(env: NodeJS.ProcessEnv): string[] {
  return env.ALLOWED_ORIGINS
    ? env.ALLOWED_ORIGINS.split(',').map((o) => o.trim())
    : ['http://localhost:3000', 'http://127.0.0.1:3000'];
}

function sendError(res: Response, status: number, error: unknown): void {
  res.status(status).json({
    error: describeError(error),
    code: isPipelineError(error) ? error.code : undefined
  });
}

export function createControlServer(context: AppContext, env: NodeJS.ProcessEnv = process.env): ControlServer {
  const { pipeline, scheduler, settings, ledger, uploader } = context;
  const logger = createComponentLogger('server', context.logger);
  const origins = allowedOrigins(env);

  // OAuth states issued by /api/youtube/connect, with their expiry.
  const pendingOAuthStates = new Map<string, number>();
  const consumeOAuthState = (state: string | undefined): boolean => {
    const now = Date.now();
    for (const [issued, expiresAt] of pendingOAuthStates) {
      if (expiresAt <= now) pendingOAuthStates.delete(issued);
    }
    if (!state || !pendingOAuthStates.has(state)) return false;
    pendingOAuthStates.delete(state);
    return true;
  };

  const app = express();
  const httpServer = createServer(app);
  const io = new Server(httpServer, {
    cors: { origin: origins, methods: ['GET', 'POST'], credentials: true }
  });

  pipeline.setProgressReporter((step, percent, status) => {
    const event: ProgressEvent = {
      runId: pipeline.getState()?.runId ?? null,
      step,
      label: STEP_LABELS[step],
      percent,
      status
    };
    io.emit('progress', event);
  });

  app.use(helmet({ contentSecurityPolicy: false, crossOriginEmbedderPolicy: false }));
  app.use(cors({ origin: origins, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(globalRateLimiter);

  app.use((req, _res, next) => {
    logger.info({ requestId: crypto.randomUUID(), method: req.method, path: req.path, ip: req.ip }, 'Request received');
    next();
  });

  // ─── Unauthenticated ───────────────────────────────────────────────
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime(), timestamp: new Date().toISOString() });
  });

  app.post('/api/auth/login', authRateLimiter, validateBody(loginSchema), async (req: Request, res: Response) => {
    const { username, password }: LoginInput = req.body;
    try {
      const operator = await authenticateOperator(username, password);
      if (!operator) {
        logger.warn({ username }, 'Failed login attempt');
        res.status(401).json({ error: 'Invalid credentials' });
        return;
      }
      logger.info({ username }, 'Operator logged in');
      res.json({ token: issueToken(operator), operator });
    } catch (error) {
      logger.error({ error: describeError(error) }, 'Login error');
      res.status(500).json({ error: 'Login failed' });
    }
  });

  app.get('/api/auth/status', (_req, res) => {
    res.json({
      authEnabled: isAuthEnabled(),
      message: isAuthEnabled()
        ? 'Authentication is enabled. Provide Bearer token.'
        : 'Authentication is disabled. Set AUTH_ENABLED=true and ADMIN_PASSWORD_HASH to enable.'
    });
  });

  // Google redirects the browser here, so it cannot carry a bearer token.
  app.get('/api/youtube/oauth/callback', validateQuery(oauthCallbackQuerySchema), async (_req, res) => {
    const { code, state }: OAuthCallbackQuery = res.locals.query;
    if (!consumeOAuthState(state)) {
      logger.warn({ hasState: Boolean(state) }, 'OAuth callback with an unknown or expired state');
      res.status(400).send('OAuth failed: unknown or expired state, start the connection again');
      return;
    }
    try {
      await uploader.handleOAuthCallback(code);
      res.send('YouTube connected. You can close this tab.');
    } catch (error) {
      logger.error({ error: describeError(error) }, 'OAuth callback failed');
      res.status(500).send(`OAuth failed: ${describeError(error)}`);
    }
  });

  // ─── Authenticated ─────────────────────────────────────────────────
  app.use('/api', requireAuth);

  app.get('/api/status', (_req, res) => {
    res.json({
      run: pipeline.getState(),
      lastResult: pipeline.getLastResult(),
      scheduler: { running: scheduler.isRunning(), schedule: scheduler.getSchedule() },
      nextRun: scheduler.getNextRun()
    });
  });

  app.post('/api/runs', requireOperator, runRateLimiter, (_req, res) => {
    if (pipeline.isRunning()) {
      res.status(409).json({ error: 'A workflow run is already active', run: pipeline.getState() });
      return;
    }

    const finished = pipeline.run('manual');
    const run = pipeline.getState();
    finished
      .then((ok) => {
        io.emit('run:finished', { ok, result: pipeline.getLastResult() });
      })
      .catch((error: unknown) => {
        logger.error({ error: describeError(error) }, 'Manual run rejected unexpectedly');
      });

    res.status(202).json({ status: 'started', runId: run?.runId ?? null });
  });

  app.post('/api/runs/stop', requireOperator, (_req, res) => {
    if (!pipeline.isRunning()) {
      res.status(409).json({ error: 'No workflow run is active' });
      return;
    }
    pipeline.requestStop();
    res.status(202).json({ status: 'stopping', run: pipeline.getState() });
  });

  app.get('/api/history', validateQuery(historyQuerySchema), async (_req, res) => {
    const { limit }: HistoryQuery = res.locals.query;
    try {
      res.json({ records: await ledger.getHistory(limit) });
    } catch (error) {
      logger.error({ error: describeError(error) }, 'Failed to read history');
      sendError(res, 500, error);
    }
  });

  app.get('/api/settings', (_req, res) => {
    res.json({ settings: settings.redacted() });
  });

  app.put('/api/settings', requireOperator, validateBody(settingsUpdateSchema), async (req: Request, res: Response) => {
    const patch: SettingsUpdate = req.body;
    try {
      const updated = await settings.update(patch);
      if (patch.weeklySchedule) {
        scheduler.updateSchedule(updated.weeklySchedule);
        if (!scheduler.isRunning()) startScheduler(context);
      }
      res.json({ settings: settings.redacted(), nextRun: scheduler.getNextRun() });
    } catch (error) {
      logger.error({ error: describeError(error) }, 'Settings update failed');
      sendError(res, isPipelineError(error) && error.code === 'CONFIG' ? 400 : 500, error);
    }
  });

  app.get('/api/youtube/status', async (_req, res) => {
    try {
      res.json(await uploader.getAuthStatus());
    } catch (error) {
      sendError(res, 500, error);
    }
  });

  app.get('/api/youtube/connect', requireOperator, async (_req, res) => {
    try {
      const state = crypto.randomUUID();
      const url = await uploader.getAuthUrl(state);
      pendingOAuthStates.set(state, Date.now() + OAUTH_STATE_TTL_MS);
      res.json({ url });
    } catch (error) {
      logger.error({ error: describeError(error) }, 'Failed to get YouTube connect URL');
      sendError(res, isPipelineError(error) && error.code === 'CONFIG' ? 400 : 500, error);
    }
  });

  io.on('connection', (socket) => {
    logger.debug({ socketId: socket.id }, 'Client connected');
    socket.emit('status', { run: pipeline.getState(), nextRun: scheduler.getNextRun() });
    socket.on('disconnect', () => {
      logger.debug({ socketId: socket.id }, 'Client disconnected');
    });
  });

  return {
    app,
    httpServer,
    io,
    listen: (port) =>
      new Promise((resolve) => {
        httpServer.listen(Number(port), () => {
          logger.info({ port, authEnabled: isAuthEnabled() }, 'Control server listening');
          resolve();
        });
      }),
    close: () =>
      new Promise((resolve, reject) => {
        // Closes the underlying HTTP server as well.
        io.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
