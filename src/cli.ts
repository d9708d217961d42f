#!/usr/bin/env node
import 'dotenv/config';
import { AppContext, createAppContext, startScheduler, stopContext } from './app.js';
import { ArtifactCleanup, retentionDaysFromEnv, startScheduledCleanup } from './services/artifact-cleanup.js';
import { createControlServer } from './server.js';
import { STEP_LABELS } from './types/pipeline.js';
import { describeError } from './utils/errors.js';
import { logger } from './utils/logger.js';

const USAGE = `
Video Autopilot CLI

Commands:
  run              Run the full pipeline once, now
  daemon           Run the weekly scheduler until interrupted
  serve            Start the control server (HTTP + socket.io) and the scheduler
  next             Show the next scheduled run
  history [n]      Show the last n publish records (default 10)
  cleanup [--dry-run]
                   Delete generated artifacts older than ARTIFACT_RETENTION_DAYS
`;

// A stop only lands at a stage boundary, and generation alone may take its full timeout.
const FORCE_EXIT_MS = 30 * 60 * 1000;

/**
 * Runs `handler` on the first SIGINT/SIGTERM, then exits with `process.exitCode`.
 * A second signal, or the force timer, exits at once.
 */
function onShutdown(handler: (signal: string) => Promise<void>): void {
  let shuttingDown = false;
  const listener = (signal: string) => {
    if (shuttingDown) {
      logger.error({ signal }, 'Second shutdown signal, exiting without waiting for the active run');
      process.exit(1);
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received, waiting for the active run to reach a stage boundary');

    setTimeout(() => {
      logger.error({ timeoutMs: FORCE_EXIT_MS }, 'Forceful shutdown: the active run did not stop in time');
      process.exit(1);
    }, FORCE_EXIT_MS).unref();

    handler(signal).then(
      () => process.exit(),
      (error: unknown) => {
        logger.error({ error: describeError(error) }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.on('SIGTERM', () => listener('SIGTERM'));
  process.on('SIGINT', () => listener('SIGINT'));
}

async function runOnce(context: AppContext): Promise<number> {
  context.pipeline.setProgressReporter((step, percent, status) => {
    console.log(`[${STEP_LABELS[step]}] ${status}${status === 'running' ? '' : ` (${percent}%)`}`);
  });
  onShutdown(async () => {
    await stopContext(context);
    process.exitCode = context.pipeline.getLastResult()?.ok ? 0 : 1;
  });

  const ok = await context.pipeline.run('manual');
  const result = context.pipeline.getLastResult();
  if (ok && result) {
    console.log(`\nPublished "${result.title}" (https://www.youtube.com/watch?v=${result.videoId})`);
  } else if (result?.stopped) {
    console.log('\nRun stopped.');
  } else {
    console.error(`\nRun failed${result?.failedStep ? ` at ${STEP_LABELS[result.failedStep]}` : ''}: ${result?.error ?? 'unknown error'}`);
  }
  return ok ? 0 : 1;
}

async function daemon(context: AppContext): Promise<void> {
  if (!startScheduler(context)) {
    console.error('No schedule configured. Set weeklySchedule in the settings file first.');
    process.exitCode = 1;
    return;
  }
  startScheduledCleanup(context.cleanup, 24, context.logger);
  onShutdown(() => stopContext(context));
  console.log(`Scheduler running. Next run: ${context.scheduler.getNextRun()}`);
}

async function serve(context: AppContext): Promise<void> {
  const server = createControlServer(context);
  await server.listen(process.env.PORT || 3000);
  startScheduler(context);
  startScheduledCleanup(context.cleanup, 24, context.logger);

  onShutdown(async () => {
    await stopContext(context);
    await server.close();
    logger.info('HTTP server closed');
  });
}

async function history(context: AppContext, limitArg: string | undefined): Promise<void> {
  const limit = limitArg ? parseInt(limitArg, 10) : 10;
  const records = await context.ledger.getHistory(Number.isFinite(limit) && limit > 0 ? limit : 10);
  if (records.length === 0) {
    console.log('No uploads recorded yet.');
    return;
  }
  for (const record of records) {
    console.log(`${record.date}  ${record.weekday.padEnd(9)}  ${record.videoId.padEnd(12)}  ${record.videoTitle}`);
  }
}

async function cleanup(context: AppContext, dryRun: boolean): Promise<void> {
  const { tempDirectory, outputDirectory } = context.settings.get();
  const sweeper = dryRun
    ? new ArtifactCleanup({
        directories: [tempDirectory, outputDirectory],
        retentionDays: retentionDaysFromEnv(),
        dryRun: true,
        logger: context.logger
      })
    : context.cleanup;

  const before = await sweeper.getStorageStats();
  const result = await sweeper.cleanupOldArtifacts();
  console.log(
    `${dryRun ? 'Would delete' : 'Deleted'} ${result.deletedFiles.length} file(s), ` +
      `${(result.freedBytes / 1024 / 1024).toFixed(2)} MB of ${before.totalSizeMB.toFixed(2)} MB`
  );
  for (const error of result.errors) console.error(`  ${error}`);
  if (result.errors.length > 0) process.exitCode = 1;
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  if (!command || command === 'help' || command === '--help') {
    console.log(USAGE);
    return;
  }

  const context = await createAppContext();

  switch (command) {
    case 'run':
      process.exitCode = await runOnce(context);
      break;
    case 'daemon':
      await daemon(context);
      break;
    case 'serve':
      await serve(context);
      break;
    case 'next':
      console.log(context.scheduler.getNextRun());
      break;
    case 'history':
      await history(context, args[0]);
      break;
    case 'cleanup':
      await cleanup(context, args.includes('--dry-run'));
      break;
    default:
      console.error(`Unknown command: ${command}`);
      console.log(USAGE);
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error({ error: describeError(error) }, 'Fatal error');
  console.error(describeError(error));
  process.exit(1);
});
