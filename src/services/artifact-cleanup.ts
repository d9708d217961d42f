import { readdir, rmdir, stat, unlink } from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { describeError } from '../utils/errors.js';
import { isErrnoException } from '../utils/json-file.js';
import { createComponentLogger } from '../utils/logger.js';

export const DEFAULT_RETENTION_DAYS = 7;

export interface ArtifactCleanupConfig {
  /** Roots to sweep; the roots themselves are never removed. */
  directories: string[];
  retentionDays?: number;
  dryRun?: boolean;
  now?: () => Date;
  logger?: Logger;
}

export interface CleanupResult {
  deletedFiles: string[];
  deletedDirs: string[];
  freedBytes: number;
  errors: string[];
}

export interface StorageStats {
  totalFiles: number;
  totalSizeMB: number;
  oldestFile: Date | null;
  newestFile: Date | null;
}

export function retentionDaysFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  const days = parseInt(env.ARTIFACT_RETENTION_DAYS || '', 10);
  return Number.isFinite(days) && days >= 0 ? days : DEFAULT_RETENTION_DAYS;
}

/** Removes generated and processed videos left behind by past runs. */
export class ArtifactCleanup {
  private readonly directories: string[];
  private readonly retentionDays: number;
  private readonly dryRun: boolean;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(config: ArtifactCleanupConfig) {
    this.directories = [...new Set(config.directories.map((dir) => path.resolve(dir)))];
    this.retentionDays = config.retentionDays ?? DEFAULT_RETENTION_DAYS;
    this.dryRun = config.dryRun ?? false;
    this.now = config.now ?? (() => new Date());
    this.logger = createComponentLogger('artifact-cleanup', config.logger);
  }

  async cleanupOldArtifacts(): Promise<CleanupResult> {
    const result: CleanupResult = { deletedFiles: [], deletedDirs: [], freedBytes: 0, errors: [] };

    const cutoff = new Date(this.now().getTime() - this.retentionDays * 24 * 60 * 60 * 1000);
    this.logger.info(
      { directories: this.directories, retentionDays: this.retentionDays, cutoff: cutoff.toISOString(), dryRun: this.dryRun },
      'Starting artifact cleanup'
    );

    for (const dir of this.directories) {
      try {
        await this.sweep(dir, cutoff.getTime(), result);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          this.logger.debug({ dir }, 'Artifact directory does not exist, nothing to clean');
          continue;
        }
        this.logger.error({ dir, error: describeError(error) }, 'Cleanup failed');
        result.errors.push(`Failed to clean ${dir}: ${describeError(error)}`);
      }
    }

    this.logger.info(
      {
        deletedFiles: result.deletedFiles.length,
        deletedDirs: result.deletedDirs.length,
        freedMB: (result.freedBytes / 1024 / 1024).toFixed(2),
        errors: result.errors.length
      },
      'Artifact cleanup complete'
    );
    return result;
  }

  async getStorageStats(): Promise<StorageStats> {
    const stats: StorageStats = { totalFiles: 0, totalSizeMB: 0, oldestFile: null, newestFile: null };
    for (const dir of this.directories) {
      try {
        await this.collectStats(dir, stats);
      } catch (error) {
        if (!(isErrnoException(error) && error.code === 'ENOENT')) throw error;
      }
    }
    return stats;
  }

  /** Returns true when nothing is left under `dirPath`. */
  private async sweep(dirPath: string, cutoffTime: number, result: CleanupResult): Promise<boolean> {
    const entries = await readdir(dirPath, { withFileTypes: true });
    let isEmpty = true;

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      try {
        if (entry.isDirectory()) {
          if (await this.sweep(fullPath, cutoffTime, result)) {
            if (!this.dryRun) await rmdir(fullPath);
            result.deletedDirs.push(fullPath);
            this.logger.debug({ path: fullPath, dryRun: this.dryRun }, 'Deleted empty directory');
          } else {
            isEmpty = false;
          }
          continue;
        }

        if (!entry.isFile()) {
          isEmpty = false;
          continue;
        }

        const info = await stat(fullPath);
        if (info.mtime.getTime() >= cutoffTime) {
          isEmpty = false;
          continue;
        }

        if (!this.dryRun) await unlink(fullPath);
        result.deletedFiles.push(fullPath);
        result.freedBytes += info.size;
        this.logger.debug(
          { path: fullPath, sizeMB: (info.size / 1024 / 1024).toFixed(2), dryRun: this.dryRun },
          'Deleted old artifact'
        );
      } catch (error) {
        result.errors.push(`Failed to process ${fullPath}: ${describeError(error)}`);
        this.logger.warn({ path: fullPath, error: describeError(error) }, 'Failed to process entry');
        isEmpty = false;
      }
    }

    return isEmpty;
  }

  private async collectStats(dirPath: string, stats: StorageStats): Promise<void> {
    const entries = await readdir(dirPath, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        await this.collectStats(fullPath, stats);
      } else if (entry.isFile()) {
        const info = await stat(fullPath);
        stats.totalFiles++;
        stats.totalSizeMB += info.size / 1024 / 1024;
        if (!stats.oldestFile || info.mtime < stats.oldestFile) stats.oldestFile = info.mtime;
        if (!stats.newestFile || info.mtime > stats.newestFile) stats.newestFile = info.mtime;
      }
    }
  }
}

export function startScheduledCleanup(cleanup: ArtifactCleanup, intervalHours: number = 24, logger?: Logger): NodeJS.Timeout {
  const log = createComponentLogger('artifact-cleanup', logger);
  const runCleanup = () => {
    log.info('Running scheduled artifact cleanup');
    cleanup.cleanupOldArtifacts().catch((error: unknown) => {
      log.error({ error: describeError(error) }, 'Scheduled artifact cleanup failed');
    });
  };

  runCleanup();
  const timer = setInterval(runCleanup, intervalHours * 60 * 60 * 1000);
  timer.unref();
  return timer;
}
