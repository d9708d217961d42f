import type { Logger } from 'pino';
import { z } from 'zod';
import { PublishRecord, Weekday } from '../types/schedule.js';
import { RunLedgerPort } from '../types/pipeline.js';
import { weekdaySchema } from '../schemas/settings.js';
import { describeError } from '../utils/errors.js';
import { atomicWriteJson, isRecord, readJsonFile } from '../utils/json-file.js';
import { createComponentLogger } from '../utils/logger.js';
import { toDateKey, weekdayOf } from '../utils/weekday.js';

const publishRecordSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  published: z.boolean(),
  videoId: z.string(),
  videoTitle: z.string(),
  weekday: weekdaySchema,
  timestamp: z.string()
});

export interface RunLedgerOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * One record per local calendar date saying whether a video went out that day.
 * Backs the "already published today" guard for scheduled triggers.
 */
export class RunLedger implements RunLedgerPort {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    options: RunLedgerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = createComponentLogger('run-ledger', options.logger);
  }

  async hasPublishedToday(weekday: Weekday): Promise<boolean> {
    const now = this.now();
    // A trigger for another weekday is stale; never treat it as already done.
    if (weekdayOf(now) !== weekday) return false;

    const records = await this.load();
    return records[toDateKey(now)]?.published === true;
  }

  /**
   * Record today's publish. Persistence failures are logged and swallowed: the video
   * is already live, so the only cost is a possible duplicate run later.
   */
  async markPublished(videoId: string, videoTitle: string): Promise<PublishRecord> {
    const now = this.now();
    const record: PublishRecord = {
      date: toDateKey(now),
      published: true,
      videoId,
      videoTitle,
      weekday: weekdayOf(now),
      timestamp: now.toISOString()
    };

    try {
      const records = await this.load();
      records[record.date] = record;
      await atomicWriteJson(this.filePath, records);
      this.logger.info(
        { date: record.date, videoId, videoTitle },
        `Marked upload complete for ${record.date}: ${videoTitle} (ID: ${videoId})`
      );
    } catch (error) {
      this.logger.error(
        { filePath: this.filePath, date: record.date, videoId, error: describeError(error) },
        'Failed to persist publish record'
      );
    }

    return record;
  }

  async getHistory(limit: number = 30): Promise<PublishRecord[]> {
    const records = await this.load();
    return Object.values(records)
      .sort((a, b) => b.date.localeCompare(a.date))
      .slice(0, Math.max(0, limit));
  }

  private async load(): Promise<Record<string, PublishRecord>> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (error) {
      this.logger.warn({ filePath: this.filePath, error: describeError(error) }, 'Error loading upload tracker');
      return {};
    }

    if (raw === null) return {};
    if (!isRecord(raw)) {
      this.logger.warn({ filePath: this.filePath }, 'Upload tracker is not a JSON object, ignoring it');
      return {};
    }

    const records: Record<string, PublishRecord> = {};
    for (const [date, value] of Object.entries(raw)) {
      const parsed = publishRecordSchema.safeParse(value);
      if (parsed.success && parsed.data.date === date) {
        records[date] = parsed.data;
      } else {
        this.logger.warn({ date }, 'Skipping malformed upload tracker entry');
      }
    }
    return records;
  }
}
