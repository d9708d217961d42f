import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { RunLedger } from '../services/run-ledger.js';
import { makeTempDir, removeDir } from './test-helpers.js';

const mondayMorning = new Date(2026, 9, 19, 9, 0);

describe('RunLedger', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await makeTempDir('ledger-');
    filePath = path.join(dir, 'logs', 'upload_tracker.json');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reports nothing published before the first record', async () => {
    const ledger = new RunLedger(filePath, { now: () => mondayMorning });
    expect(await ledger.hasPublishedToday('Monday')).toBe(false);
    expect(await ledger.getHistory()).toEqual([]);
  });

  it('records a publish and answers the same-day guard', async () => {
    const ledger = new RunLedger(filePath, { now: () => mondayMorning });

    const record = await ledger.markPublished('abc123', 'Clouds over the valley');

    expect(record).toEqual({
      date: '2026-10-19',
      published: true,
      videoId: 'abc123',
      videoTitle: 'Clouds over the valley',
      weekday: 'Monday',
      timestamp: mondayMorning.toISOString()
    });
    expect(await ledger.hasPublishedToday('Monday')).toBe(true);

    const onDisk = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(Object.keys(onDisk)).toEqual(['2026-10-19']);
    expect(onDisk['2026-10-19'].videoId).toBe('abc123');
  });

  it('never treats a different weekday as already published', async () => {
    const ledger = new RunLedger(filePath, { now: () => mondayMorning });
    await ledger.markPublished('abc123', 'Clouds over the valley');

    expect(await ledger.hasPublishedToday('Tuesday')).toBe(false);
  });

  it('does not carry a publish over to the next day', async () => {
    let now = mondayMorning;
    const ledger = new RunLedger(filePath, { now: () => now });
    await ledger.markPublished('abc123', 'Clouds over the valley');

    now = new Date(2026, 9, 20, 9, 0);
    expect(await ledger.hasPublishedToday('Tuesday')).toBe(false);
  });

  it('treats an unreadable tracker as empty and replaces it on the next publish', async () => {
    const ledger = new RunLedger(filePath, { now: () => mondayMorning });
    await ledger.markPublished('first', 'First');
    await writeFile(filePath, 'not json at all', 'utf-8');

    expect(await ledger.hasPublishedToday('Monday')).toBe(false);

    await ledger.markPublished('second', 'Second');
    expect(await ledger.hasPublishedToday('Monday')).toBe(true);
    expect((await ledger.getHistory()).map((r) => r.videoId)).toEqual(['second']);
  });

  it('skips malformed entries and entries filed under the wrong date', async () => {
    const ledger = new RunLedger(filePath, { now: () => mondayMorning });
    await ledger.markPublished('valid', 'Valid');

    const onDisk = JSON.parse(await readFile(filePath, 'utf-8'));
    onDisk['2026-10-17'] = { bogus: true };
    onDisk['2026-10-16'] = { ...onDisk['2026-10-19'], date: '2026-10-15' };
    await writeFile(filePath, JSON.stringify(onDisk), 'utf-8');

    const history = await ledger.getHistory();
    expect(history.map((r) => r.date)).toEqual(['2026-10-19']);
  });

  it('lists history newest first, up to the limit', async () => {
    let now = new Date(2026, 9, 12, 9, 0);
    const ledger = new RunLedger(filePath, { now: () => now });
    await ledger.markPublished('a', 'A');
    now = new Date(2026, 9, 19, 9, 0);
    await ledger.markPublished('c', 'C');
    now = new Date(2026, 9, 14, 9, 0);
    await ledger.markPublished('b', 'B');

    expect((await ledger.getHistory()).map((r) => r.videoId)).toEqual(['c', 'b', 'a']);
    expect((await ledger.getHistory(2)).map((r) => r.date)).toEqual(['2026-10-19', '2026-10-14']);
  });

  it('keeps one record per day, the latest publish winning', async () => {
    const ledger = new RunLedger(filePath, { now: () => mondayMorning });
    await ledger.markPublished('morning', 'Morning');
    await ledger.markPublished('evening', 'Evening');

    const history = await ledger.getHistory();
    expect(history).toHaveLength(1);
    expect(history[0].videoId).toBe('evening');
  });

  it('returns the record even when it cannot be persisted', async () => {
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'a file where a directory should be', 'utf-8');
    const ledger = new RunLedger(path.join(blocker, 'upload_tracker.json'), { now: () => mondayMorning });

    const record = await ledger.markPublished('abc123', 'Clouds over the valley');

    expect(record.videoId).toBe('abc123');
    expect(await ledger.hasPublishedToday('Monday')).toBe(false);
  });
});
