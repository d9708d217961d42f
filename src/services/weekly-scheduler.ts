import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { NextRun, ScheduleTrigger, Weekday, WeeklySchedule } from '../types/schedule.js';
import { describeError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import {
  addWeekdays,
  formatTimeOfDay,
  minutesOfDay,
  parseTimeOfDay,
  weekdayOf
} from '../utils/weekday.js';

export const DEFAULT_CHECK_INTERVAL_MS = 60_000;

/**
 * Minute-resolution match with one minute of slack either side (08:59 and 09:01 both
 * match 09:00). A 60s tick can therefore fire twice for one slot; the triggered
 * action has to be idempotent.
 */
export function isTimeMatch(current: string, scheduled: string): boolean {
  const curr = parseTimeOfDay(current);
  const sched = parseTimeOfDay(scheduled);
  if (!curr || !sched) return false;
  return Math.abs(minutesOfDay(curr) - minutesOfDay(sched)) <= 1;
}

export function describeNextRun(next: NextRun | null, hasSchedule: boolean): string {
  if (!hasSchedule) return 'No schedule configured';
  if (!next) return 'No upcoming scheduled runs';
  if (next.daysAhead === 0) return `Today (${next.weekday}) at ${next.time}`;
  const unit = next.daysAhead > 1 ? 'days' : 'day';
  return `${next.weekday} (${next.daysAhead} ${unit}) at ${next.time}`;
}

export interface WeeklySchedulerOptions {
  checkIntervalMs?: number;
  now?: () => Date;
  logger?: Logger;
}

export class WeeklyScheduler {
  private schedule: WeeklySchedule;
  private readonly checkIntervalMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  private running = false;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    schedule: WeeklySchedule,
    private readonly onTrigger: ScheduleTrigger,
    options: WeeklySchedulerOptions = {}
  ) {
    this.schedule = { ...schedule };
    this.checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
    this.logger = createComponentLogger('scheduler', options.logger);
  }

  updateSchedule(schedule: WeeklySchedule): void {
    this.schedule = { ...schedule };
    this.logger.info({ schedule: this.schedule }, 'Schedule updated');
  }

  getSchedule(): WeeklySchedule {
    return { ...this.schedule };
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    const controller = new AbortController();
    this.abortController = controller;
    this.logger.info(
      { schedule: this.schedule, checkIntervalMs: this.checkIntervalMs },
      'Scheduler started'
    );
    this.loop = this.runLoop(controller.signal);
  }

  /** Resolves once the loop has exited. A trigger already in flight keeps running. */
  async stop(): Promise<void> {
    if (!this.running && !this.loop) return;

    this.running = false;
    this.abortController?.abort();
    await this.loop;
    this.loop = null;
    this.abortController = null;
    this.logger.info('Scheduler stopped');
  }

  /** Resolves when the last fired trigger has settled. */
  async whenIdle(): Promise<void> {
    await this.inFlight;
  }

  /**
   * One scheduler check. Fires the trigger (detached) when the current weekday has a
   * slot matching the current time, and returns the weekday it fired for.
   */
  tick(): Weekday | null {
    const now = this.now();
    const weekday = weekdayOf(now);
    const scheduled = this.schedule[weekday];
    if (!scheduled) return null;

    const currentTime = formatTimeOfDay(now);
    if (!isTimeMatch(currentTime, scheduled)) return null;

    if (this.inFlight) {
      this.logger.info({ weekday, scheduled }, 'Previous scheduled trigger still running, skipping tick');
      return null;
    }

    this.logger.info({ weekday, scheduled, currentTime }, `Scheduled time reached: ${weekday} at ${scheduled}`);
    this.inFlight = this.dispatch(weekday).finally(() => {
      this.inFlight = null;
    });
    return weekday;
  }

  getNextRunSlot(now: Date = this.now()): NextRun | null {
    const today = weekdayOf(now);

    const todayTime = this.schedule[today];
    const todayParsed = todayTime ? parseTimeOfDay(todayTime) : null;
    if (todayTime && todayParsed) {
      const nowMinutes = now.getHours() * 60 + now.getMinutes();
      if (nowMinutes < minutesOfDay(todayParsed)) {
        return { weekday: today, time: todayTime, daysAhead: 0 };
      }
    }

    for (let daysAhead = 1; daysAhead <= 7; daysAhead++) {
      const weekday = addWeekdays(today, daysAhead);
      const time = this.schedule[weekday];
      if (time && parseTimeOfDay(time)) {
        return { weekday, time, daysAhead };
      }
    }

    return null;
  }

  getNextRun(now: Date = this.now()): string {
    const hasSchedule = Object.keys(this.schedule).length > 0;
    return describeNextRun(hasSchedule ? this.getNextRunSlot(now) : null, hasSchedule);
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (this.running) {
      this.tick();
      try {
        await sleep(this.checkIntervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
    }
  }

  private async dispatch(weekday: Weekday): Promise<void> {
    try {
      await this.onTrigger(weekday);
    } catch (error) {
      this.logger.error({ weekday, error: describeError(error) }, 'Error executing scheduled workflow');
    }
  }
}
