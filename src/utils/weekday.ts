import { WEEKDAYS, Weekday } from '../types/schedule.js';

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})$/;

export interface TimeOfDay {
  hours: number;
  minutes: number;
}

export function weekdayIndex(weekday: Weekday): number {
  return WEEKDAYS.indexOf(weekday);
}

/** Local weekday of a date (Date#getDay counts from Sunday). */
export function weekdayOf(date: Date): Weekday {
  return WEEKDAYS[(date.getDay() + 6) % 7];
}

export function addWeekdays(weekday: Weekday, offset: number): Weekday {
  const idx = (weekdayIndex(weekday) + (offset % 7) + 7) % 7;
  return WEEKDAYS[idx];
}

export function parseTimeOfDay(value: string): TimeOfDay | null {
  const m = TIME_OF_DAY.exec(value.trim());
  if (!m) return null;
  const hours = parseInt(m[1], 10);
  const minutes = parseInt(m[2], 10);
  if (hours > 23 || minutes > 59) return null;
  return { hours, minutes };
}

export function formatTimeOfDay(date: Date): string {
  return `${String(date.getHours()).padStart(2, '0')}:${String(date.getMinutes()).padStart(2, '0')}`;
}

export function minutesOfDay(time: TimeOfDay): number {
  return time.hours * 60 + time.minutes;
}

/** Local calendar date key, e.g. 2026-10-19. */
export function toDateKey(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
