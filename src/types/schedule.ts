export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday'
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** Weekday → time of day (HH:mm). At most one slot per weekday. */
export type WeeklySchedule = Partial<Record<Weekday, string>>;

export interface NextRun {
  weekday: Weekday;
  time: string;
  /** 0 = later today. */
  daysAhead: number;
}

export type ScheduleTrigger = (weekday: Weekday) => void | Promise<void>;

export interface PublishRecord {
  date: string; // YYYY-MM-DD, local calendar date
  published: boolean;
  videoId: string;
  videoTitle: string;
  weekday: Weekday;
  timestamp: string; // ISO instant
}
