import { DateTime } from 'luxon';
import { env } from '../config/env';
import { logger } from '../config/logger';

export enum LeaderboardPeriod {
  ALL_TIME = 'all_time',
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
}

/** Periods that have a historical snapshot; all-time has none. */
export type SnapshotPeriod = LeaderboardPeriod.WEEKLY | LeaderboardPeriod.MONTHLY;

export interface PeriodKey {
  year: number;
  periodNumber: number; // ISO week number or month 1-12
}

export interface WindowCounters {
  weeklyPoints: number;
  weeklyReactions: number;
  weeklyComments: number;
  weeklyPollVotes: number;
  lastWeeklyReset: Date;
  monthlyPoints: number;
  monthlyReactions: number;
  monthlyComments: number;
  monthlyPollVotes: number;
  lastMonthlyReset: Date;
}

function inZone(now: Date, zone: string): DateTime {
  const dt = DateTime.fromJSDate(now, { zone });
  if (!dt.isValid) {
    throw new Error(`Invalid leaderboard timezone "${zone}": ${dt.invalidExplanation ?? dt.invalidReason}`);
  }
  return dt;
}

/**
 * Most recent Monday 00:00 at or before `now`.
 */
export function weekStart(now: Date, zone: string = env.leaderboard.timezone): Date {
  return inZone(now, zone).startOf('week').toJSDate();
}

/**
 * First day of the month containing `now`, 00:00.
 */
export function monthStart(now: Date, zone: string = env.leaderboard.timezone): Date {
  return inZone(now, zone).startOf('month').toJSDate();
}

export function isLastDayOfMonth(now: Date, zone: string = env.leaderboard.timezone): boolean {
  const dt = inZone(now, zone);
  return dt.day === dt.daysInMonth;
}

/**
 * Identifier of the period containing `now`: ISO week-year + ISO week, or calendar year + month.
 */
export function currentPeriodKey(
  period: SnapshotPeriod,
  now: Date,
  zone: string = env.leaderboard.timezone
): PeriodKey {
  const dt = inZone(now, zone);
  if (period === LeaderboardPeriod.WEEKLY) {
    return { year: dt.weekYear, periodNumber: dt.weekNumber };
  }
  return { year: dt.year, periodNumber: dt.month };
}

/**
 * Zero the weekly window when `now` has moved past the week it was last reset for.
 * Returns true when something changed.
 */
export function resetWeeklyIfNeeded(
  counters: WindowCounters,
  now: Date,
  zone: string = env.leaderboard.timezone
): boolean {
  const start = weekStart(now, zone);
  if (counters.lastWeeklyReset.getTime() >= start.getTime()) {
    return false;
  }

  counters.weeklyPoints = 0;
  counters.weeklyReactions = 0;
  counters.weeklyComments = 0;
  counters.weeklyPollVotes = 0;
  counters.lastWeeklyReset = start;
  return true;
}

export function resetMonthlyIfNeeded(
  counters: WindowCounters,
  now: Date,
  zone: string = env.leaderboard.timezone
): boolean {
  const start = monthStart(now, zone);
  if (counters.lastMonthlyReset.getTime() >= start.getTime()) {
    return false;
  }

  counters.monthlyPoints = 0;
  counters.monthlyReactions = 0;
  counters.monthlyComments = 0;
  counters.monthlyPollVotes = 0;
  counters.lastMonthlyReset = start;
  return true;
}

export function isLeaderboardPeriod(value: string): value is LeaderboardPeriod {
  return Object.values(LeaderboardPeriod).some(period => period === value);
}

export function isSnapshotPeriod(value: string): value is SnapshotPeriod {
  return value === LeaderboardPeriod.WEEKLY || value === LeaderboardPeriod.MONTHLY;
}

/**
 * Case- and whitespace-insensitive snapshot period; anything but weekly or monthly throws
 */
export function parseSnapshotPeriod(value: string): SnapshotPeriod {
  const candidate = value.trim().toLowerCase();
  if (!isSnapshotPeriod(candidate)) {
    throw new Error(`Unknown snapshot period "${value}", expected weekly or monthly`);
  }
  return candidate;
}

/**
 * Map a requested period onto a window. Unrecognized values read the all-time window.
 */
export function normalizeLeaderboardPeriod(value: string): LeaderboardPeriod {
  const candidate = value.trim().toLowerCase();
  if (isLeaderboardPeriod(candidate)) {
    return candidate;
  }

  logger.warn(`⚠️ Unknown leaderboard period "${value}", falling back to ${LeaderboardPeriod.ALL_TIME}`);
  return LeaderboardPeriod.ALL_TIME;
}
