import {
  LeaderboardPeriod,
  WindowCounters,
  currentPeriodKey,
  isLastDayOfMonth,
  monthStart,
  normalizeLeaderboardPeriod,
  parseSnapshotPeriod,
  resetMonthlyIfNeeded,
  resetWeeklyIfNeeded,
  weekStart,
} from '../src/utils/leaderboardPeriods';

function counters(overrides: Partial<WindowCounters> = {}): WindowCounters {
  return {
    weeklyPoints: 40,
    weeklyReactions: 1,
    weeklyComments: 1,
    weeklyPollVotes: 0,
    lastWeeklyReset: new Date('2024-03-11T00:00:00.000Z'),
    monthlyPoints: 70,
    monthlyReactions: 1,
    monthlyComments: 2,
    monthlyPollVotes: 0,
    lastMonthlyReset: new Date('2024-03-01T00:00:00.000Z'),
    ...overrides,
  };
}

describe('leaderboard periods', () => {
  describe('weekStart', () => {
    it('returns the Monday 00:00 of the current week', () => {
      expect(weekStart(new Date('2024-03-13T12:00:00Z'), 'UTC')).toEqual(new Date('2024-03-11T00:00:00.000Z'));
    });

    it('treats Monday 00:00 as the start of its own week', () => {
      expect(weekStart(new Date('2024-03-11T00:00:00Z'), 'UTC')).toEqual(new Date('2024-03-11T00:00:00.000Z'));
    });

    it('keeps the last instant of Sunday in the previous week', () => {
      expect(weekStart(new Date('2024-03-17T23:59:59.999Z'), 'UTC')).toEqual(new Date('2024-03-11T00:00:00.000Z'));
    });

    it('computes the boundary in the configured timezone', () => {
      // Sunday 22:00 in New York
      expect(weekStart(new Date('2024-03-11T02:00:00Z'), 'America/New_York')).toEqual(new Date('2024-03-04T05:00:00.000Z'));
    });

    it('rejects an unknown timezone', () => {
      expect(() => weekStart(new Date('2024-03-11T02:00:00Z'), 'Mars/Olympus')).toThrow(/Invalid leaderboard timezone "Mars\/Olympus"/);
    });
  });

  describe('monthStart', () => {
    it('returns the first day of the month at 00:00', () => {
      expect(monthStart(new Date('2024-03-13T12:00:00Z'), 'UTC')).toEqual(new Date('2024-03-01T00:00:00.000Z'));
    });
  });

  describe('isLastDayOfMonth', () => {
    it('knows leap-year February', () => {
      expect(isLastDayOfMonth(new Date('2024-02-29T23:55:00Z'), 'UTC')).toBe(true);
      expect(isLastDayOfMonth(new Date('2024-02-28T23:55:00Z'), 'UTC')).toBe(false);
    });
  });

  describe('currentPeriodKey', () => {
    it('uses the ISO week-year for weeks spanning new year', () => {
      expect(currentPeriodKey(LeaderboardPeriod.WEEKLY, new Date('2024-12-30T10:00:00Z'), 'UTC')).toEqual({ year: 2025, periodNumber: 1 });
    });

    it('uses the calendar month for monthly periods', () => {
      expect(currentPeriodKey(LeaderboardPeriod.MONTHLY, new Date('2024-12-30T10:00:00Z'), 'UTC')).toEqual({ year: 2024, periodNumber: 12 });
    });
  });

  describe('resetWeeklyIfNeeded', () => {
    it('does not reset when observed exactly at the week start', () => {
      const window = counters();

      expect(resetWeeklyIfNeeded(window, new Date('2024-03-11T00:00:00.000Z'), 'UTC')).toBe(false);
      expect(window.weeklyPoints).toBe(40);
    });

    it('resets once the following week has started', () => {
      const window = counters();

      expect(resetWeeklyIfNeeded(window, new Date('2024-03-18T00:00:00.001Z'), 'UTC')).toBe(true);
      expect(window).toMatchObject({
        weeklyPoints: 0,
        weeklyReactions: 0,
        weeklyComments: 0,
        weeklyPollVotes: 0,
        lastWeeklyReset: new Date('2024-03-18T00:00:00.000Z'),
        monthlyPoints: 70,
      });
    });

    it('is idempotent within a week', () => {
      const window = counters();
      const now = new Date('2024-03-20T09:00:00Z');

      expect(resetWeeklyIfNeeded(window, now, 'UTC')).toBe(true);
      expect(resetWeeklyIfNeeded(window, now, 'UTC')).toBe(false);
      expect(window.lastWeeklyReset).toEqual(new Date('2024-03-18T00:00:00.000Z'));
    });
  });

  describe('resetMonthlyIfNeeded', () => {
    it('zeroes only the monthly window when a month boundary is crossed', () => {
      const window = counters({
        lastWeeklyReset: new Date('2024-01-29T00:00:00.000Z'),
        lastMonthlyReset: new Date('2024-01-01T00:00:00.000Z'),
      });

      expect(resetMonthlyIfNeeded(window, new Date('2024-02-01T00:00:00Z'), 'UTC')).toBe(true);
      expect(window).toMatchObject({
        monthlyPoints: 0,
        monthlyReactions: 0,
        monthlyComments: 0,
        monthlyPollVotes: 0,
        lastMonthlyReset: new Date('2024-02-01T00:00:00.000Z'),
        weeklyPoints: 40,
        weeklyComments: 1,
      });
    });
  });

  describe('normalizeLeaderboardPeriod', () => {
    it('accepts known periods case-insensitively', () => {
      expect(normalizeLeaderboardPeriod(' Weekly ')).toBe(LeaderboardPeriod.WEEKLY);
      expect(normalizeLeaderboardPeriod('monthly')).toBe(LeaderboardPeriod.MONTHLY);
    });

    it('falls back to all-time for unknown periods', () => {
      expect(normalizeLeaderboardPeriod('yearly')).toBe(LeaderboardPeriod.ALL_TIME);
    });
  });

  describe('parseSnapshotPeriod', () => {
    it('accepts weekly and monthly in any case', () => {
      expect(parseSnapshotPeriod(' Weekly ')).toBe(LeaderboardPeriod.WEEKLY);
      expect(parseSnapshotPeriod('MONTHLY')).toBe(LeaderboardPeriod.MONTHLY);
    });

    it('rejects the all-time window', () => {
      expect(() => parseSnapshotPeriod('All_Time')).toThrow('Unknown snapshot period "All_Time", expected weekly or monthly');
    });
  });
});
