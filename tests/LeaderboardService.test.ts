import { DataSource } from 'typeorm';
import { LeaderboardService } from '../src/services/LeaderboardService';
import { ScoreLedgerService } from '../src/services/ScoreLedgerService';
import { LeaderboardPeriod } from '../src/utils/leaderboardPeriods';
import { FakeClock, createTestDataSource, createUser } from './helpers/testDataSource';

describe('LeaderboardService', () => {
  let dataSource: DataSource;
  let clock: FakeClock;
  let ledger: ScoreLedgerService;
  let leaderboard: LeaderboardService;

  const addReactions = async (userId: number, count: number) => {
    for (let i = 0; i < count; i++) {
      await ledger.addReactionPoints(userId);
    }
  };

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    clock = new FakeClock('2024-03-13T12:00:00.000Z');
    const options = { dataSource, clock: clock.now, timezone: 'UTC' };
    ledger = new ScoreLedgerService(options);
    leaderboard = new LeaderboardService(options, ledger);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('rank', () => {
    it('follows point changes between two users', async () => {
      const first = await createUser(dataSource, 'first');
      const second = await createUser(dataSource, 'second');
      await addReactions(first.id, 10);
      await addReactions(second.id, 5);

      expect(await leaderboard.rank(first.id, 'all_time')).toBe(1);
      expect(await leaderboard.rank(second.id, 'all_time')).toBe(2);

      await addReactions(second.id, 10);

      expect(await leaderboard.rank(first.id, 'all_time')).toBe(2);
      expect(await leaderboard.rank(second.id, 'all_time')).toBe(1);
    });

    it('gives tied users the same rank', async () => {
      const first = await createUser(dataSource, 'first');
      const second = await createUser(dataSource, 'second');
      await ledger.addCommentPoints(first.id);
      await ledger.addCommentPoints(second.id);

      expect(await leaderboard.rank(first.id, 'weekly')).toBe(1);
      expect(await leaderboard.rank(second.id, 'weekly')).toBe(1);
    });

    it('ranks a user without activity behind everyone with points', async () => {
      const active = await createUser(dataSource, 'active');
      const idle = await createUser(dataSource, 'idle');
      await ledger.addReactionPoints(active.id);

      expect(await leaderboard.rank(idle.id, 'monthly')).toBe(2);
    });

    it('ranks on the rolled-over window', async () => {
      const early = await createUser(dataSource, 'early');
      const late = await createUser(dataSource, 'late');
      await addReactions(early.id, 3);

      clock.set('2024-03-19T10:00:00.000Z');
      await ledger.addReactionPoints(late.id);

      expect(await leaderboard.rank(late.id, 'weekly')).toBe(1);
      expect(await leaderboard.rank(early.id, 'weekly')).toBe(2);
      expect(await leaderboard.rank(early.id, 'all_time')).toBe(1);
    });
  });

  describe('leaderboard', () => {
    it('numbers tied rows by position, most recently active first', async () => {
      const first = await createUser(dataSource, 'first');
      const second = await createUser(dataSource, 'second');
      await ledger.addCommentPoints(first.id);
      clock.advance(60_000);
      await ledger.addCommentPoints(second.id);

      const result = await leaderboard.leaderboard('weekly');

      expect(result.period).toBe(LeaderboardPeriod.WEEKLY);
      expect(result.entries.map(row => [row.rank, row.user.username, row.points])).toEqual([
        [1, 'second', 30],
        [2, 'first', 30],
      ]);
    });

    it('reports the window counts and user info', async () => {
      const user = await createUser(dataSource, 'Alice', { firstName: 'Alice', lastName: 'Smith' });
      await ledger.addCommentPoints(user.id);
      await ledger.addPollVotePoints(user.id);

      const result = await leaderboard.leaderboard('monthly');

      expect(result.entries).toHaveLength(1);
      expect(result.entries[0]).toEqual({
        rank: 1,
        user: { id: user.id, username: 'Alice', displayName: 'Alice Smith', email: 'alice@example.com' },
        points: 40,
        reactions: 0,
        comments: 1,
        pollVotes: 1,
        updatedAt: new Date('2024-03-13T12:00:00.000Z'),
      });
    });

    it('falls back to all-time for an unknown period', async () => {
      const user = await createUser(dataSource, 'solo');
      await ledger.addReactionPoints(user.id);

      clock.set('2024-04-10T10:00:00.000Z');
      const result = await leaderboard.leaderboard('yearly');

      expect(result.period).toBe(LeaderboardPeriod.ALL_TIME);
      expect(result.entries[0]?.points).toBe(10);
    });

    it('shows zeroed weekly points after the week ends', async () => {
      const user = await createUser(dataSource, 'solo');
      await ledger.addReactionPoints(user.id);

      clock.set('2024-03-18T00:00:00.001Z');
      const result = await leaderboard.leaderboard('weekly');

      expect(result.entries.map(row => row.points)).toEqual([0]);
    });

    it('clamps the limit', async () => {
      for (const name of ['u1', 'u2', 'u3']) {
        const user = await createUser(dataSource, name);
        await ledger.addReactionPoints(user.id);
      }

      expect((await leaderboard.leaderboard('all_time', 2)).entries).toHaveLength(2);
      expect((await leaderboard.leaderboard('all_time', 0)).limit).toBe(1);
      expect((await leaderboard.leaderboard('all_time', 5000)).limit).toBe(100);
      expect((await leaderboard.leaderboard('all_time')).limit).toBe(10);
    });
  });

  describe('getUserStats', () => {
    it('returns points, counts and rank for every window', async () => {
      const leader = await createUser(dataSource, 'leader');
      const user = await createUser(dataSource, 'user');
      await addReactions(leader.id, 5);
      await ledger.addCommentPoints(user.id);
      await ledger.addReactionPoints(user.id);

      const stats = await leaderboard.getUserStats(user.id);

      expect(stats.allTime).toEqual({ points: 40, reactions: 1, comments: 1, pollVotes: 0, rank: 2 });
      expect(stats.weekly).toEqual({ points: 40, reactions: 1, comments: 1, pollVotes: 0, rank: 2 });
      expect(stats.lastWeeklyReset).toEqual(new Date('2024-03-11T00:00:00.000Z'));
      expect(stats.lastMonthlyReset).toEqual(new Date('2024-03-01T00:00:00.000Z'));
    });
  });

  describe('getSummary', () => {
    it('describes the current week and month', async () => {
      const user = await createUser(dataSource, 'solo');
      await ledger.addReactionPoints(user.id);

      const summary = await leaderboard.getSummary(5);

      expect(summary.currentWeek).toEqual({ year: 2024, periodNumber: 11, startsAt: new Date('2024-03-11T00:00:00.000Z') });
      expect(summary.currentMonth).toEqual({ year: 2024, periodNumber: 3, startsAt: new Date('2024-03-01T00:00:00.000Z') });
      expect(summary.allTime.map(row => row.points)).toEqual([10]);
      expect(summary.weekly.map(row => row.points)).toEqual([10]);
      expect(summary.monthly.map(row => row.points)).toEqual([10]);
    });
  });

  describe('getHistoricalLeaderboard', () => {
    it('rejects periods without snapshots', async () => {
      await expect(leaderboard.getHistoricalLeaderboard('all_time')).rejects.toThrow('Unknown snapshot period "all_time", expected weekly or monthly');
    });

    it('returns an empty list when nothing was saved', async () => {
      const result = await leaderboard.getHistoricalLeaderboard('weekly');

      expect(result).toEqual({ periodType: 'weekly', year: 2024, periodNumber: 11, entries: [] });
    });
  });
});
