import { DataSource } from 'typeorm';
import { AppDataSource } from '../config/database';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { ScoreLedgerEntry, POINTS_COLUMN } from '../models/ScoreLedgerEntry';
import { HistoricalLeaderboardEntry } from '../models/HistoricalLeaderboardEntry';
import { User } from '../models/User';
import { ScoreLedgerService } from './ScoreLedgerService';
import {
  LeaderboardPeriod,
  currentPeriodKey,
  parseSnapshotPeriod,
  monthStart,
  normalizeLeaderboardPeriod,
  weekStart,
} from '../utils/leaderboardPeriods';
import {
  Clock,
  HistoricalLeaderboardQuery,
  HistoricalLeaderboardResult,
  LeaderboardResult,
  LeaderboardRow,
  LeaderboardSummary,
  LeaderboardUserInfo,
  ScoringServiceOptions,
  UserScoreStats,
  WindowStats,
  systemClock,
} from '../types/scoring';

export function toUserInfo(user: User): LeaderboardUserInfo {
  return {
    id: user.id,
    username: user.username,
    displayName: user.getDisplayName(),
    email: user.email,
  };
}

/**
 * Live rankings over the score ledger.
 *
 * Two rank notions coexist on purpose: `rank()` is 1 + the number of users with
 * strictly more points (tied users share a rank), while `leaderboard()` numbers rows
 * by position (tied users get consecutive ranks, ordered by most recent activity).
 */
export class LeaderboardService {
  private readonly dataSource: DataSource;
  private readonly clock: Clock;
  private readonly timezone: string;
  private readonly ledger: ScoreLedgerService;

  constructor(options: ScoringServiceOptions = {}, ledger?: ScoreLedgerService) {
    this.dataSource = options.dataSource ?? AppDataSource;
    this.clock = options.clock ?? systemClock;
    this.timezone = options.timezone ?? env.leaderboard.timezone;
    this.ledger = ledger ?? new ScoreLedgerService(options);
  }

  /**
   * 1 + number of ledger entries with strictly more points in the window
   */
  async rank(userId: number, period: string): Promise<number> {
    const window = normalizeLeaderboardPeriod(period);
    await this.ledger.rolloverAll();
    const entry = await this.ledger.getOrCreate(userId);
    return this.rankOf(entry, window);
  }

  /**
   * Top `limit` entries of the window, ranked by position
   */
  async leaderboard(period: string, limit?: number): Promise<LeaderboardResult> {
    const window = normalizeLeaderboardPeriod(period);
    const take = this.clampLimit(limit);

    try {
      await this.ledger.rolloverAll();
      const entries = await this.topEntries(window, take);

      return {
        period: window,
        limit: take,
        generatedAt: this.clock(),
        entries: this.toRows(entries, window),
      };
    } catch (error) {
      logger.error(`❌ Error building ${window} leaderboard:`, error);
      throw error;
    }
  }

  /**
   * Points, activity counts and rank of a user in every window
   */
  async getUserStats(userId: number): Promise<UserScoreStats> {
    await this.ledger.rolloverAll();
    const entry = await this.ledger.getOrCreate(userId);

    const windowStats = async (window: LeaderboardPeriod): Promise<WindowStats> => ({
      points: entry.pointsFor(window),
      ...entry.countsFor(window),
      rank: await this.rankOf(entry, window),
    });

    return {
      userId,
      allTime: await windowStats(LeaderboardPeriod.ALL_TIME),
      weekly: await windowStats(LeaderboardPeriod.WEEKLY),
      monthly: await windowStats(LeaderboardPeriod.MONTHLY),
      lastWeeklyReset: entry.lastWeeklyReset,
      lastMonthlyReset: entry.lastMonthlyReset,
      updatedAt: entry.updatedAt,
    };
  }

  /**
   * Top entries of all three windows plus the current week/month identifiers
   */
  async getSummary(limit?: number): Promise<LeaderboardSummary> {
    const take = this.clampLimit(limit);
    const now = this.clock();
    await this.ledger.rolloverAll();

    const week = currentPeriodKey(LeaderboardPeriod.WEEKLY, now, this.timezone);
    const month = currentPeriodKey(LeaderboardPeriod.MONTHLY, now, this.timezone);

    return {
      generatedAt: now,
      currentWeek: { ...week, startsAt: weekStart(now, this.timezone) },
      currentMonth: { ...month, startsAt: monthStart(now, this.timezone) },
      allTime: this.toRows(await this.topEntries(LeaderboardPeriod.ALL_TIME, take), LeaderboardPeriod.ALL_TIME),
      weekly: this.toRows(await this.topEntries(LeaderboardPeriod.WEEKLY, take), LeaderboardPeriod.WEEKLY),
      monthly: this.toRows(await this.topEntries(LeaderboardPeriod.MONTHLY, take), LeaderboardPeriod.MONTHLY),
    };
  }

  /**
   * Stored snapshot rows for a week or month, defaulting to the current one
   */
  async getHistoricalLeaderboard(
    requestedPeriod: string,
    query: HistoricalLeaderboardQuery = {}
  ): Promise<HistoricalLeaderboardResult> {
    const periodType = parseSnapshotPeriod(requestedPeriod);

    const current = currentPeriodKey(periodType, this.clock(), this.timezone);
    const year = query.year ?? current.year;
    const periodNumber = query.periodNumber ?? current.periodNumber;

    const rows = await this.dataSource.getRepository(HistoricalLeaderboardEntry).find({
      where: { periodType, year, periodNumber },
      relations: { user: true },
      order: { rank: 'ASC' },
      take: this.clampLimit(query.limit),
    });

    return {
      periodType,
      year,
      periodNumber,
      entries: rows.map(row => ({
        rank: row.rank,
        user: toUserInfo(row.user),
        points: row.points,
        reactions: row.reactionsCount,
        comments: row.commentsCount,
        pollVotes: row.pollVotesCount,
        snapshotAt: row.snapshotAt,
      })),
    };
  }

  /**
   * Ledger entries ordered by the window's points, most recently active first on ties.
   * Callers run the rollover first.
   */
  async topEntries(window: LeaderboardPeriod, take: number): Promise<ScoreLedgerEntry[]> {
    const column = POINTS_COLUMN[window];
    return this.ledger.repository
      .createQueryBuilder('entry')
      .innerJoinAndSelect('entry.user', 'user')
      .orderBy(`entry.${column}`, 'DESC')
      .addOrderBy('entry.updatedAt', 'DESC')
      .addOrderBy('entry.id', 'ASC')
      .limit(take)
      .getMany();
  }

  private async rankOf(entry: ScoreLedgerEntry, window: LeaderboardPeriod): Promise<number> {
    const column = POINTS_COLUMN[window];
    const ahead = await this.ledger.repository
      .createQueryBuilder('entry')
      .where(`entry.${column} > :points`, { points: entry.pointsFor(window) })
      .getCount();
    return ahead + 1;
  }

  private toRows(entries: ScoreLedgerEntry[], window: LeaderboardPeriod): LeaderboardRow[] {
    return entries.map((entry, index) => ({
      rank: index + 1,
      user: toUserInfo(entry.user),
      points: entry.pointsFor(window),
      ...entry.countsFor(window),
      updatedAt: entry.updatedAt,
    }));
  }

  private clampLimit(limit?: number): number {
    if (limit === undefined || !Number.isFinite(limit)) {
      return env.leaderboard.defaultLimit;
    }
    return Math.min(env.leaderboard.maxLimit, Math.max(1, Math.floor(limit)));
  }
}
