import { DataSource, Repository } from 'typeorm';
import { AppDataSource } from '../config/database';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { ScoreLedgerEntry } from '../models/ScoreLedgerEntry';
import { HistoricalLeaderboardEntry } from '../models/HistoricalLeaderboardEntry';
import { ActivityType, PointWeights, defaultPointWeights } from '../utils/scoreWeights';
import { monthStart, weekStart } from '../utils/leaderboardPeriods';
import {
  Clock,
  PurgeUserOptions,
  PurgeUserResult,
  RolloverResult,
  ScoringServiceOptions,
  systemClock,
} from '../types/scoring';

type ResetColumn = 'lastWeeklyReset' | 'lastMonthlyReset';
type WindowResetField =
  | ResetColumn
  | 'weeklyPoints' | 'weeklyReactions' | 'weeklyComments' | 'weeklyPollVotes'
  | 'monthlyPoints' | 'monthlyReactions' | 'monthlyComments' | 'monthlyPollVotes';

export class ScoreLedgerService {
  private readonly dataSource: DataSource;
  private readonly clock: Clock;
  private readonly timezone: string;
  private readonly weights: PointWeights;

  constructor(options: ScoringServiceOptions = {}) {
    this.dataSource = options.dataSource ?? AppDataSource;
    this.clock = options.clock ?? systemClock;
    this.timezone = options.timezone ?? env.leaderboard.timezone;
    this.weights = options.weights ?? defaultPointWeights;
  }

  get repository(): Repository<ScoreLedgerEntry> {
    return this.dataSource.getRepository(ScoreLedgerEntry);
  }

  /**
   * Existing ledger entry for the user, or a fresh one starting at the current windows
   */
  async getOrCreate(userId: number): Promise<ScoreLedgerEntry> {
    const existing = await this.repository.findOneBy({ userId });
    if (existing) {
      return existing;
    }

    const entry = ScoreLedgerEntry.createFor(userId, this.clock(), this.timezone);
    try {
      const created = await this.repository.save(entry);
      logger.debug(`🆕 Created score ledger entry for user ${userId}`);
      return created;
    } catch (error) {
      // A concurrent request created the row first
      const winner = await this.repository.findOneBy({ userId });
      if (winner) {
        return winner;
      }
      throw error;
    }
  }

  /**
   * Ledger entry with both windows rolled over to the current period
   */
  async getCurrent(userId: number): Promise<ScoreLedgerEntry> {
    await this.getOrCreate(userId);
    await this.resetStaleWindows(this.clock(), userId);
    return this.repository.findOneByOrFail({ userId });
  }

  async addReactionPoints(userId: number): Promise<ScoreLedgerEntry> {
    return this.applyActivity(userId, ActivityType.REACTION, 1);
  }

  async removeReactionPoints(userId: number): Promise<ScoreLedgerEntry> {
    return this.applyActivity(userId, ActivityType.REACTION, -1);
  }

  async addCommentPoints(userId: number): Promise<ScoreLedgerEntry> {
    return this.applyActivity(userId, ActivityType.COMMENT, 1);
  }

  async removeCommentPoints(userId: number): Promise<ScoreLedgerEntry> {
    return this.applyActivity(userId, ActivityType.COMMENT, -1);
  }

  async addPollVotePoints(userId: number): Promise<ScoreLedgerEntry> {
    return this.applyActivity(userId, ActivityType.POLL_VOTE, 1);
  }

  async removePollVotePoints(userId: number): Promise<ScoreLedgerEntry> {
    return this.applyActivity(userId, ActivityType.POLL_VOTE, -1);
  }

  /**
   * Lazy rollover for every ledger entry. Returns how many entries each window reset.
   */
  async rolloverAll(): Promise<RolloverResult> {
    const result = await this.resetStaleWindows(this.clock());
    if (result.weekly > 0 || result.monthly > 0) {
      logger.debug(`🔄 Rolled over ${result.weekly} weekly and ${result.monthly} monthly score ledger windows`);
    }
    return result;
  }

  /**
   * Remove the user's ledger entry and historical leaderboard rows.
   */
  async purgeUser(userId: number, options: PurgeUserOptions = {}): Promise<PurgeUserResult> {
    const dryRun = options.dryRun ?? false;

    try {
      const ledgerEntries = await this.repository.countBy({ userId });
      const historicalEntries = await this.dataSource
        .getRepository(HistoricalLeaderboardEntry)
        .countBy({ userId });

      if (dryRun) {
        logger.info(`🔍 [DRY RUN] User ${userId}: ${ledgerEntries} ledger entries, ${historicalEntries} historical rows`);
        return { userId, ledgerEntries, historicalEntries, deleted: false };
      }

      await this.dataSource.transaction(async (manager) => {
        await manager.getRepository(HistoricalLeaderboardEntry).delete({ userId });
        await manager.getRepository(ScoreLedgerEntry).delete({ userId });
      });

      logger.info(`🗑️ Purged scoring data for user ${userId}: ${ledgerEntries} ledger entries, ${historicalEntries} historical rows`);
      return { userId, ledgerEntries, historicalEntries, deleted: true };
    } catch (error) {
      logger.error(`❌ Error purging scoring data for user ${userId}:`, error);
      throw error;
    }
  }

  /**
   * One conditional UPDATE per window, writing only that window's columns
   */
  private async resetStaleWindows(now: Date, userId?: number): Promise<RolloverResult> {
    const week = weekStart(now, this.timezone);
    const month = monthStart(now, this.timezone);

    const weekly = await this.resetWindow('lastWeeklyReset', week, {
      weeklyPoints: 0,
      weeklyReactions: 0,
      weeklyComments: 0,
      weeklyPollVotes: 0,
      lastWeeklyReset: week,
    }, userId);
    const monthly = await this.resetWindow('lastMonthlyReset', month, {
      monthlyPoints: 0,
      monthlyReactions: 0,
      monthlyComments: 0,
      monthlyPollVotes: 0,
      lastMonthlyReset: month,
    }, userId);
    return { weekly, monthly };
  }

  private async resetWindow(
    column: ResetColumn,
    start: Date,
    values: Partial<Pick<ScoreLedgerEntry, WindowResetField>>,
    userId?: number
  ): Promise<number> {
    const metadata = this.repository.metadata;
    const resetColumn = metadata.findColumnWithPropertyName(column);
    const userColumn = metadata.findColumnWithPropertyName('userId');
    if (!resetColumn || !userColumn) {
      throw new Error(`Score ledger column metadata missing for ${column}`);
    }

    const driver = this.dataSource.driver;
    const query = this.dataSource
      .createQueryBuilder()
      .update(ScoreLedgerEntry)
      .set(values)
      .where(`${driver.escape(resetColumn.databaseName)} < :start`, {
        start: driver.preparePersistentValue(start, resetColumn),
      });
    if (userId !== undefined) {
      query.andWhere(`${driver.escape(userColumn.databaseName)} = :userId`, { userId });
    }

    const result = await query.execute();
    return result.affected ?? 0;
  }

  /**
   * Rollover, then count one activity unit in or out, inside one transaction.
   */
  private async applyActivity(userId: number, type: ActivityType, delta: 1 | -1): Promise<ScoreLedgerEntry> {
    try {
      await this.getOrCreate(userId);

      return await this.dataSource.transaction(async (manager) => {
        const repository = manager.getRepository(ScoreLedgerEntry);
        const entry = await repository.findOneByOrFail({ userId });
        const now = this.clock();

        entry.applyRollover(now, this.timezone);
        entry.recordActivity(type, delta, this.weights);
        entry.updatedAt = now;

        const saved = await repository.save(entry);
        logger.debug(`🎯 ${delta > 0 ? '+' : '-'}${type} for user ${userId}: ${saved.totalPoints} total, ${saved.weeklyPoints} weekly, ${saved.monthlyPoints} monthly`);
        return saved;
      });
    } catch (error) {
      logger.error(`❌ Error applying ${type} ${delta > 0 ? 'credit' : 'debit'} for user ${userId}:`, error);
      throw error;
    }
  }
}
