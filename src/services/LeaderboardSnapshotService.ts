import { DataSource, In, Not } from 'typeorm';
import { AppDataSource } from '../config/database';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { HistoricalLeaderboardEntry } from '../models/HistoricalLeaderboardEntry';
import { ScoreLedgerService } from './ScoreLedgerService';
import { LeaderboardService } from './LeaderboardService';
import { SnapshotPeriod, currentPeriodKey, parseSnapshotPeriod } from '../utils/leaderboardPeriods';
import {
  Clock,
  ScoringServiceOptions,
  SnapshotOptions,
  SnapshotResult,
  systemClock,
} from '../types/scoring';

export interface LeaderboardSnapshotServiceOptions extends ScoringServiceOptions {
  snapshotSize?: number;
}

export class LeaderboardSnapshotService {
  private readonly dataSource: DataSource;
  private readonly clock: Clock;
  private readonly timezone: string;
  private readonly snapshotSize: number;
  private readonly ledger: ScoreLedgerService;
  private readonly leaderboard: LeaderboardService;

  constructor(options: LeaderboardSnapshotServiceOptions = {}) {
    this.dataSource = options.dataSource ?? AppDataSource;
    this.clock = options.clock ?? systemClock;
    this.timezone = options.timezone ?? env.leaderboard.timezone;
    this.snapshotSize = options.snapshotSize ?? env.snapshots.size;
    this.ledger = new ScoreLedgerService(options);
    this.leaderboard = new LeaderboardService(options, this.ledger);
  }

  /**
   * Upsert the current week's or month's top entries into historical records.
   * Entries without points in the period are skipped. Rows of users who left the
   * top since an earlier run of the same period stay unless `pruneStale` is set.
   */
  async saveSnapshot(requestedPeriod: string, options: SnapshotOptions = {}): Promise<SnapshotResult> {
    const periodType = parseSnapshotPeriod(requestedPeriod);

    try {
      const now = this.clock();
      const { year, periodNumber } = currentPeriodKey(periodType, now, this.timezone);
      logger.info(`📸 Saving ${periodType} leaderboard snapshot for ${year}/${periodNumber}...`);

      await this.ledger.rolloverAll();
      const top = await this.leaderboard.topEntries(periodType, this.snapshotSize);

      const rows = top
        .filter(entry => entry.pointsFor(periodType) > 0)
        .map((entry, index) => {
          const counts = entry.countsFor(periodType);
          return {
            userId: entry.userId,
            periodType,
            year,
            periodNumber,
            points: entry.pointsFor(periodType),
            rank: index + 1,
            reactionsCount: counts.reactions,
            commentsCount: counts.comments,
            pollVotesCount: counts.pollVotes,
            snapshotAt: now,
          };
        });

      const keptUserIds = rows.map(row => row.userId);
      const repository = this.dataSource.getRepository(HistoricalLeaderboardEntry);
      if (rows.length > 0) {
        await repository.upsert(rows, ['userId', 'periodType', 'year', 'periodNumber']);
      }

      let pruned = 0;
      if (options.pruneStale) {
        const result = await repository.delete(
          keptUserIds.length > 0
            ? { periodType, year, periodNumber, userId: Not(In(keptUserIds)) }
            : { periodType, year, periodNumber }
        );
        pruned = result.affected ?? 0;
      }

      logger.info(`✅ ${periodType} snapshot ${year}/${periodNumber}: ${rows.length} rows saved${options.pruneStale ? `, ${pruned} stale rows pruned` : ''}`);
      return { periodType, year, periodNumber, saved: rows.length, pruned };
    } catch (error) {
      logger.error(`❌ Error saving ${periodType} leaderboard snapshot:`, error);
      throw error;
    }
  }
}
