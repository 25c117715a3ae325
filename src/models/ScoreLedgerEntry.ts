import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  OneToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './User';
import {
  ActivityCounts,
  ActivityType,
  PointWeights,
  defaultPointWeights,
  pointsFor,
} from '../utils/scoreWeights';
import {
  LeaderboardPeriod,
  WindowCounters,
  monthStart,
  resetMonthlyIfNeeded,
  resetWeeklyIfNeeded,
  weekStart,
} from '../utils/leaderboardPeriods';

const COUNT_FIELDS: Record<ActivityType, { total: CountField; weekly: CountField; monthly: CountField }> = {
  [ActivityType.REACTION]: { total: 'totalReactions', weekly: 'weeklyReactions', monthly: 'monthlyReactions' },
  [ActivityType.COMMENT]: { total: 'totalComments', weekly: 'weeklyComments', monthly: 'monthlyComments' },
  [ActivityType.POLL_VOTE]: { total: 'totalPollVotes', weekly: 'weeklyPollVotes', monthly: 'monthlyPollVotes' },
};

type CountField =
  | 'totalReactions' | 'totalComments' | 'totalPollVotes'
  | 'weeklyReactions' | 'weeklyComments' | 'weeklyPollVotes'
  | 'monthlyReactions' | 'monthlyComments' | 'monthlyPollVotes';

/**
 * Points column backing each leaderboard window.
 */
export const POINTS_COLUMN: Record<LeaderboardPeriod, 'totalPoints' | 'weeklyPoints' | 'monthlyPoints'> = {
  [LeaderboardPeriod.ALL_TIME]: 'totalPoints',
  [LeaderboardPeriod.WEEKLY]: 'weeklyPoints',
  [LeaderboardPeriod.MONTHLY]: 'monthlyPoints',
};

/**
 * Live per-user scoring aggregate. Points in every window are derived from that
 * window's activity counts, so `points == weighted sum of counts` always holds.
 */
@Entity('score_ledger_entries')
@Index(['totalPoints', 'updatedAt'])
@Index(['weeklyPoints', 'updatedAt'])
@Index(['monthlyPoints', 'updatedAt'])
export class ScoreLedgerEntry implements WindowCounters {
  @PrimaryGeneratedColumn()
  id!: number;

  // Unique through the one-to-one join
  @Column({ type: 'integer' })
  userId!: number;

  @OneToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  // === ALL-TIME ===
  @Column({ type: 'integer', default: 0 })
  totalPoints!: number;

  @Column({ type: 'integer', default: 0 })
  totalReactions!: number;

  @Column({ type: 'integer', default: 0 })
  totalComments!: number;

  @Column({ type: 'integer', default: 0 })
  totalPollVotes!: number;

  // === WEEKLY (reset every Monday 00:00) ===
  @Column({ type: 'integer', default: 0 })
  weeklyPoints!: number;

  @Column({ type: 'integer', default: 0 })
  weeklyReactions!: number;

  @Column({ type: 'integer', default: 0 })
  weeklyComments!: number;

  @Column({ type: 'integer', default: 0 })
  weeklyPollVotes!: number;

  // === MONTHLY (reset on the 1st) ===
  @Column({ type: 'integer', default: 0 })
  monthlyPoints!: number;

  @Column({ type: 'integer', default: 0 })
  monthlyReactions!: number;

  @Column({ type: 'integer', default: 0 })
  monthlyComments!: number;

  @Column({ type: 'integer', default: 0 })
  monthlyPollVotes!: number;

  // Start of the window last applied
  @Column()
  lastWeeklyReset!: Date;

  @Column()
  lastMonthlyReset!: Date;

  @CreateDateColumn()
  createdAt!: Date;

  // Set by the scoring services from their clock, also the leaderboard tie-breaker
  @Column()
  updatedAt!: Date;

  static createFor(userId: number, now: Date, zone?: string): ScoreLedgerEntry {
    const entry = new ScoreLedgerEntry();
    entry.userId = userId;
    entry.totalPoints = 0;
    entry.totalReactions = 0;
    entry.totalComments = 0;
    entry.totalPollVotes = 0;
    entry.weeklyPoints = 0;
    entry.weeklyReactions = 0;
    entry.weeklyComments = 0;
    entry.weeklyPollVotes = 0;
    entry.monthlyPoints = 0;
    entry.monthlyReactions = 0;
    entry.monthlyComments = 0;
    entry.monthlyPollVotes = 0;
    entry.lastWeeklyReset = weekStart(now, zone);
    entry.lastMonthlyReset = monthStart(now, zone);
    entry.updatedAt = now;
    return entry;
  }

  // === ROLLOVER ===
  resetWeeklyIfNeeded(now: Date, zone?: string): boolean {
    return resetWeeklyIfNeeded(this, now, zone);
  }

  resetMonthlyIfNeeded(now: Date, zone?: string): boolean {
    return resetMonthlyIfNeeded(this, now, zone);
  }

  /**
   * Both window checks; true when either window was reset.
   */
  applyRollover(now: Date, zone?: string): boolean {
    const weekly = this.resetWeeklyIfNeeded(now, zone);
    const monthly = this.resetMonthlyIfNeeded(now, zone);
    return weekly || monthly;
  }

  // === ACTIVITY ===
  /**
   * Count one activity unit in (+1) or out of (-1) every window. Each count clamps at
   * zero on its own; points are then re-derived from the counts.
   */
  recordActivity(type: ActivityType, delta: 1 | -1, weights: PointWeights = defaultPointWeights): void {
    const fields = COUNT_FIELDS[type];
    for (const field of [fields.total, fields.weekly, fields.monthly]) {
      this[field] = Math.max(0, this[field] + delta);
    }
    this.recalculatePoints(weights);
  }

  recalculatePoints(weights: PointWeights = defaultPointWeights): void {
    this.totalPoints = pointsFor(this.countsFor(LeaderboardPeriod.ALL_TIME), weights);
    this.weeklyPoints = pointsFor(this.countsFor(LeaderboardPeriod.WEEKLY), weights);
    this.monthlyPoints = pointsFor(this.countsFor(LeaderboardPeriod.MONTHLY), weights);
  }

  // === READ HELPERS ===
  pointsFor(period: LeaderboardPeriod): number {
    return this[POINTS_COLUMN[period] ?? POINTS_COLUMN[LeaderboardPeriod.ALL_TIME]];
  }

  countsFor(period: LeaderboardPeriod): ActivityCounts {
    switch (period) {
      case LeaderboardPeriod.WEEKLY:
        return {
          reactions: this.weeklyReactions,
          comments: this.weeklyComments,
          pollVotes: this.weeklyPollVotes,
        };
      case LeaderboardPeriod.MONTHLY:
        return {
          reactions: this.monthlyReactions,
          comments: this.monthlyComments,
          pollVotes: this.monthlyPollVotes,
        };
      default:
        return {
          reactions: this.totalReactions,
          comments: this.totalComments,
          pollVotes: this.totalPollVotes,
        };
    }
  }
}
