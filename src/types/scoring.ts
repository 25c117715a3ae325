import { DataSource } from 'typeorm';
import { PointWeights } from '../utils/scoreWeights';
import { LeaderboardPeriod, SnapshotPeriod } from '../utils/leaderboardPeriods';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Collaborators every scoring service accepts. Omitted values fall back to
 * the application DataSource, the wall clock and the configured zone/weights.
 */
export interface ScoringServiceOptions {
  dataSource?: DataSource;
  clock?: Clock;
  timezone?: string;
  weights?: PointWeights;
}

export interface LeaderboardUserInfo {
  id: number;
  username: string;
  displayName: string;
  email: string;
}

export interface LeaderboardRow {
  rank: number;
  user: LeaderboardUserInfo;
  points: number;
  reactions: number;
  comments: number;
  pollVotes: number;
  updatedAt: Date;
}

export interface LeaderboardResult {
  period: LeaderboardPeriod;
  limit: number;
  generatedAt: Date;
  entries: LeaderboardRow[];
}

export interface WindowStats {
  points: number;
  reactions: number;
  comments: number;
  pollVotes: number;
  rank: number;
}

export interface UserScoreStats {
  userId: number;
  allTime: WindowStats;
  weekly: WindowStats;
  monthly: WindowStats;
  lastWeeklyReset: Date;
  lastMonthlyReset: Date;
  updatedAt: Date;
}

export interface PeriodDescriptor {
  year: number;
  periodNumber: number;
  startsAt: Date;
}

export interface LeaderboardSummary {
  generatedAt: Date;
  currentWeek: PeriodDescriptor;
  currentMonth: PeriodDescriptor;
  allTime: LeaderboardRow[];
  weekly: LeaderboardRow[];
  monthly: LeaderboardRow[];
}

export interface HistoricalLeaderboardQuery {
  year?: number;
  periodNumber?: number;
  limit?: number;
}

export interface HistoricalLeaderboardRow {
  rank: number;
  user: LeaderboardUserInfo;
  points: number;
  reactions: number;
  comments: number;
  pollVotes: number;
  snapshotAt: Date;
}

export interface HistoricalLeaderboardResult {
  periodType: SnapshotPeriod;
  year: number;
  periodNumber: number;
  entries: HistoricalLeaderboardRow[];
}

export interface SnapshotOptions {
  pruneStale?: boolean;
}

export interface SnapshotResult {
  periodType: SnapshotPeriod;
  year: number;
  periodNumber: number;
  saved: number;
  pruned: number;
}

export interface HookOutcome {
  ledgerApplied: boolean;
  countersSynced: boolean;
}

export interface PurgeUserOptions {
  dryRun?: boolean;
}

export interface PurgeUserResult {
  userId: number;
  ledgerEntries: number;
  historicalEntries: number;
  deleted: boolean;
}

// Entries whose weekly and monthly windows were reset
export interface RolloverResult {
  weekly: number;
  monthly: number;
}
