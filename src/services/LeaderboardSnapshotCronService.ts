import * as cron from 'node-cron';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { LeaderboardSnapshotService, LeaderboardSnapshotServiceOptions } from './LeaderboardSnapshotService';
import { LeaderboardPeriod, SnapshotPeriod, isLastDayOfMonth } from '../utils/leaderboardPeriods';
import { Clock, SnapshotOptions, SnapshotResult, systemClock } from '../types/scoring';

export interface LeaderboardSnapshotCronOptions extends LeaderboardSnapshotServiceOptions {
  weeklySchedule?: string;
  monthlySchedule?: string;
  snapshotService?: LeaderboardSnapshotService;
}

export interface LeaderboardSnapshotCronStatus {
  running: boolean;
  isProcessing: boolean;
  timezone: string;
  weeklySchedule: string;
  monthlySchedule: string;
  lastRun: SnapshotResult | null;
  lastRunAt: Date | null;
}

/**
 * Saves the weekly snapshot at the end of every week and the monthly one on the last
 * day of every month. Runs never overlap; a tick that finds one in progress is skipped.
 */
export class LeaderboardSnapshotCronService {
  private weeklyTask: cron.ScheduledTask | null = null;
  private monthlyTask: cron.ScheduledTask | null = null;
  private isProcessing = false;
  private lastRun: SnapshotResult | null = null;
  private lastRunAt: Date | null = null;

  private readonly snapshots: LeaderboardSnapshotService;
  private readonly clock: Clock;
  private readonly timezone: string;
  private readonly weeklySchedule: string;
  private readonly monthlySchedule: string;

  constructor(options: LeaderboardSnapshotCronOptions = {}) {
    this.snapshots = options.snapshotService ?? new LeaderboardSnapshotService(options);
    this.clock = options.clock ?? systemClock;
    this.timezone = options.timezone ?? env.leaderboard.timezone;
    this.weeklySchedule = options.weeklySchedule ?? env.snapshots.weeklyCron;
    this.monthlySchedule = options.monthlySchedule ?? env.snapshots.monthlyCron;
  }

  /**
   * Start both snapshot schedules
   */
  start(): void {
    if (this.weeklyTask || this.monthlyTask) {
      logger.warn('⚠️ Leaderboard snapshot cron service already running');
      return;
    }

    for (const schedule of [this.weeklySchedule, this.monthlySchedule]) {
      if (!cron.validate(schedule)) {
        throw new Error(`Invalid cron expression "${schedule}"`);
      }
    }

    this.weeklyTask = cron.schedule(this.weeklySchedule, async () => {
      await this.tick(LeaderboardPeriod.WEEKLY);
    }, { timezone: this.timezone });

    this.monthlyTask = cron.schedule(this.monthlySchedule, async () => {
      await this.tick(LeaderboardPeriod.MONTHLY);
    }, { timezone: this.timezone });

    logger.info('⏰ Leaderboard snapshot cron service started:');
    logger.info(`   📅 Weekly snapshot: ${this.weeklySchedule} (${this.timezone})`);
    logger.info(`   🗓️ Monthly snapshot: ${this.monthlySchedule} (${this.timezone}, last day of month only)`);
  }

  /**
   * Stop both snapshot schedules
   */
  stop(): void {
    if (this.weeklyTask) {
      this.weeklyTask.stop();
      this.weeklyTask = null;
    }

    if (this.monthlyTask) {
      this.monthlyTask.stop();
      this.monthlyTask = null;
    }

    logger.info('⏹️ Leaderboard snapshot cron service stopped');
  }

  getStatus(): LeaderboardSnapshotCronStatus {
    return {
      running: this.weeklyTask !== null && this.monthlyTask !== null,
      isProcessing: this.isProcessing,
      timezone: this.timezone,
      weeklySchedule: this.weeklySchedule,
      monthlySchedule: this.monthlySchedule,
      lastRun: this.lastRun,
      lastRunAt: this.lastRunAt,
    };
  }

  /**
   * One scheduled firing. Never throws; returns null when nothing was saved.
   */
  async tick(period: SnapshotPeriod): Promise<SnapshotResult | null> {
    if (period === LeaderboardPeriod.MONTHLY && !isLastDayOfMonth(this.clock(), this.timezone)) {
      logger.debug('📝 Not the last day of the month, skipping monthly snapshot');
      return null;
    }

    try {
      return await this.runNow(period);
    } catch (error) {
      logger.error(`❌ Scheduled ${period} leaderboard snapshot failed:`, error);
      return null;
    }
  }

  /**
   * Save a snapshot immediately (manual trigger). Returns null if a run is in progress.
   */
  async runNow(period: SnapshotPeriod, options: SnapshotOptions = {}): Promise<SnapshotResult | null> {
    if (this.isProcessing) {
      logger.warn(`⏭️ Leaderboard snapshot already in progress, skipping ${period} run`);
      return null;
    }

    this.isProcessing = true;
    try {
      const result = await this.snapshots.saveSnapshot(period, options);
      this.lastRun = result;
      this.lastRunAt = this.clock();
      return result;
    } finally {
      this.isProcessing = false;
    }
  }
}
