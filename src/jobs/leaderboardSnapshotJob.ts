#!/usr/bin/env node

import 'reflect-metadata';
import { initializeDatabase, closeDatabase, checkDatabaseHealth } from '../config/database';
import { LeaderboardSnapshotCronService } from '../services/LeaderboardSnapshotCronService';
import { parseSnapshotPeriod } from '../utils/leaderboardPeriods';
import { logger } from '../config/logger';

/**
 * Long-running process that owns the weekly and monthly leaderboard snapshot schedules
 */
class LeaderboardSnapshotJob {
  private cronService: LeaderboardSnapshotCronService;
  private isRunning: boolean = false;

  constructor() {
    this.cronService = new LeaderboardSnapshotCronService();
  }

  /**
   * Start the snapshot schedules
   */
  async start(): Promise<void> {
    logger.info('🚀 Starting Leaderboard Snapshot Job...');

    await initializeDatabase();
    if (!(await checkDatabaseHealth())) {
      throw new Error('Database health check failed');
    }

    this.cronService.start();
    this.isRunning = true;
    this.setupGracefulShutdown();

    logger.info('✅ Leaderboard Snapshot Job started successfully');
  }

  /**
   * Save one snapshot and exit
   */
  async runOnce(requestedPeriod: string): Promise<void> {
    const period = parseSnapshotPeriod(requestedPeriod);

    await initializeDatabase();
    try {
      const result = await this.cronService.runNow(period);
      if (result) {
        logger.info(`✅ Saved ${result.saved} ${result.periodType} rows for ${result.year}/${result.periodNumber}`);
      }
    } finally {
      await closeDatabase();
    }
  }

  /**
   * Stop the schedules and close the database
   */
  async stop(): Promise<void> {
    logger.info('🛑 Stopping Leaderboard Snapshot Job...');
    this.isRunning = false;
    this.cronService.stop();
    await closeDatabase();
    logger.info('✅ Leaderboard Snapshot Job stopped successfully');
  }

  private setupGracefulShutdown(): void {
    const shutdown = async (signal: string) => {
      logger.info(`📨 Received ${signal}, initiating graceful shutdown...`);
      await this.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('💥 Unhandled Rejection:', reason);
    });
  }

  getStatus(): object {
    return {
      isRunning: this.isRunning,
      ...this.cronService.getStatus(),
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * CLI Interface for running the job
 */
async function main() {
  const args = process.argv.slice(2);
  const command = args[0] ?? 'start';

  const snapshotJob = new LeaderboardSnapshotJob();

  switch (command) {
    case 'start':
      await snapshotJob.start();
      break;

    case 'run-once':
      await snapshotJob.runOnce(args[1] ?? 'weekly');
      break;

    case 'status':
      console.log(JSON.stringify(snapshotJob.getStatus(), null, 2));
      break;

    default:
      console.log('Usage:');
      console.log('  npm run start:snapshot-job                      # Start weekly/monthly snapshot schedules');
      console.log('  npm run start:snapshot-job -- run-once weekly   # Save one snapshot and exit');
      console.log('  npm run start:snapshot-job -- status            # Print schedule status');
      process.exitCode = 1;
  }
}

// Run if called directly
if (require.main === module) {
  main().catch((error) => {
    logger.error('💥 Fatal error in Leaderboard Snapshot Job:', error);
    process.exit(1);
  });
}
