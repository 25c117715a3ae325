#!/usr/bin/env node

import 'reflect-metadata';
import { initializeDatabase, closeDatabase } from '../src/config/database';
import { logger } from '../src/config/logger';
import { LeaderboardSnapshotService } from '../src/services/LeaderboardSnapshotService';
import { LeaderboardPeriod, parseSnapshotPeriod } from '../src/utils/leaderboardPeriods';

/**
 * Save the current weekly or monthly leaderboard snapshot outside the schedule.
 *
 * Usage: npm run snapshot:save -- [weekly|monthly] [--prune-stale]
 */
async function main() {
  const args = process.argv.slice(2);
  const pruneStale = args.includes('--prune-stale');
  const period = parseSnapshotPeriod(args.find(arg => !arg.startsWith('--')) ?? LeaderboardPeriod.WEEKLY);

  try {
    await initializeDatabase();

    const result = await new LeaderboardSnapshotService().saveSnapshot(period, { pruneStale });
    logger.info(`📊 ${result.periodType} ${result.year}/${result.periodNumber}: ${result.saved} saved, ${result.pruned} pruned`);
  } finally {
    await closeDatabase();
  }
}

main().catch((error) => {
  logger.error('💥 Leaderboard snapshot script failed:', error);
  process.exit(1);
});
