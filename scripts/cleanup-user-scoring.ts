#!/usr/bin/env node

import 'reflect-metadata';
import { initializeDatabase, closeDatabase } from '../src/config/database';
import { logger } from '../src/config/logger';
import { ScoreLedgerService } from '../src/services/ScoreLedgerService';

const USAGE = 'Usage: cleanup-user-scoring --user-id <id> [--dry-run]';

export interface CleanupUserArgs {
  userId: number;
  dryRun: boolean;
}

/**
 * The user id must be all digits; "12abc" or "1e3" is rejected, never read as a number prefix.
 */
export function parseCleanupArgs(args: string[]): CleanupUserArgs {
  const dryRun = args.includes('--dry-run');

  let rawUserId: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--user-id') {
      rawUserId = args[i + 1] ?? '';
    } else if (arg?.startsWith('--user-id=')) {
      rawUserId = arg.slice('--user-id='.length);
    }
  }

  if (rawUserId === undefined) {
    throw new Error(USAGE);
  }
  if (!/^\d+$/.test(rawUserId)) {
    throw new Error(`Invalid user id "${rawUserId}". ${USAGE}`);
  }

  const userId = Number(rawUserId);
  if (!Number.isSafeInteger(userId)) {
    throw new Error(`Invalid user id "${rawUserId}". ${USAGE}`);
  }
  return { userId, dryRun };
}

/**
 * Remove one user's score ledger entry and historical leaderboard rows.
 *
 * Usage: npm run scoring:cleanup-user -- --user-id <id> [--dry-run]
 */
async function main() {
  const { userId, dryRun } = parseCleanupArgs(process.argv.slice(2));

  try {
    await initializeDatabase();

    const result = await new ScoreLedgerService().purgeUser(userId, { dryRun });
    if (result.deleted) {
      logger.info(`✅ Removed ${result.ledgerEntries} ledger entries and ${result.historicalEntries} historical rows for user ${userId}`);
    } else {
      logger.info(`🔍 [DRY RUN] Would remove ${result.ledgerEntries} ledger entries and ${result.historicalEntries} historical rows for user ${userId}`);
    }
  } finally {
    await closeDatabase();
  }
}

// Run if called directly
if (require.main === module) {
  main().catch((error) => {
    logger.error('💥 User scoring cleanup failed:', error);
    process.exit(1);
  });
}
