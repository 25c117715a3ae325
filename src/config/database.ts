import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { env } from './env';
import { logger } from './logger';

import { User } from '../models/User';
import { Post } from '../models/Post';
import { Comment } from '../models/Comment';
import { PostReaction } from '../models/PostReaction';
import { Poll } from '../models/Poll';
import { PollOption } from '../models/PollOption';
import { PollVote } from '../models/PollVote';
import { ScoreLedgerEntry } from '../models/ScoreLedgerEntry';
import { HistoricalLeaderboardEntry } from '../models/HistoricalLeaderboardEntry';

export const scoringEntities = [
  // Content entities the hooks read and recount
  User,
  Post,
  Comment,
  PostReaction,
  Poll,
  PollOption,
  PollVote,
  // Scoring engine
  ScoreLedgerEntry,
  HistoricalLeaderboardEntry,
];

// Create TypeORM DataSource
export const AppDataSource = new DataSource({
  type: 'postgres',
  host: env.database.host,
  port: env.database.port,
  username: env.database.username,
  password: env.database.password,
  database: env.database.name,
  synchronize: env.database.synchronize,
  logging: env.database.logging,
  entities: scoringEntities,
  migrations: [],
  subscribers: [],
  ssl: env.api.nodeEnv === 'production' ? { rejectUnauthorized: false } : false,
  extra: {
    max: 20,
    idleTimeoutMillis: 60000,
    connectionTimeoutMillis: 5000,
  },
});

// Initialize database connection
export const initializeDatabase = async (): Promise<void> => {
  try {
    if (AppDataSource.isInitialized) {
      logger.info('📋 Database already initialized');
      return;
    }

    logger.info(`🗄️ Connecting to database ${env.database.host}:${env.database.port}/${env.database.name}...`);
    await AppDataSource.initialize();
    await AppDataSource.query('SELECT 1');

    const entityNames = AppDataSource.entityMetadatas.map(meta => meta.name);
    logger.info(`✅ Database connection established, ${entityNames.length} entities loaded: ${entityNames.join(', ')}`);
  } catch (error) {
    logger.error('❌ Database connection failed:', error);
    if (error instanceof Error && error.message.includes('ECONNREFUSED')) {
      logger.error('💡 Tip: Make sure PostgreSQL is running on the specified host and port');
    }
    throw error;
  }
};

// Close database connection
export const closeDatabase = async (): Promise<void> => {
  try {
    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
      logger.info('📴 Database connection closed');
    }
  } catch (error) {
    logger.error('❌ Error closing database connection:', error);
  }
};

// Health check for database
export const checkDatabaseHealth = async (): Promise<boolean> => {
  try {
    if (!AppDataSource.isInitialized) {
      return false;
    }
    await AppDataSource.query('SELECT 1');
    return true;
  } catch (error) {
    logger.error('❌ Database health check failed:', error);
    return false;
  }
};
