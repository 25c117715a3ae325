import dotenv from 'dotenv';
import Joi from 'joi';

// Load environment variables
dotenv.config();

interface EnvVars {
  NODE_ENV: 'development' | 'production' | 'test';
  DB_HOST: string;
  DB_PORT: number;
  DB_NAME: string;
  DB_USERNAME: string;
  DB_PASSWORD: string;
  DB_SYNCHRONIZE: boolean;
  DB_LOGGING: boolean;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'debug';
  LOG_FILE: string;
  POLL_VOTE_POINTS: number;
  LEADERBOARD_TIMEZONE: string;
  LEADERBOARD_DEFAULT_LIMIT: number;
  LEADERBOARD_MAX_LIMIT: number;
  SNAPSHOT_SIZE: number;
  SNAPSHOT_WEEKLY_CRON: string;
  SNAPSHOT_MONTHLY_CRON: string;
}

// Define environment schema
const envSchema = Joi.object<EnvVars>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),

  // Database
  DB_HOST: Joi.string().default('localhost'),
  DB_PORT: Joi.number().default(5432),
  DB_NAME: Joi.string().default('social_feed'),
  DB_USERNAME: Joi.string().default('postgres'),
  DB_PASSWORD: Joi.string().allow('').default(''),
  DB_SYNCHRONIZE: Joi.boolean().default(false),
  DB_LOGGING: Joi.boolean().default(false),

  // Logging
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info'),
  LOG_FILE: Joi.string().default('./logs/app.log'),

  // Scoring (reaction and comment weights are fixed, see utils/scoreWeights)
  POLL_VOTE_POINTS: Joi.number().integer().min(0).default(10),

  // Leaderboard
  LEADERBOARD_TIMEZONE: Joi.string().default('UTC'),
  LEADERBOARD_DEFAULT_LIMIT: Joi.number().integer().min(1).default(10),
  LEADERBOARD_MAX_LIMIT: Joi.number().integer().min(1).default(100),

  // Historical snapshots
  SNAPSHOT_SIZE: Joi.number().integer().min(1).default(100),
  SNAPSHOT_WEEKLY_CRON: Joi.string().default('55 23 * * 0'), // Sunday 23:55
  SNAPSHOT_MONTHLY_CRON: Joi.string().default('55 23 28-31 * *'), // last day of month only, checked in the job
}).unknown();

// Validate environment variables
const { error, value: envVars } = envSchema.validate(process.env);

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

// Export typed environment configuration
export const env = {
  database: {
    host: envVars.DB_HOST,
    port: envVars.DB_PORT,
    name: envVars.DB_NAME,
    username: envVars.DB_USERNAME,
    password: envVars.DB_PASSWORD,
    synchronize: envVars.DB_SYNCHRONIZE,
    logging: envVars.DB_LOGGING,
  },

  api: {
    nodeEnv: envVars.NODE_ENV,
  },

  logging: {
    level: envVars.LOG_LEVEL,
    file: envVars.LOG_FILE,
  },

  scoring: {
    pollVotePoints: envVars.POLL_VOTE_POINTS,
  },

  leaderboard: {
    timezone: envVars.LEADERBOARD_TIMEZONE,
    defaultLimit: envVars.LEADERBOARD_DEFAULT_LIMIT,
    maxLimit: envVars.LEADERBOARD_MAX_LIMIT,
  },

  snapshots: {
    size: envVars.SNAPSHOT_SIZE,
    weeklyCron: envVars.SNAPSHOT_WEEKLY_CRON,
    monthlyCron: envVars.SNAPSHOT_MONTHLY_CRON,
  },
} as const;
