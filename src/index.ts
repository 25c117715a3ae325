import 'reflect-metadata';

export { env } from './config/env';
export { logger } from './config/logger';
export { AppDataSource, scoringEntities, initializeDatabase, closeDatabase, checkDatabaseHealth } from './config/database';

export { User } from './models/User';
export { Post } from './models/Post';
export { Comment, MAX_COMMENT_DEPTH } from './models/Comment';
export { PostReaction, ReactionType, REACTION_EMOJI } from './models/PostReaction';
export { Poll } from './models/Poll';
export { PollOption } from './models/PollOption';
export { PollVote } from './models/PollVote';
export { ScoreLedgerEntry, POINTS_COLUMN } from './models/ScoreLedgerEntry';
export { HistoricalLeaderboardEntry } from './models/HistoricalLeaderboardEntry';

export { ScoreLedgerService } from './services/ScoreLedgerService';
export { LeaderboardService, toUserInfo } from './services/LeaderboardService';
export { LeaderboardSnapshotService } from './services/LeaderboardSnapshotService';
export type { LeaderboardSnapshotServiceOptions } from './services/LeaderboardSnapshotService';
export { LeaderboardSnapshotCronService } from './services/LeaderboardSnapshotCronService';
export type { LeaderboardSnapshotCronOptions, LeaderboardSnapshotCronStatus } from './services/LeaderboardSnapshotCronService';
export { ActivityHooksService } from './services/ActivityHooksService';
export type { CommentRef, ReactionRef, PollVoteRef } from './services/ActivityHooksService';
export { ContentActivityService, MAX_COMMENT_LENGTH } from './services/ContentActivityService';
export type {
  CreateCommentInput,
  ReactToPostInput,
  ReactToPostResult,
  CastPollVoteInput,
  DeletePostResult,
} from './services/ContentActivityService';

export * from './utils/leaderboardPeriods';
export * from './utils/scoreWeights';
export * from './types/scoring';
