import { DataSource, MoreThan } from 'typeorm';
import { AppDataSource } from '../config/database';
import { logger } from '../config/logger';
import { Comment } from '../models/Comment';
import { Post } from '../models/Post';
import { PostReaction } from '../models/PostReaction';
import { Poll } from '../models/Poll';
import { PollOption } from '../models/PollOption';
import { PollVote } from '../models/PollVote';
import { ScoreLedgerService } from './ScoreLedgerService';
import { HookOutcome, ScoringServiceOptions } from '../types/scoring';

// Hooks also run for rows that are already deleted, so they only need the keys
export type CommentRef = Pick<Comment, 'id' | 'postId' | 'authorId' | 'parentId'>;
export type ReactionRef = Pick<PostReaction, 'id' | 'postId' | 'userId'>;
export type PollVoteRef = Pick<PollVote, 'id' | 'pollId' | 'optionId' | 'userId'>;

/**
 * Scoring side effects of committed content mutations. Command handlers call these
 * right after their change commits.
 *
 * Each hook has two halves, denormalized counters and the score ledger, and runs them
 * independently: a failure in one half is logged and does not stop the other, and no
 * failure reaches the caller, whose content change is already committed.
 */
export class ActivityHooksService {
  private readonly dataSource: DataSource;
  private readonly ledger: ScoreLedgerService;

  constructor(options: ScoringServiceOptions = {}, ledger?: ScoreLedgerService) {
    this.dataSource = options.dataSource ?? AppDataSource;
    this.ledger = ledger ?? new ScoreLedgerService(options);
  }

  async onCommentCreated(comment: CommentRef): Promise<HookOutcome> {
    const countersSynced = await this.runHalf(`comment ${comment.id} created: counters`, () => this.recountComments(comment));
    const ledgerApplied = await this.runHalf(`comment ${comment.id} created: ledger`, async () => {
      await this.ledger.addCommentPoints(comment.authorId);
      return true;
    });
    return { ledgerApplied, countersSynced };
  }

  async onCommentDeleted(comment: CommentRef): Promise<HookOutcome> {
    const countersSynced = await this.runHalf(`comment ${comment.id} deleted: counters`, () => this.recountComments(comment));
    const ledgerApplied = await this.runHalf(`comment ${comment.id} deleted: ledger`, async () => {
      await this.ledger.removeCommentPoints(comment.authorId);
      return true;
    });
    return { ledgerApplied, countersSynced };
  }

  async onReactionCreated(reaction: ReactionRef): Promise<HookOutcome> {
    const countersSynced = await this.runHalf(`reaction ${reaction.id} created: counters`, () => this.recountReactions(reaction.postId));
    const ledgerApplied = await this.runHalf(`reaction ${reaction.id} created: ledger`, async () => {
      await this.ledger.addReactionPoints(reaction.userId);
      return true;
    });
    return { ledgerApplied, countersSynced };
  }

  async onReactionDeleted(reaction: ReactionRef): Promise<HookOutcome> {
    const countersSynced = await this.runHalf(`reaction ${reaction.id} deleted: counters`, () => this.recountReactions(reaction.postId));
    const ledgerApplied = await this.runHalf(`reaction ${reaction.id} deleted: ledger`, async () => {
      await this.ledger.removeReactionPoints(reaction.userId);
      return true;
    });
    return { ledgerApplied, countersSynced };
  }

  async onPollVoteCreated(vote: PollVoteRef): Promise<HookOutcome> {
    const countersSynced = await this.runHalf(`poll vote ${vote.id} created: counters`, () => this.adjustVoteCounters(vote, 1));
    const ledgerApplied = await this.runHalf(`poll vote ${vote.id} created: ledger`, async () => {
      await this.ledger.addPollVotePoints(vote.userId);
      return true;
    });
    return { ledgerApplied, countersSynced };
  }

  async onPollVoteDeleted(vote: PollVoteRef): Promise<HookOutcome> {
    const countersSynced = await this.runHalf(`poll vote ${vote.id} deleted: counters`, () => this.adjustVoteCounters(vote, -1));
    const ledgerApplied = await this.runHalf(`poll vote ${vote.id} deleted: ledger`, async () => {
      await this.ledger.removePollVotePoints(vote.userId);
      return true;
    });
    return { ledgerApplied, countersSynced };
  }

  private async runHalf(label: string, work: () => Promise<boolean>): Promise<boolean> {
    try {
      return await work();
    } catch (error) {
      logger.error(`❌ Activity hook failed (${label}):`, error);
      return false;
    }
  }

  /**
   * post.commentsCount and parent.repliesCount from the live count of active comments.
   * A post or parent removed by a cascading delete is skipped.
   */
  private async recountComments(comment: CommentRef): Promise<boolean> {
    const comments = this.dataSource.getRepository(Comment);
    const posts = this.dataSource.getRepository(Post);
    let synced = true;

    if (await posts.existsBy({ id: comment.postId })) {
      const commentsCount = await comments.countBy({ postId: comment.postId, isActive: true });
      await posts.update(comment.postId, { commentsCount });
    } else {
      logger.warn(`⚠️ Post ${comment.postId} no longer exists, skipping comments count`);
      synced = false;
    }

    if (comment.parentId !== null) {
      if (await comments.existsBy({ id: comment.parentId })) {
        const repliesCount = await comments.countBy({ parentId: comment.parentId, isActive: true });
        await comments.update(comment.parentId, { repliesCount });
      } else {
        logger.warn(`⚠️ Parent comment ${comment.parentId} no longer exists, skipping replies count`);
        synced = false;
      }
    }

    return synced;
  }

  private async recountReactions(postId: number): Promise<boolean> {
    const posts = this.dataSource.getRepository(Post);
    if (!(await posts.existsBy({ id: postId }))) {
      logger.warn(`⚠️ Post ${postId} no longer exists, skipping reactions count`);
      return false;
    }

    const reactionsCount = await this.dataSource.getRepository(PostReaction).countBy({ postId });
    await posts.update(postId, { reactionsCount });
    return true;
  }

  /**
   * Poll and option vote totals move by one; decrements stop at zero.
   */
  private async adjustVoteCounters(vote: PollVoteRef, delta: 1 | -1): Promise<boolean> {
    const polls = this.dataSource.getRepository(Poll);
    const options = this.dataSource.getRepository(PollOption);

    if (!(await polls.existsBy({ id: vote.pollId })) || !(await options.existsBy({ id: vote.optionId }))) {
      logger.warn(`⚠️ Poll ${vote.pollId} or option ${vote.optionId} no longer exists, skipping vote counters`);
      return false;
    }

    if (delta > 0) {
      await polls.increment({ id: vote.pollId }, 'totalVotes', 1);
      await options.increment({ id: vote.optionId }, 'votesCount', 1);
    } else {
      await polls.decrement({ id: vote.pollId, totalVotes: MoreThan(0) }, 'totalVotes', 1);
      await options.decrement({ id: vote.optionId, votesCount: MoreThan(0) }, 'votesCount', 1);
    }
    return true;
  }
}
