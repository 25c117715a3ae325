import { DataSource, In } from 'typeorm';
import { AppDataSource } from '../config/database';
import { logger } from '../config/logger';
import { Comment, MAX_COMMENT_DEPTH } from '../models/Comment';
import { Post } from '../models/Post';
import { PostReaction, ReactionType } from '../models/PostReaction';
import { Poll } from '../models/Poll';
import { PollOption } from '../models/PollOption';
import { PollVote } from '../models/PollVote';
import { ActivityHooksService } from './ActivityHooksService';
import { ScoringServiceOptions } from '../types/scoring';

export const MAX_COMMENT_LENGTH = 1000;

export interface CreateCommentInput {
  postId: number;
  authorId: number;
  content: string;
  parentId?: number | null;
}

export interface ReactToPostInput {
  postId: number;
  userId: number;
  reactionType: string;
}

export interface ReactToPostResult {
  reaction: PostReaction;
  created: boolean;
}

export interface CastPollVoteInput {
  pollId: number;
  optionId: number;
  userId: number;
}

export interface DeletePostResult {
  postId: number;
  comments: number;
  reactions: number;
  pollVotes: number;
}

const isReactionType = (value: string): value is ReactionType =>
  Object.values(ReactionType).some(type => type === value);

/**
 * Content mutations that earn or lose points. Each handler commits its change and
 * then fires the matching activity hook.
 */
export class ContentActivityService {
  private readonly dataSource: DataSource;
  private readonly hooks: ActivityHooksService;

  constructor(options: ScoringServiceOptions = {}, hooks?: ActivityHooksService) {
    this.dataSource = options.dataSource ?? AppDataSource;
    this.hooks = hooks ?? new ActivityHooksService(options);
  }

  async createComment(input: CreateCommentInput): Promise<Comment> {
    const content = input.content.trim();
    if (!content) {
      throw new Error('Comment content is required');
    }
    if (content.length > MAX_COMMENT_LENGTH) {
      throw new Error(`Comment content exceeds ${MAX_COMMENT_LENGTH} characters`);
    }

    await this.findActivePost(input.postId);

    const comments = this.dataSource.getRepository(Comment);
    const parentId = input.parentId ?? null;
    if (parentId !== null) {
      const parent = await comments.findOneBy({ id: parentId, isActive: true });
      if (!parent) {
        throw new Error(`Parent comment ${parentId} not found`);
      }
      if (parent.postId !== input.postId) {
        throw new Error(`Parent comment ${parentId} belongs to a different post`);
      }
      if (parent.isReply()) {
        throw new Error(`Comments can only be nested ${MAX_COMMENT_DEPTH} levels deep`);
      }
    }

    const comment = await comments.save(
      comments.create({
        postId: input.postId,
        authorId: input.authorId,
        parentId,
        content,
      })
    );
    logger.info(`💬 User ${input.authorId} commented on post ${input.postId}${parentId !== null ? ` (reply to ${parentId})` : ''}`);

    await this.hooks.onCommentCreated(comment);
    return comment;
  }

  /**
   * Hard delete; replies go with their parent and each one fires its own hook.
   */
  async deleteComment(commentId: number): Promise<void> {
    const comments = this.dataSource.getRepository(Comment);
    const comment = await comments.findOneBy({ id: commentId });
    if (!comment) {
      throw new Error(`Comment ${commentId} not found`);
    }

    const replies = await comments.findBy({ parentId: comment.id });
    await comments.delete({ id: comment.id });
    logger.info(`🗑️ Deleted comment ${commentId} with ${replies.length} replies`);

    for (const reply of replies) {
      await this.hooks.onCommentDeleted(reply);
    }
    await this.hooks.onCommentDeleted(comment);
  }

  /**
   * Creates the user's reaction or switches its type. Only a new reaction earns points.
   */
  async reactToPost(input: ReactToPostInput): Promise<ReactToPostResult> {
    const reactionType = input.reactionType.trim().toLowerCase();
    if (!isReactionType(reactionType)) {
      throw new Error(`Invalid reaction type "${input.reactionType}", expected one of: ${Object.values(ReactionType).join(', ')}`);
    }

    await this.findActivePost(input.postId);

    const reactions = this.dataSource.getRepository(PostReaction);
    const existing = await reactions.findOneBy({ postId: input.postId, userId: input.userId });
    if (existing) {
      if (existing.reactionType !== reactionType) {
        existing.reactionType = reactionType;
        await reactions.save(existing);
        logger.info(`🔁 User ${input.userId} changed reaction on post ${input.postId} to ${reactionType}`);
      }
      return { reaction: existing, created: false };
    }

    const reaction = await reactions.save(
      reactions.create({ postId: input.postId, userId: input.userId, reactionType })
    );
    logger.info(`${reaction.emoji} User ${input.userId} reacted to post ${input.postId}`);

    await this.hooks.onReactionCreated(reaction);
    return { reaction, created: true };
  }

  async removeReaction(postId: number, userId: number): Promise<void> {
    const reactions = this.dataSource.getRepository(PostReaction);
    const reaction = await reactions.findOneBy({ postId, userId });
    if (!reaction) {
      throw new Error(`User ${userId} has no reaction on post ${postId}`);
    }

    await reactions.delete({ id: reaction.id });
    logger.info(`🗑️ Removed reaction of user ${userId} on post ${postId}`);

    await this.hooks.onReactionDeleted(reaction);
  }

  async castPollVote(input: CastPollVoteInput): Promise<PollVote> {
    const poll = await this.dataSource.getRepository(Poll).findOneBy({ id: input.pollId });
    if (!poll) {
      throw new Error(`Poll ${input.pollId} not found`);
    }

    const option = await this.dataSource.getRepository(PollOption).findOneBy({ id: input.optionId });
    if (!option || option.pollId !== poll.id) {
      throw new Error(`Option ${input.optionId} does not belong to poll ${poll.id}`);
    }

    const votes = this.dataSource.getRepository(PollVote);
    if (await votes.existsBy({ pollId: poll.id, userId: input.userId })) {
      throw new Error(`User ${input.userId} already voted on poll ${poll.id}`);
    }

    const vote = await votes.save(
      votes.create({ pollId: poll.id, optionId: option.id, userId: input.userId })
    );
    logger.info(`🗳️ User ${input.userId} voted for option ${option.id} on poll ${poll.id}`);

    await this.hooks.onPollVoteCreated(vote);
    return vote;
  }

  async retractPollVote(pollId: number, userId: number): Promise<void> {
    const votes = this.dataSource.getRepository(PollVote);
    const vote = await votes.findOneBy({ pollId, userId });
    if (!vote) {
      throw new Error(`User ${userId} has not voted on poll ${pollId}`);
    }

    await votes.delete({ id: vote.id });
    logger.info(`🗑️ Retracted vote of user ${userId} on poll ${pollId}`);

    await this.hooks.onPollVoteDeleted(vote);
  }

  /**
   * Hard delete with cascading children. Deletion hooks run for every child afterwards;
   * their counter half finds the post gone and is skipped, the ledger half still applies.
   */
  async deletePost(postId: number): Promise<DeletePostResult> {
    const posts = this.dataSource.getRepository(Post);
    if (!(await posts.existsBy({ id: postId }))) {
      throw new Error(`Post ${postId} not found`);
    }

    const comments = await this.dataSource.getRepository(Comment).find({
      where: { postId },
      order: { id: 'ASC' },
    });
    const reactions = await this.dataSource.getRepository(PostReaction).findBy({ postId });
    const polls = await this.dataSource.getRepository(Poll).findBy({ postId });
    const votes = polls.length > 0
      ? await this.dataSource.getRepository(PollVote).findBy({ pollId: In(polls.map(poll => poll.id)) })
      : [];

    await posts.delete({ id: postId });
    logger.info(`🗑️ Deleted post ${postId}: ${comments.length} comments, ${reactions.length} reactions, ${votes.length} poll votes cascaded`);

    // Replies before their parents
    const ordered = [
      ...comments.filter(comment => comment.isReply()),
      ...comments.filter(comment => !comment.isReply()),
    ];
    for (const comment of ordered) {
      await this.hooks.onCommentDeleted(comment);
    }
    for (const reaction of reactions) {
      await this.hooks.onReactionDeleted(reaction);
    }
    for (const vote of votes) {
      await this.hooks.onPollVoteDeleted(vote);
    }

    return {
      postId,
      comments: comments.length,
      reactions: reactions.length,
      pollVotes: votes.length,
    };
  }

  private async findActivePost(postId: number): Promise<Post> {
    const post = await this.dataSource.getRepository(Post).findOneBy({ id: postId, isActive: true });
    if (!post) {
      throw new Error(`Post ${postId} not found`);
    }
    return post;
  }
}
