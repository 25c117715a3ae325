import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
  Unique,
} from 'typeorm';
import { Post } from './Post';
import { User } from './User';

export enum ReactionType {
  LOVE = 'love',
  HAHA = 'haha',
  SAD = 'sad',
  ANGRY = 'angry',
}

export const REACTION_EMOJI: Record<ReactionType, string> = {
  [ReactionType.LOVE]: '❤️',
  [ReactionType.HAHA]: '😂',
  [ReactionType.SAD]: '😢',
  [ReactionType.ANGRY]: '😠',
};

@Entity('post_reactions')
@Unique(['postId', 'userId']) // One reaction per user per post
@Index(['postId', 'reactionType'])
@Index(['userId', 'createdAt'])
export class PostReaction {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  postId!: number;

  @ManyToOne(() => Post, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'postId' })
  post!: Post;

  @Column({ type: 'integer' })
  userId!: number;

  @ManyToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @Column({ type: 'varchar', length: 10 })
  reactionType!: ReactionType;

  @CreateDateColumn()
  createdAt!: Date;

  get emoji(): string {
    return REACTION_EMOJI[this.reactionType] ?? '';
  }
}
