import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Post } from './Post';
import { User } from './User';

export const MAX_COMMENT_DEPTH = 2;

@Entity('comments')
@Index(['postId', 'isActive'])
@Index(['parentId', 'isActive'])
export class Comment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  postId!: number;

  @ManyToOne(() => Post, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'postId' })
  post!: Post;

  @Column({ type: 'integer' })
  authorId!: number;

  @ManyToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'authorId' })
  author!: User;

  // Replies point at a top-level comment; replies to replies are rejected
  @Column({ type: 'integer', nullable: true })
  parentId!: number | null;

  @ManyToOne(() => Comment, { nullable: true, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'parentId' })
  parent?: Comment | null;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ type: 'integer', default: 0 })
  repliesCount!: number;

  @CreateDateColumn()
  createdAt!: Date;

  isReply(): boolean {
    return this.parentId !== null;
  }
}
