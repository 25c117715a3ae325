import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './User';

@Entity('posts')
@Index(['authorId', 'createdAt'])
export class Post {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  authorId!: number;

  @ManyToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'authorId' })
  author!: User;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  // === DENORMALIZED COUNTERS (recomputed by the activity hooks) ===
  @Column({ type: 'integer', default: 0 })
  reactionsCount!: number;

  @Column({ type: 'integer', default: 0 })
  commentsCount!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
