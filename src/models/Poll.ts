import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { Post } from './Post';

@Entity('polls')
export class Poll {
  @PrimaryGeneratedColumn()
  id!: number;

  // Polls are usually attached to a post and go away with it
  @Column({ type: 'integer', nullable: true })
  postId!: number | null;

  @ManyToOne(() => Post, { nullable: true, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'postId' })
  post?: Post | null;

  @Column({ type: 'varchar', length: 500 })
  question!: string;

  @Column({ type: 'integer', default: 0 })
  totalVotes!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
