import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
} from 'typeorm';
import { Poll } from './Poll';
import { PollOption } from './PollOption';
import { User } from './User';

@Entity('poll_votes')
@Unique(['pollId', 'userId']) // One vote per user per poll
export class PollVote {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  pollId!: number;

  @ManyToOne(() => Poll, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pollId' })
  poll!: Poll;

  @Column({ type: 'integer' })
  optionId!: number;

  @ManyToOne(() => PollOption, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'optionId' })
  option!: PollOption;

  @Column({ type: 'integer' })
  userId!: number;

  @ManyToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @CreateDateColumn()
  createdAt!: Date;
}
