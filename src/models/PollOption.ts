import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Poll } from './Poll';

@Entity('poll_options')
@Index(['pollId'])
export class PollOption {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  pollId!: number;

  @ManyToOne(() => Poll, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pollId' })
  poll!: Poll;

  @Column({ type: 'varchar', length: 200 })
  text!: string;

  @Column({ type: 'integer', default: 0 })
  votesCount!: number;
}
