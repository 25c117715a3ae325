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
import { User } from './User';
import { SnapshotPeriod } from '../utils/leaderboardPeriods';

/**
 * Point-in-time copy of one user's weekly or monthly standing. Re-running a snapshot
 * for the same period overwrites the row instead of adding a new one.
 */
@Entity('historical_leaderboard_entries')
@Unique(['userId', 'periodType', 'year', 'periodNumber'])
@Index(['periodType', 'year', 'periodNumber', 'rank'])
export class HistoricalLeaderboardEntry {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  userId!: number;

  @ManyToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @Column({ type: 'varchar', length: 10 })
  periodType!: SnapshotPeriod;

  // ISO week-year for weekly rows, calendar year for monthly rows
  @Column({ type: 'integer' })
  year!: number;

  // ISO week number (1-53) or month (1-12)
  @Column({ type: 'integer' })
  periodNumber!: number;

  @Column({ type: 'integer' })
  points!: number;

  @Column({ type: 'integer' })
  rank!: number;

  @Column({ type: 'integer', default: 0 })
  reactionsCount!: number;

  @Column({ type: 'integer', default: 0 })
  commentsCount!: number;

  @Column({ type: 'integer', default: 0 })
  pollVotesCount!: number;

  // When the values were last written by a snapshot run
  @Column()
  snapshotAt!: Date;

  @CreateDateColumn()
  createdAt!: Date;
}
