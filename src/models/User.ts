import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

/**
 * Identity record owned by the accounts subsystem. The scoring engine only reads it
 * to resolve display names and emails for leaderboard rows.
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  // Emails are stored lowercase
  @Column({
    type: 'varchar',
    length: 254,
    unique: true,
    transformer: {
      to: (value: string) => value.toLowerCase(),
      from: (value: string) => value
    }
  })
  @Index()
  email!: string;

  @Column({ type: 'varchar', length: 150, unique: true })
  username!: string;

  @Column({ type: 'varchar', length: 150, default: '' })
  firstName!: string;

  @Column({ type: 'varchar', length: 150, default: '' })
  lastName!: string;

  @CreateDateColumn()
  createdAt!: Date;

  getDisplayName(): string {
    const fullName = `${this.firstName} ${this.lastName}`.trim();
    return fullName || this.username;
  }
}
