import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { User } from './user.entity';

/**
 * SkillProgress Entity – Per-user, per-skill roll-up of completed attempts.
 *
 * Written only inside the attempt-completion transaction, so `attempts`
 * always equals the number of completed attempts in the event log.
 */
@Entity('skill_progress')
@Index(['userId', 'skillId'], { unique: true })
export class SkillProgress {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @Column({ type: 'nvarchar', length: 64 })
  userId!: string;

  @Column({ type: 'nvarchar', length: 64 })
  skillId!: string;

  /** Completed attempts */
  @Column({ type: 'int', default: 0 })
  attempts!: number;

  @Column({ type: 'int', default: 0 })
  successfulAttempts!: number;

  @Column({ type: 'float', default: 0 })
  successRate!: number;

  /** End time of the latest completed attempt */
  @Column({ type: 'datetime', nullable: true })
  lastAttempt!: Date | null;
}
