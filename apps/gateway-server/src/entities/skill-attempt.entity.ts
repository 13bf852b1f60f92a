import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { AttemptStatus } from '@skillcoach/shared-types';
import { User } from './user.entity';

/**
 * SkillAttempt Entity – One try of one skill by one user.
 *
 * Lifecycle: created IN_PROGRESS, moved to COMPLETED exactly once by a
 * conditional update (`WHERE status = 'IN_PROGRESS'`). Completed rows are
 * never modified again; only progress erasure removes them.
 *
 * Performance:
 * - Index on skillId for per-skill statistics
 * - Index on userId for progress views and erasure
 */
@Entity('skill_attempts')
export class SkillAttempt {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @Index()
  @Column({ type: 'nvarchar', length: 64 })
  userId!: string;

  @Index()
  @Column({ type: 'nvarchar', length: 64 })
  skillId!: string;

  @Column({ type: 'nvarchar', length: 20, default: AttemptStatus.IN_PROGRESS })
  status!: AttemptStatus;

  /** Unset until the attempt completes */
  @Column({ type: Boolean, nullable: true })
  success!: boolean | null;

  @Column({ type: 'datetime' })
  startTime!: Date;

  @Column({ type: 'datetime', nullable: true })
  endTime!: Date | null;
}
