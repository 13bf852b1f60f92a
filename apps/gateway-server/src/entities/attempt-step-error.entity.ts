import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { ErrorSeverity, ErrorType } from '@skillcoach/shared-types';
import { SkillAttempt } from './skill-attempt.entity';

/**
 * AttemptStepError Entity – A classified mistake reported by the client.
 *
 * Independent of AttemptStepInput: the client may report an error without
 * a matching input record and vice versa. The integer primary key defines
 * arrival order, which breaks ties when grouping a user's common errors.
 *
 * Performance:
 * - Composite index on (skillId, stepNumber) for per-step breakdowns
 */
@Entity('attempt_step_errors')
@Index(['skillId', 'stepNumber'])
export class AttemptStepError {
  @PrimaryGeneratedColumn()
  readonly id!: number;

  @ManyToOne(() => SkillAttempt, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'attemptId' })
  attempt!: SkillAttempt;

  @Index()
  @Column({ type: 'uuid' })
  attemptId!: string;

  @Index()
  @Column({ type: 'nvarchar', length: 64 })
  userId!: string;

  @Column({ type: 'nvarchar', length: 64 })
  skillId!: string;

  @Column({ type: 'int' })
  stepNumber!: number;

  @Column({ type: 'nvarchar', length: 40 })
  errorType!: ErrorType;

  /** Denormalized from the error type so reports need no lookup */
  @Column({ type: 'nvarchar', length: 10 })
  severity!: ErrorSeverity;

  @Column({ type: 'nvarchar', length: 64 })
  expectedAction!: string;

  @Column({ type: 'nvarchar', length: 64 })
  actualAction!: string;

  @Column({ type: 'datetime' })
  timestamp!: Date;
}
