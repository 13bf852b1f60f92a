import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { SkillAttempt } from './skill-attempt.entity';

/**
 * AttemptStepInput Entity – A controller input observed at one step.
 *
 * Append-only. The integer primary key doubles as the arrival sequence;
 * step numbers may repeat and arrive out of order.
 */
@Entity('attempt_step_inputs')
export class AttemptStepInput {
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

  @Column({ type: 'nvarchar', length: 64 })
  expectedInput!: string;

  @Column({ type: 'nvarchar', length: 64 })
  actualInput!: string;

  /** expectedInput === actualInput, computed server-side */
  @Column({ type: Boolean })
  correct!: boolean;

  @Column({ type: 'datetime' })
  timestamp!: Date;
}
