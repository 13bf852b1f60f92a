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
 * AttemptStepTelemetry Entity – Physical metrics the simulator reports
 * per step (how long a key was held, force applied, distance covered).
 */
@Entity('attempt_step_telemetry')
export class AttemptStepTelemetry {
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

  @Column({ type: 'nvarchar', length: 64, default: '' })
  expectedAction!: string;

  @Column({ type: 'nvarchar', length: 64, default: '' })
  actualAction!: string;

  @Column({ type: Boolean, default: false })
  success!: boolean;

  /** Seconds the input was held */
  @Column({ type: 'float', default: 0 })
  holdDuration!: number;

  @Column({ type: 'float', default: 0 })
  peakForce!: number;

  /** Metres travelled during the step */
  @Column({ type: 'float', default: 0 })
  distance!: number;

  @Column({ type: Boolean, default: false })
  assistUsed!: boolean;

  @Column({ type: 'datetime' })
  timestamp!: Date;
}
