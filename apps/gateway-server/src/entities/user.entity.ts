import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import { TrainingPhase } from '@skillcoach/shared-types';

/**
 * User Entity – A trainee registered by the VR client.
 *
 * Design decisions:
 * - The primary key is the client-chosen user id (≤64 chars); the VR
 *   client owns identity, the gateway only tracks progress.
 * - Users are never deleted. Progress erasure empties their history and
 *   resets the phase, keeping the row so later calls stay valid.
 */
@Entity('users')
export class User {
  @PrimaryColumn({ type: 'nvarchar', length: 64 })
  id!: string;

  @Column({ type: 'nvarchar', length: 20, default: TrainingPhase.FOUNDATION })
  currentPhase!: TrainingPhase;

  @CreateDateColumn({ type: 'datetime' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'datetime' })
  updatedAt!: Date;
}
