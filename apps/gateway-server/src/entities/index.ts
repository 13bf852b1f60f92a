/**
 * Entity barrel export – Single import point for all TypeORM entities.
 *
 * IMPORTANT: Keep this file in sync when adding new entities.
 * The AllEntities array is used in TypeOrmModule.forRoot() configuration.
 */
export { User } from './user.entity';
export { SkillProgress } from './skill-progress.entity';
export { SkillAttempt } from './skill-attempt.entity';
export { AttemptStepInput } from './attempt-step-input.entity';
export { AttemptStepError } from './attempt-step-error.entity';
export { AttemptStepTelemetry } from './attempt-step-telemetry.entity';

import { User } from './user.entity';
import { SkillProgress } from './skill-progress.entity';
import { SkillAttempt } from './skill-attempt.entity';
import { AttemptStepInput } from './attempt-step-input.entity';
import { AttemptStepError } from './attempt-step-error.entity';
import { AttemptStepTelemetry } from './attempt-step-telemetry.entity';

/** Explicit entity array for TypeOrmModule configuration */
export const AllEntities = [
  User,
  SkillProgress,
  SkillAttempt,
  AttemptStepInput,
  AttemptStepError,
  AttemptStepTelemetry,
];
