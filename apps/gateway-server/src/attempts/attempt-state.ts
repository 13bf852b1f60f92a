import { ConflictException } from '@nestjs/common';
import { AttemptStatus } from '@skillcoach/shared-types';

/** Events an existing attempt can receive */
export enum AttemptEvent {
  RECORD = 'record',
  COMPLETE = 'complete',
}

/**
 * Attempt lifecycle: (start) → IN_PROGRESS → COMPLETED.
 * Anything not listed here is rejected.
 */
export const ATTEMPT_TRANSITIONS: Record<
  AttemptStatus,
  Partial<Record<AttemptEvent, AttemptStatus>>
> = {
  [AttemptStatus.IN_PROGRESS]: {
    [AttemptEvent.RECORD]: AttemptStatus.IN_PROGRESS,
    [AttemptEvent.COMPLETE]: AttemptStatus.COMPLETED,
  },
  [AttemptStatus.COMPLETED]: {},
};

/** Target status of `event`, or ConflictException if the table forbids it */
export function transition(status: AttemptStatus, event: AttemptEvent): AttemptStatus {
  const next = ATTEMPT_TRANSITIONS[status][event];
  if (next === undefined) {
    throw new ConflictException(`Cannot ${event} an attempt that is ${status}`);
  }
  return next;
}
