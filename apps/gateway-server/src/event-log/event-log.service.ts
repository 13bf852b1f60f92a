import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { AttemptStatus, ErrorTypeSeverity, ErrorType } from '@skillcoach/shared-types';
import {
  AttemptStepError,
  AttemptStepInput,
  AttemptStepTelemetry,
  SkillAttempt,
  SkillProgress,
} from '../entities';

export interface NewStepInput {
  stepNumber: number;
  expectedInput: string;
  actualInput: string;
  timestamp: Date;
}

export interface NewStepError {
  stepNumber: number;
  errorType: ErrorType;
  expectedAction: string;
  actualAction: string;
  timestamp: Date;
}

export interface NewStepTelemetry {
  stepNumber: number;
  expectedAction: string;
  actualAction: string;
  success: boolean;
  holdDuration: number;
  peakForce: number;
  distance: number;
  assistUsed: boolean;
  timestamp: Date;
}

/**
 * EventLogService – Append-only store of attempts and their step records.
 *
 * Every record is tagged with (userId, skillId, attemptId). Step records
 * are read back in arrival order (ascending integer id). The only
 * mutation of existing rows is the IN_PROGRESS → COMPLETED transition,
 * and the only deletion is a user's progress erasure.
 */
@Injectable()
export class EventLogService {
  private readonly logger = new Logger(EventLogService.name);

  constructor(
    @InjectRepository(SkillAttempt) private readonly attemptRepo: Repository<SkillAttempt>,
    @InjectRepository(AttemptStepInput) private readonly inputRepo: Repository<AttemptStepInput>,
    @InjectRepository(AttemptStepError) private readonly errorRepo: Repository<AttemptStepError>,
    @InjectRepository(AttemptStepTelemetry)
    private readonly telemetryRepo: Repository<AttemptStepTelemetry>,
  ) {}

  // ═══════════════════════════════════════════════════════════
  // WRITES
  // ═══════════════════════════════════════════════════════════

  async createAttempt(userId: string, skillId: string): Promise<SkillAttempt> {
    const attempt = this.attemptRepo.create({
      userId,
      skillId,
      status: AttemptStatus.IN_PROGRESS,
      success: null,
      startTime: new Date(),
      endTime: null,
    });
    return this.attemptRepo.save(attempt);
  }

  async appendInput(attempt: SkillAttempt, input: NewStepInput): Promise<AttemptStepInput> {
    const record = await this.inputRepo.save(
      this.inputRepo.create({
        attemptId: attempt.id,
        userId: attempt.userId,
        skillId: attempt.skillId,
        stepNumber: input.stepNumber,
        expectedInput: input.expectedInput,
        actualInput: input.actualInput,
        correct: input.expectedInput === input.actualInput,
        timestamp: input.timestamp,
      }),
    );
    this.logger.debug(`Input #${record.id} appended to attempt ${attempt.id}`);
    return record;
  }

  async appendError(attempt: SkillAttempt, error: NewStepError): Promise<AttemptStepError> {
    const record = await this.errorRepo.save(
      this.errorRepo.create({
        attemptId: attempt.id,
        userId: attempt.userId,
        skillId: attempt.skillId,
        stepNumber: error.stepNumber,
        errorType: error.errorType,
        severity: ErrorTypeSeverity[error.errorType],
        expectedAction: error.expectedAction,
        actualAction: error.actualAction,
        timestamp: error.timestamp,
      }),
    );
    this.logger.debug(`Error #${record.id} (${error.errorType}) appended to attempt ${attempt.id}`);
    return record;
  }

  async appendTelemetry(
    attempt: SkillAttempt,
    telemetry: NewStepTelemetry,
  ): Promise<AttemptStepTelemetry> {
    const record = await this.telemetryRepo.save(
      this.telemetryRepo.create({
        attemptId: attempt.id,
        userId: attempt.userId,
        skillId: attempt.skillId,
        ...telemetry,
      }),
    );
    this.logger.debug(`Telemetry #${record.id} appended to attempt ${attempt.id}`);
    return record;
  }

  /**
   * Conditional status change for a transition out of `from`. Returns
   * false when no row matched: another writer moved the attempt first, or
   * it was erased.
   */
  async closeAttempt(
    manager: EntityManager,
    attemptId: string,
    from: AttemptStatus,
    to: AttemptStatus,
    success: boolean,
    endTime: Date,
  ): Promise<boolean> {
    const result = await manager
      .createQueryBuilder()
      .update(SkillAttempt)
      .set({ status: to, success, endTime })
      .where('id = :attemptId', { attemptId })
      .andWhere('status = :from', { from })
      .execute();
    return (result.affected ?? 0) === 1;
  }

  /**
   * Delete every record owned by the user, children before parents.
   * Runs on the caller's transaction manager; returns rows per table.
   */
  async deleteUserRecords(manager: EntityManager, userId: string): Promise<Record<string, number>> {
    const tables = [
      { target: AttemptStepTelemetry, name: 'attempt_step_telemetry' },
      { target: AttemptStepError, name: 'attempt_step_errors' },
      { target: AttemptStepInput, name: 'attempt_step_inputs' },
      { target: SkillAttempt, name: 'skill_attempts' },
      { target: SkillProgress, name: 'skill_progress' },
    ];

    const deleted: Record<string, number> = {};
    for (const { target, name } of tables) {
      const result = await manager.delete(target, { userId });
      deleted[name] = result.affected ?? 0;
      this.logger.debug(`Erasure: deleted ${deleted[name]} rows from ${name}`);
    }
    return deleted;
  }

  // ═══════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════

  findAttempt(attemptId: string): Promise<SkillAttempt | null> {
    return this.attemptRepo.findOne({ where: { id: attemptId } });
  }

  allAttempts(): Promise<SkillAttempt[]> {
    return this.attemptRepo.find({ order: { startTime: 'ASC' } });
  }

  attemptsBySkill(skillId: string): Promise<SkillAttempt[]> {
    return this.attemptRepo.find({ where: { skillId }, order: { startTime: 'ASC' } });
  }

  attemptsByUser(userId: string): Promise<SkillAttempt[]> {
    return this.attemptRepo.find({ where: { userId }, order: { startTime: 'ASC' } });
  }

  allErrors(): Promise<AttemptStepError[]> {
    return this.errorRepo.find({ order: { id: 'ASC' } });
  }

  errorsBySkill(skillId: string): Promise<AttemptStepError[]> {
    return this.errorRepo.find({ where: { skillId }, order: { id: 'ASC' } });
  }

  /** Served by the (skillId, stepNumber) index */
  errorsBySkillStep(skillId: string, stepNumber: number): Promise<AttemptStepError[]> {
    return this.errorRepo.find({ where: { skillId, stepNumber }, order: { id: 'ASC' } });
  }

  errorsByUser(userId: string, skillId?: string): Promise<AttemptStepError[]> {
    return this.errorRepo.find({
      where: skillId === undefined ? { userId } : { userId, skillId },
      order: { id: 'ASC' },
    });
  }

  inputsByAttempt(attemptId: string): Promise<AttemptStepInput[]> {
    return this.inputRepo.find({ where: { attemptId }, order: { id: 'ASC' } });
  }

  telemetryByAttempt(attemptId: string): Promise<AttemptStepTelemetry[]> {
    return this.telemetryRepo.find({ where: { attemptId }, order: { id: 'ASC' } });
  }
}
