import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { isUUID } from 'class-validator';
import { DataSource, EntityManager } from 'typeorm';
import {
  Ack,
  AttemptStatus,
  RedisKeys,
  StartAttemptResponse,
} from '@skillcoach/shared-types';
import { RedisService } from '../common/redis.service';
import { SkillAttempt, SkillProgress, User } from '../entities';
import { EventLogService } from '../event-log/event-log.service';
import { RecommenderService } from '../recommendations/recommender.service';
import { SkillCatalogService } from '../skills/skill-catalog.service';
import { UsersService } from '../users/users.service';
import { AttemptEvent, transition } from './attempt-state';
import {
  CompleteAttemptDto,
  RecordErrorDto,
  RecordInputDto,
  StepTelemetryDto,
} from './attempts.dto';

/**
 * AttemptsService – The attempt state machine.
 *
 * Concurrency:
 * - Every mutation of an attempt runs under a Redis lock keyed by the
 *   attempt id, so one writer at a time across gateway replicas.
 * - Completion is also a conditional UPDATE on status; zero rows
 *   affected means the attempt was completed concurrently.
 * - The progress roll-up and phase re-evaluation commit in the same
 *   transaction as the status change.
 */
@Injectable()
export class AttemptsService {
  private readonly logger = new Logger(AttemptsService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly redis: RedisService,
    private readonly eventLog: EventLogService,
    private readonly catalog: SkillCatalogService,
    private readonly users: UsersService,
    private readonly recommender: RecommenderService,
  ) {}

  async startAttempt(userId: string, skillId: string): Promise<StartAttemptResponse> {
    const skill = this.catalog.getSkill(skillId);
    await this.users.requireUser(userId);

    const attempt = await this.eventLog.createAttempt(userId, skillId);
    this.logger.log(`Attempt ${attempt.id} started: user=${userId} skill=${skillId}`);

    return {
      success: true,
      attempt_id: attempt.id,
      skill_id: skillId,
      skill_steps: skill,
    };
  }

  async recordInput(attemptId: string, dto: RecordInputDto): Promise<Ack> {
    return this.mutate(attemptId, AttemptEvent.RECORD, async (attempt) => {
      await this.eventLog.appendInput(attempt, {
        stepNumber: dto.step_number,
        expectedInput: dto.expected_input,
        actualInput: dto.actual_input,
        timestamp: parseTimestamp(dto.timestamp),
      });
      return { success: true, message: 'Input recorded' };
    });
  }

  async recordError(attemptId: string, dto: RecordErrorDto): Promise<Ack> {
    return this.mutate(attemptId, AttemptEvent.RECORD, async (attempt) => {
      await this.eventLog.appendError(attempt, {
        stepNumber: dto.step_number,
        errorType: dto.error_type,
        expectedAction: dto.expected_action,
        actualAction: dto.actual_action,
        timestamp: new Date(),
      });
      return { success: true, message: 'Error recorded' };
    });
  }

  async recordStepTelemetry(attemptId: string, dto: StepTelemetryDto): Promise<Ack> {
    const stepNumber = dto.stepNumber ?? dto.step_number;
    if (stepNumber === undefined) {
      throw new BadRequestException('stepNumber or step_number is required');
    }

    return this.mutate(attemptId, AttemptEvent.RECORD, async (attempt) => {
      await this.eventLog.appendTelemetry(attempt, {
        stepNumber,
        expectedAction: dto.expectedAction ?? dto.expected_action ?? '',
        actualAction: dto.actualAction ?? dto.actual_action ?? '',
        success: dto.success ?? false,
        holdDuration: dto.holdDuration ?? dto.hold_duration ?? 0,
        peakForce: dto.peakForce ?? dto.peak_force ?? 0,
        distance: dto.distance ?? 0,
        assistUsed: dto.assistUsed ?? dto.assist_used ?? false,
        timestamp: parseTimestamp(dto.timestamp),
      });
      return { success: true, message: 'Telemetry recorded' };
    });
  }

  async completeAttempt(attemptId: string, dto: CompleteAttemptDto): Promise<Ack> {
    return this.mutate(attemptId, AttemptEvent.COMPLETE, async (attempt, next) => {
      const endTime = new Date();

      await this.dataSource.transaction(async (manager) => {
        const completed = await this.eventLog.closeAttempt(
          manager,
          attempt.id,
          attempt.status,
          next,
          dto.success,
          endTime,
        );
        if (!completed) {
          this.logger.warn(`Attempt ${attempt.id} was completed concurrently`);
          throw new ConflictException(`Attempt ${attempt.id} is already completed`);
        }
        await this.rollUpProgress(manager, attempt, dto.success, endTime);
      });

      this.logger.log(
        `Attempt ${attempt.id} completed: user=${attempt.userId} skill=${attempt.skillId} success=${dto.success}`,
      );
      return { success: true, message: 'Attempt completed' };
    });
  }

  // ═══════════════════════════════════════════════════════════
  // PRIVATE
  // ═══════════════════════════════════════════════════════════

  /**
   * Lock the attempt, load it, check the transition table, then run
   * `work` with the target status while still holding the lock.
   *
   * Erasure does not take attempt locks. If `work` fails and the attempt
   * is gone afterwards, the failure is reported as NotFound.
   */
  private async mutate<T>(
    attemptId: string,
    event: AttemptEvent,
    work: (attempt: SkillAttempt, next: AttemptStatus) => Promise<T>,
  ): Promise<T> {
    if (!isUUID(attemptId)) throw new NotFoundException(`Attempt ${attemptId} not found`);

    return this.redis.withLock(`${RedisKeys.ATTEMPT_LOCK}:${attemptId}`, async () => {
      const attempt = await this.eventLog.findAttempt(attemptId);
      if (!attempt) throw new NotFoundException(`Attempt ${attemptId} not found`);

      let next: AttemptStatus;
      try {
        next = transition(attempt.status, event);
      } catch (error) {
        this.logger.warn(`Rejected ${event} on attempt ${attemptId} (${attempt.status})`);
        throw error;
      }

      try {
        return await work(attempt, next);
      } catch (error) {
        if (await this.eventLog.findAttempt(attemptId)) throw error;
        this.logger.warn(`Attempt ${attemptId} was erased during ${event}`);
        throw new NotFoundException(`Attempt ${attemptId} not found`);
      }
    });
  }

  private async rollUpProgress(
    manager: EntityManager,
    attempt: SkillAttempt,
    success: boolean,
    endTime: Date,
  ): Promise<void> {
    const existing = await manager.findOne(SkillProgress, {
      where: { userId: attempt.userId, skillId: attempt.skillId },
    });
    const progress =
      existing ??
      manager.create(SkillProgress, {
        userId: attempt.userId,
        skillId: attempt.skillId,
        attempts: 0,
        successfulAttempts: 0,
        successRate: 0,
        lastAttempt: null,
      });

    progress.attempts += 1;
    if (success) progress.successfulAttempts += 1;
    progress.successRate = progress.successfulAttempts / progress.attempts;
    progress.lastAttempt = endTime;
    await manager.save(progress);

    const user = await manager.findOne(User, { where: { id: attempt.userId } });
    if (!user) throw new NotFoundException(`User ${attempt.userId} not found`);

    const allProgress = await manager.find(SkillProgress, { where: { userId: attempt.userId } });
    const nextPhase = this.recommender.nextPhase(user.currentPhase, allProgress);
    if (nextPhase !== user.currentPhase) {
      await manager.update(User, { id: user.id }, { currentPhase: nextPhase });
      this.logger.log(`User ${user.id} advanced: ${user.currentPhase} → ${nextPhase}`);
    }
  }
}

function parseTimestamp(value: string | undefined): Date {
  return value === undefined ? new Date() : new Date(value);
}
