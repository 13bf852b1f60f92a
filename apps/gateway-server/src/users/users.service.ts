import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  AttemptStatus,
  SkillProgressView,
  TrainingPhase,
  UserProgressView,
} from '@skillcoach/shared-types';
import { SkillProgress, User } from '../entities';
import { EventLogService } from '../event-log/event-log.service';

const MAX_USER_ID_LENGTH = 64;

/**
 * UsersService – Registration and the per-user progress read model.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User) private readonly userRepo: Repository<User>,
    @InjectRepository(SkillProgress) private readonly progressRepo: Repository<SkillProgress>,
    private readonly eventLog: EventLogService,
  ) {}

  /** Idempotent: an existing user is returned unchanged */
  async register(userId: string): Promise<UserProgressView> {
    if (userId.trim().length === 0 || userId.length > MAX_USER_ID_LENGTH) {
      throw new BadRequestException(
        `user_id must be between 1 and ${MAX_USER_ID_LENGTH} characters`,
      );
    }

    const existing = await this.userRepo.findOne({ where: { id: userId } });
    if (!existing) {
      await this.userRepo.save(
        this.userRepo.create({ id: userId, currentPhase: TrainingPhase.FOUNDATION }),
      );
      this.logger.log(`Registered user ${userId}`);
    }
    return this.getProgress(userId);
  }

  async requireUser(userId: string): Promise<User> {
    const user = await this.userRepo.findOne({ where: { id: userId } });
    if (!user) throw new NotFoundException(`User ${userId} not found`);
    return user;
  }

  async getSkillProgress(userId: string): Promise<SkillProgress[]> {
    return this.progressRepo.find({ where: { userId }, order: { skillId: 'ASC' } });
  }

  async getProgress(userId: string): Promise<UserProgressView> {
    const user = await this.requireUser(userId);
    const [progress, attempts] = await Promise.all([
      this.getSkillProgress(userId),
      this.eventLog.attemptsByUser(userId),
    ]);

    const skillProgress: Record<string, SkillProgressView> = {};
    for (const entry of progress) {
      skillProgress[entry.skillId] = toProgressView(entry);
    }

    return {
      user_id: user.id,
      current_phase: user.currentPhase,
      skill_progress: skillProgress,
      attempts: attempts
        .filter((attempt) => attempt.status === AttemptStatus.COMPLETED)
        .map((attempt) => attempt.id),
      active_sessions: attempts
        .filter((attempt) => attempt.status === AttemptStatus.IN_PROGRESS)
        .map((attempt) => attempt.id),
      created_at: user.createdAt.toISOString(),
      updated_at: user.updatedAt.toISOString(),
    };
  }
}

export function toProgressView(entry: SkillProgress): SkillProgressView {
  return {
    skill_id: entry.skillId,
    attempts: entry.attempts,
    successful_attempts: entry.successfulAttempts,
    success_rate: entry.successRate,
    last_attempt: entry.lastAttempt ? entry.lastAttempt.toISOString() : null,
  };
}
