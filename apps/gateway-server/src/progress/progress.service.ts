import { Injectable, NotFoundException } from '@nestjs/common';
import {
  AttemptStatus,
  CommonError,
  SkillRecommendation,
  UserSkillStats,
  WeakStep,
} from '@skillcoach/shared-types';
import { groupCommonErrors, rankWeakSteps } from '../analytics/error-aggregation';
import { EventLogService } from '../event-log/event-log.service';
import { RecommenderService } from '../recommendations/recommender.service';
import { SkillCatalogService } from '../skills/skill-catalog.service';
import { UsersService } from '../users/users.service';

/**
 * ProgressService – Per-user insight views over the event log.
 *
 * skill stats count completed attempts only, matching SkillProgress;
 * common errors and weak steps include errors from open attempts too.
 */
@Injectable()
export class ProgressService {
  constructor(
    private readonly eventLog: EventLogService,
    private readonly users: UsersService,
    private readonly catalog: SkillCatalogService,
    private readonly recommender: RecommenderService,
  ) {}

  async getSkillStats(userId: string, skillId: string): Promise<UserSkillStats> {
    await this.users.requireUser(userId);
    this.catalog.getSkill(skillId);

    const progress = (await this.users.getSkillProgress(userId)).find(
      (entry) => entry.skillId === skillId,
    );
    if (!progress || progress.attempts === 0) {
      throw new NotFoundException(`User ${userId} has not completed skill ${skillId}`);
    }

    const completedIds = new Set(
      (await this.eventLog.attemptsByUser(userId))
        .filter((attempt) => attempt.skillId === skillId && attempt.status === AttemptStatus.COMPLETED)
        .map((attempt) => attempt.id),
    );
    const errors = (await this.eventLog.errorsByUser(userId, skillId)).filter((error) =>
      completedIds.has(error.attemptId),
    );

    const errorByStep: Record<string, number> = {};
    for (const error of errors) {
      const step = String(error.stepNumber);
      errorByStep[step] = (errorByStep[step] ?? 0) + 1;
    }

    return {
      skill_id: skillId,
      attempts: progress.attempts,
      successful_attempts: progress.successfulAttempts,
      success_rate: progress.successRate,
      total_errors: errors.length,
      last_attempt: progress.lastAttempt ? progress.lastAttempt.toISOString() : null,
      error_by_step: errorByStep,
    };
  }

  async getCommonErrors(userId: string, skillId?: string): Promise<{ errors: CommonError[] }> {
    await this.users.requireUser(userId);
    const errors = await this.eventLog.errorsByUser(userId, skillId);
    return { errors: groupCommonErrors(errors) };
  }

  async getWeakSteps(userId: string, skillId?: string): Promise<{ weak_steps: WeakStep[] }> {
    await this.users.requireUser(userId);
    const errors = await this.eventLog.errorsByUser(userId, skillId);
    return { weak_steps: rankWeakSteps(errors) };
  }

  async getRecommendedSkills(
    userId: string,
  ): Promise<{ recommendations: SkillRecommendation[] }> {
    const user = await this.users.requireUser(userId);
    const progress = await this.users.getSkillProgress(userId);
    return { recommendations: this.recommender.recommendSkills(user.currentPhase, progress) };
  }
}
