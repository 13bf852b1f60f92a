import { Injectable, Logger } from '@nestjs/common';
import {
  AnalyticsLimits,
  GlobalInsights,
  SkillComparison,
  TrainingPlan,
} from '@skillcoach/shared-types';
import { AnalyticsService } from '../analytics/analytics.service';
import { compareWithGlobal, groupCommonErrors } from '../analytics/error-aggregation';
import { EventLogService } from '../event-log/event-log.service';
import { RecommenderService } from '../recommendations/recommender.service';
import { UsersService } from '../users/users.service';

/**
 * TrainingPlanService – Composes a personalised training plan.
 *
 * Plan sections:
 * 1. recommended_skills / focus_skills / session_goals / notes from the
 *    recommender (always present)
 * 2. global_insights: head of the system-wide error statistics
 * 3. your_common_errors: the user's most frequent mistakes
 * 4. skill_comparisons: the user's success rates against everyone's
 *
 * Sections 2-4 stay empty until the user has at least one attempt.
 */
@Injectable()
export class TrainingPlanService {
  private readonly logger = new Logger(TrainingPlanService.name);

  constructor(
    private readonly users: UsersService,
    private readonly eventLog: EventLogService,
    private readonly analytics: AnalyticsService,
    private readonly recommender: RecommenderService,
  ) {}

  async generatePlan(userId: string): Promise<TrainingPlan> {
    const user = await this.users.requireUser(userId);
    const [progress, attempts, userErrors] = await Promise.all([
      this.users.getSkillProgress(userId),
      this.eventLog.attemptsByUser(userId),
      this.eventLog.errorsByUser(userId),
    ]);

    const recommended = this.recommender
      .recommendSkills(user.currentPhase, progress)
      .slice(0, AnalyticsLimits.PLAN_RECOMMENDED_SKILLS);
    const commonErrors = groupCommonErrors(userErrors);
    const focusSkills = this.recommender.focusSkills(commonErrors);

    let globalInsights: GlobalInsights = {
      most_failed_skills: [],
      common_mistakes: [],
      problematic_steps: [],
    };
    let skillComparisons: SkillComparison[] = [];
    if (attempts.length > 0) {
      const globalStats = await this.analytics.getGlobalErrorStats();
      globalInsights = {
        most_failed_skills: globalStats.skill_summary
          .slice(0, AnalyticsLimits.PLAN_MOST_FAILED_SKILLS)
          .map((entry) => entry.skill_id),
        common_mistakes: globalStats.action_confusion.slice(0, AnalyticsLimits.PLAN_COMMON_MISTAKES),
        problematic_steps: globalStats.problematic_steps.slice(
          0,
          AnalyticsLimits.PLAN_PROBLEMATIC_STEPS,
        ),
      };
      skillComparisons = compareWithGlobal(progress, globalStats.skill_summary);
    }

    this.logger.debug(
      `Plan for ${userId}: ${recommended.length} recommended, ${focusSkills.length} focus skills`,
    );

    return {
      user_id: user.id,
      current_phase: user.currentPhase,
      generated_at: new Date().toISOString(),
      recommended_skills: recommended,
      focus_skills: focusSkills,
      session_goals: this.recommender.sessionGoals(recommended),
      notes: this.recommender.notes(user.currentPhase, focusSkills),
      global_insights: globalInsights,
      your_common_errors:
        attempts.length > 0 ? commonErrors.slice(0, AnalyticsLimits.PLAN_COMMON_ERRORS) : [],
      skill_comparisons: skillComparisons,
    };
  }
}
