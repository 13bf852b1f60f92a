import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { GlobalErrorStats, SkillErrorStats, StepErrorRate } from '@skillcoach/shared-types';
import { EventLogService } from '../event-log/event-log.service';
import { computeGlobalStats, computeSkillStats, computeStepStats } from './error-aggregation';

/**
 * AnalyticsService – Per-skill and system-wide error statistics.
 *
 * Statistics are recomputed from the event log on every call; nothing is
 * cached. Attempts are scanned before errors so that any error counted
 * belongs to an attempt already in the scan.
 */
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(private readonly eventLog: EventLogService) {}

  async getSkillErrorStats(skillId: string): Promise<SkillErrorStats> {
    const attempts = await this.eventLog.attemptsBySkill(skillId);
    const errors = await this.eventLog.errorsBySkill(skillId);

    const stats = computeSkillStats(skillId, attempts, errors, new Date());
    if (!stats) throw new NotFoundException(`No attempts recorded for skill ${skillId}`);
    return stats;
  }

  async getStepErrorStats(skillId: string, stepNumber: number): Promise<StepErrorRate> {
    const attempts = await this.eventLog.attemptsBySkill(skillId);
    const errors = await this.eventLog.errorsBySkillStep(skillId, stepNumber);

    const stats = computeStepStats(skillId, stepNumber, attempts, errors);
    if (!stats) throw new NotFoundException(`No attempts recorded for skill ${skillId}`);
    return stats;
  }

  async getGlobalErrorStats(): Promise<GlobalErrorStats> {
    const startedAt = Date.now();
    const attempts = await this.eventLog.allAttempts();
    const errors = await this.eventLog.allErrors();

    const stats = computeGlobalStats(attempts, errors, new Date());
    this.logger.debug(
      `Global stats over ${attempts.length} attempts / ${errors.length} errors in ${Date.now() - startedAt}ms`,
    );
    return stats;
  }
}
