import { Injectable } from '@nestjs/common';
import {
  AnalyticsLimits,
  CommonError,
  FocusSkill,
  PhaseProgression,
  PhaseSkillLevels,
  SkillLevel,
  SkillRecommendation,
  TrainingPhase,
} from '@skillcoach/shared-types';
import { SkillCatalogService } from '../skills/skill-catalog.service';

/** The slice of SkillProgress the recommender reads */
export interface ProgressSnapshot {
  skillId: string;
  attempts: number;
  successRate: number;
}

const PHASE_NOTES: Record<TrainingPhase, string> = {
  [TrainingPhase.FOUNDATION]: 'Focus on the basic movements: forward, backward, turning',
  [TrainingPhase.MOBILITY]: 'Work on terrain skills and obstacles',
  [TrainingPhase.ADVANCED]: 'Advanced techniques and emergency skills',
};

/** Phase reached by mastering the levels of the current one */
const NEXT_PHASE: Partial<Record<TrainingPhase, TrainingPhase>> = {
  [TrainingPhase.FOUNDATION]: TrainingPhase.MOBILITY,
  [TrainingPhase.MOBILITY]: TrainingPhase.ADVANCED,
};

/**
 * RecommenderService – Phase-based skill recommendations and phase
 * progression.
 *
 * Priority scale:
 *   3 → never completed
 *   2 → success rate below 50 %
 *   1 → success rate below 80 %
 * Skills at or above 80 % are not recommended. Equal priorities keep
 * catalog order.
 */
@Injectable()
export class RecommenderService {
  constructor(private readonly catalog: SkillCatalogService) {}

  recommendSkills(
    phase: TrainingPhase,
    progress: readonly ProgressSnapshot[],
  ): SkillRecommendation[] {
    const bySkill = new Map(progress.map((entry) => [entry.skillId, entry]));
    const levels = PhaseSkillLevels[phase];
    const recommendations: SkillRecommendation[] = [];

    for (const skill of this.catalog.all()) {
      if (!levels.includes(skill.level)) continue;

      const entry = bySkill.get(skill.skill_id);
      const attempts = entry?.attempts ?? 0;
      const successRate = entry?.successRate ?? 0;

      let priority: number;
      let reason: string;
      if (attempts === 0) {
        priority = 3;
        reason = 'Not attempted yet';
      } else if (successRate < 0.5) {
        priority = 2;
        reason = `Low success rate: ${formatPercent(successRate)}`;
      } else if (successRate < 0.8) {
        priority = 1;
        reason = `Can be improved: ${formatPercent(successRate)}`;
      } else {
        continue;
      }

      recommendations.push({
        skill_id: skill.skill_id,
        title: skill.title,
        level: skill.level,
        attempts,
        success_rate: successRate,
        priority,
        reason,
      });
    }

    return recommendations.sort((a, b) => b.priority - a.priority);
  }

  /** Skills behind the user's most frequent errors */
  focusSkills(commonErrors: readonly CommonError[]): FocusSkill[] {
    const bySkill = new Map<string, FocusSkill>();

    for (const error of commonErrors.slice(0, AnalyticsLimits.PLAN_COMMON_ERRORS)) {
      let focus = bySkill.get(error.skill_id);
      if (!focus) {
        focus = { skill_id: error.skill_id, total_errors: 0, error_types: [] };
        bySkill.set(error.skill_id, focus);
      }
      focus.total_errors += error.count;
      if (!focus.error_types.includes(error.error_type)) focus.error_types.push(error.error_type);
    }

    return [...bySkill.values()]
      .sort((a, b) => b.total_errors - a.total_errors)
      .slice(0, AnalyticsLimits.PLAN_FOCUS_SKILLS);
  }

  sessionGoals(recommendations: readonly SkillRecommendation[]): string[] {
    const [first] = recommendations;
    return first ? [`Priority skill: ${first.title} - ${first.reason}`] : [];
  }

  notes(phase: TrainingPhase, focusSkills: readonly FocusSkill[]): string[] {
    const notes: string[] = [];
    const [first] = focusSkills;
    if (first) notes.push(`Watch out: frequent errors in '${first.skill_id}'`);
    notes.push(PHASE_NOTES[phase]);
    return notes;
  }

  /**
   * Phase after re-evaluating progress: advances one step when at least
   * 60 % of the current phase's catalog skills reach 70 % success.
   */
  nextPhase(phase: TrainingPhase, progress: readonly ProgressSnapshot[]): TrainingPhase {
    const next = NEXT_PHASE[phase];
    if (!next) return phase;

    const levels: readonly SkillLevel[] = PhaseSkillLevels[phase];
    const phaseSkills = this.catalog.all().filter((skill) => levels.includes(skill.level));
    if (phaseSkills.length === 0) return phase;

    const rates = new Map(progress.map((entry) => [entry.skillId, entry.successRate]));
    const learned = phaseSkills.filter(
      (skill) => (rates.get(skill.skill_id) ?? 0) >= PhaseProgression.SKILL_SUCCESS_THRESHOLD,
    ).length;

    return learned >= phaseSkills.length * PhaseProgression.REQUIRED_SKILL_SHARE ? next : phase;
  }
}

function formatPercent(rate: number): string {
  return `${Math.round(rate * 100)}%`;
}
