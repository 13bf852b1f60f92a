import {
  ActionConfusion,
  AnalyticsLimits,
  AttemptStatus,
  COMPARISON_THRESHOLD,
  CommonError,
  ComparisonResult,
  ErrorType,
  ErrorTypeCount,
  GlobalErrorStats,
  ProblematicStep,
  SkillComparison,
  SkillErrorStats,
  SkillSummaryEntry,
  StepErrorRate,
  WeakStep,
  WrongActionCount,
} from '@skillcoach/shared-types';

/**
 * Recompute-on-read aggregation over event log rows.
 *
 * Everything here is pure: callers pass one scan of attempts and one scan
 * of error records. Errors whose attempt is missing from the attempt scan
 * are dropped, so a read racing a writer or an erasure cannot count an
 * error without its attempt.
 *
 * String ordering is by UTF-16 code unit, not locale.
 */

export interface AttemptFact {
  id: string;
  userId: string;
  skillId: string;
  status: AttemptStatus;
  success: boolean | null;
}

export interface ErrorFact {
  /** Arrival sequence */
  id: number;
  attemptId: string;
  userId: string;
  skillId: string;
  stepNumber: number;
  errorType: ErrorType;
  expectedAction: string;
  actualAction: string;
}

export interface ProgressFact {
  skillId: string;
  attempts: number;
  successfulAttempts: number;
}

/** Tolerance for binary rounding around the comparison threshold */
const EPSILON = 1e-9;

// ═══════════════════════════════════════════════════════════════
// PER-SKILL STATISTICS
// ═══════════════════════════════════════════════════════════════

/**
 * Error statistics for one skill. Returns null when the skill has no
 * attempts at all; callers translate that into NotFound.
 */
export function computeSkillStats(
  skillId: string,
  attempts: readonly AttemptFact[],
  errors: readonly ErrorFact[],
  now: Date,
): SkillErrorStats | null {
  const skillAttempts = attempts.filter((attempt) => attempt.skillId === skillId);
  const totalAttempts = skillAttempts.length;
  if (totalAttempts === 0) return null;

  const skillErrors = visibleErrors(skillAttempts, errors).filter(
    (error) => error.skillId === skillId,
  );
  const failedAttempts = countFailed(skillAttempts);

  const ranked = [...groupBy(skillErrors, (error) => error.stepNumber)]
    .map(([stepNumber, stepErrors]) => ({
      rawRate: stepErrors.length / totalAttempts,
      entry: buildStepErrorRate(stepNumber, stepErrors, totalAttempts),
    }))
    .sort((a, b) => b.rawRate - a.rawRate || a.entry.step_number - b.entry.step_number);

  const stepErrorRates = ranked.map(({ entry }) => entry);

  return {
    skill_id: skillId,
    total_attempts: totalAttempts,
    failed_attempts: failedAttempts,
    failure_rate: failedAttempts / totalAttempts,
    step_error_rates: stepErrorRates,
    most_difficult_step: stepErrorRates[0] ?? null,
    generated_at: now.toISOString(),
  };
}

/**
 * Breakdown of a single step. Null when the skill has no attempts; a step
 * without errors gets a zero entry.
 */
export function computeStepStats(
  skillId: string,
  stepNumber: number,
  attempts: readonly AttemptFact[],
  errors: readonly ErrorFact[],
): StepErrorRate | null {
  const skillAttempts = attempts.filter((attempt) => attempt.skillId === skillId);
  if (skillAttempts.length === 0) return null;

  const stepErrors = visibleErrors(skillAttempts, errors).filter(
    (error) => error.skillId === skillId && error.stepNumber === stepNumber,
  );
  return buildStepErrorRate(stepNumber, stepErrors, skillAttempts.length);
}

function buildStepErrorRate(
  stepNumber: number,
  stepErrors: readonly ErrorFact[],
  totalAttempts: number,
): StepErrorRate {
  const typeCounts: ErrorTypeCount[] = [...countBy(stepErrors, (error) => error.errorType)]
    .map(([type, count]) => ({ type, count }))
    .sort((a, b) => b.count - a.count || compareText(a.type, b.type))
    .slice(0, AnalyticsLimits.STEP_COMMON_ITEMS);

  const wrongActions: WrongActionCount[] = countPairs(stepErrors)
    .sort(byCountThenPair)
    .slice(0, AnalyticsLimits.STEP_COMMON_ITEMS);

  return {
    step_number: stepNumber,
    error_rate: Math.min(1, stepErrors.length / totalAttempts),
    total_errors: stepErrors.length,
    common_error_types: typeCounts,
    common_wrong_actions: wrongActions,
  };
}

// ═══════════════════════════════════════════════════════════════
// GLOBAL STATISTICS
// ═══════════════════════════════════════════════════════════════

export function computeGlobalStats(
  attempts: readonly AttemptFact[],
  errors: readonly ErrorFact[],
  now: Date,
): GlobalErrorStats {
  const errorsSeen = visibleErrors(attempts, errors);
  const attemptsBySkill = groupBy(attempts, (attempt) => attempt.skillId);
  const errorsBySkill = groupBy(errorsSeen, (error) => error.skillId);

  const skillSummary: SkillSummaryEntry[] = [...attemptsBySkill]
    .map(([skillId, skillAttempts]) => {
      const skillErrors = errorsBySkill.get(skillId) ?? [];
      const failed = countFailed(skillAttempts);
      return {
        skill_id: skillId,
        total_attempts: skillAttempts.length,
        failed_attempts: failed,
        failure_rate: failed / skillAttempts.length,
        total_errors: skillErrors.length,
        most_problematic_step: mostProblematicStep(skillErrors),
      };
    })
    .sort((a, b) => b.failure_rate - a.failure_rate || compareText(a.skill_id, b.skill_id));

  const problematicSteps: ProblematicStep[] = [];
  for (const [skillId, skillErrors] of errorsBySkill) {
    for (const [stepNumber, stepErrors] of groupBy(skillErrors, (error) => error.stepNumber)) {
      problematicSteps.push({
        skill_id: skillId,
        step_number: stepNumber,
        error_count: stepErrors.length,
        most_common_error: modeErrorType(stepErrors),
      });
    }
  }
  problematicSteps.sort(
    (a, b) =>
      b.error_count - a.error_count ||
      compareText(a.skill_id, b.skill_id) ||
      a.step_number - b.step_number,
  );

  const confusion: ActionConfusion[] = countPairs(
    errorsSeen.filter(
      (error) =>
        error.expectedAction !== '' &&
        error.actualAction !== '' &&
        error.expectedAction !== error.actualAction,
    ),
  )
    .sort(byCountThenPair)
    .slice(0, AnalyticsLimits.ACTION_CONFUSION)
    .map((pair) => ({
      ...pair,
      description: `Users press ${pair.actual} instead of ${pair.expected}`,
    }));

  return {
    total_attempts: attempts.length,
    total_users: new Set(attempts.map((attempt) => attempt.userId)).size,
    skill_summary: skillSummary,
    problematic_steps: problematicSteps.slice(0, AnalyticsLimits.PROBLEMATIC_STEPS),
    action_confusion: confusion,
    generated_at: now.toISOString(),
  };
}

/** Step with the most errors; ties go to the lower step number */
function mostProblematicStep(skillErrors: readonly ErrorFact[]): number | null {
  let best: { step: number; count: number } | null = null;
  for (const [step, count] of countBy(skillErrors, (error) => error.stepNumber)) {
    if (!best || count > best.count || (count === best.count && step < best.step)) {
      best = { step, count };
    }
  }
  return best ? best.step : null;
}

function modeErrorType(stepErrors: readonly ErrorFact[]): ErrorType {
  const [first] = [...countBy(stepErrors, (error) => error.errorType)].sort(
    ([typeA, countA], [typeB, countB]) => countB - countA || compareText(typeA, typeB),
  );
  // groups are never empty
  return first[0];
}

// ═══════════════════════════════════════════════════════════════
// PER-USER VIEWS
// ═══════════════════════════════════════════════════════════════

/**
 * Group a user's errors by (skill, step, type, expected, actual).
 * Ordered by count desc, then by the arrival of each group's first error.
 */
export function groupCommonErrors(userErrors: readonly ErrorFact[]): CommonError[] {
  const groups = new Map<string, { firstSeen: number; entry: CommonError }>();

  for (const error of userErrors) {
    const key = JSON.stringify([
      error.skillId,
      error.stepNumber,
      error.errorType,
      error.expectedAction,
      error.actualAction,
    ]);
    const group = groups.get(key);
    if (group) {
      group.entry.count += 1;
      group.firstSeen = Math.min(group.firstSeen, error.id);
    } else {
      groups.set(key, {
        firstSeen: error.id,
        entry: {
          skill_id: error.skillId,
          step_number: error.stepNumber,
          error_type: error.errorType,
          expected_action: error.expectedAction,
          actual_action: error.actualAction,
          count: 1,
        },
      });
    }
  }

  return [...groups.values()]
    .sort((a, b) => b.entry.count - a.entry.count || a.firstSeen - b.firstSeen)
    .map(({ entry }) => entry);
}

export function rankWeakSteps(userErrors: readonly ErrorFact[]): WeakStep[] {
  const steps = new Map<string, WeakStep>();
  for (const error of userErrors) {
    const key = JSON.stringify([error.skillId, error.stepNumber]);
    const step = steps.get(key);
    if (step) step.error_count += 1;
    else steps.set(key, { skill_id: error.skillId, step_number: error.stepNumber, error_count: 1 });
  }
  return [...steps.values()].sort(
    (a, b) =>
      b.error_count - a.error_count ||
      compareText(a.skill_id, b.skill_id) ||
      a.step_number - b.step_number,
  );
}

// ═══════════════════════════════════════════════════════════════
// COMPARISON
// ═══════════════════════════════════════════════════════════════

export function classify(yourRate: number, globalRate: number): ComparisonResult {
  const diff = yourRate - globalRate;
  if (diff > COMPARISON_THRESHOLD + EPSILON) return ComparisonResult.ABOVE_AVERAGE;
  if (diff < -COMPARISON_THRESHOLD - EPSILON) return ComparisonResult.BELOW_AVERAGE;
  return ComparisonResult.AVERAGE;
}

/**
 * Compare the user's success rate on every skill they have completed at
 * least once against the skill's global success rate (1 − failure rate).
 */
export function compareWithGlobal(
  progress: readonly ProgressFact[],
  skillSummary: readonly SkillSummaryEntry[],
): SkillComparison[] {
  const failureRates = new Map(skillSummary.map((entry) => [entry.skill_id, entry.failure_rate]));

  return progress
    .filter((entry) => entry.attempts > 0)
    .map((entry) => {
      const yourRate = entry.successfulAttempts / entry.attempts;
      const globalRate = 1 - (failureRates.get(entry.skillId) ?? 0);
      return {
        skill_id: entry.skillId,
        your_success_rate: yourRate,
        global_success_rate: globalRate,
        comparison: classify(yourRate, globalRate),
      };
    })
    .sort((a, b) => compareText(a.skill_id, b.skill_id));
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function visibleErrors(
  attempts: readonly AttemptFact[],
  errors: readonly ErrorFact[],
): ErrorFact[] {
  const seen = new Set(attempts.map((attempt) => attempt.id));
  return errors.filter((error) => seen.has(error.attemptId));
}

function countFailed(attempts: readonly AttemptFact[]): number {
  return attempts.filter(
    (attempt) => attempt.status === AttemptStatus.COMPLETED && attempt.success === false,
  ).length;
}

function groupBy<T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

function countBy<T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, number> {
  const counts = new Map<K, number>();
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

function countPairs(items: readonly ErrorFact[]): WrongActionCount[] {
  const pairs = new Map<string, WrongActionCount>();
  for (const error of items) {
    const key = JSON.stringify([error.expectedAction, error.actualAction]);
    const pair = pairs.get(key);
    if (pair) pair.count += 1;
    else pairs.set(key, { expected: error.expectedAction, actual: error.actualAction, count: 1 });
  }
  return [...pairs.values()];
}

function byCountThenPair(a: WrongActionCount, b: WrongActionCount): number {
  return b.count - a.count || compareText(a.expected, b.expected) || compareText(a.actual, b.actual);
}
