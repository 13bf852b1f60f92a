/**
 * SkillCoach – Shared Type Definitions
 *
 * Single source of truth for enums, constants, and wire payloads used by
 * the Gateway Server and the VR client bridge.
 *
 * Wire payloads use snake_case field names; the VR client deserializes
 * them as-is.
 */

// ═══════════════════════════════════════════════════════════════
// ENUMS
// ═══════════════════════════════════════════════════════════════

export enum AttemptStatus {
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED',
}

/** Ways an observed action can diverge from the expected one */
export enum ErrorType {
  WRONG_INPUT = 'wrong_input',
  WRONG_DIRECTION = 'wrong_direction',
  WRONG_TURN_DIRECTION = 'wrong_turn_direction',
  STOPPED_INSTEAD_OF_MOVING = 'stopped_instead_of_moving',
  MOVED_INSTEAD_OF_STOPPING = 'moved_instead_of_stopping',
  MISSED_POP_CASTERS = 'missed_pop_casters',
  TIMEOUT = 'timeout',
  WRONG_SEQUENCE = 'wrong_sequence',
  TIMING_ERROR = 'timing_error',
  MISSING_INPUT = 'missing_input',
  EXTRA_INPUT = 'extra_input',
  INCOMPLETE_ACTION = 'incomplete_action',
  BALANCE_LOST = 'balance_lost',
  COLLISION = 'collision',
  SAFETY_VIOLATION = 'safety_violation',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/** Training stage; selects which skill levels get recommended */
export enum TrainingPhase {
  FOUNDATION = 'Foundation',
  MOBILITY = 'Mobility',
  ADVANCED = 'Advanced',
}

export enum SkillLevel {
  BEGINNER = 'beginner',
  INTERMEDIATE = 'intermediate',
  ADVANCED = 'advanced',
}

export enum ComparisonResult {
  ABOVE_AVERAGE = 'above_average',
  AVERAGE = 'average',
  BELOW_AVERAGE = 'below_average',
}

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const ErrorTypeSeverity: Record<ErrorType, ErrorSeverity> = {
  [ErrorType.WRONG_INPUT]: ErrorSeverity.MEDIUM,
  [ErrorType.WRONG_DIRECTION]: ErrorSeverity.MEDIUM,
  [ErrorType.WRONG_TURN_DIRECTION]: ErrorSeverity.MEDIUM,
  [ErrorType.STOPPED_INSTEAD_OF_MOVING]: ErrorSeverity.MEDIUM,
  [ErrorType.MOVED_INSTEAD_OF_STOPPING]: ErrorSeverity.MEDIUM,
  [ErrorType.MISSED_POP_CASTERS]: ErrorSeverity.HIGH,
  [ErrorType.TIMEOUT]: ErrorSeverity.HIGH,
  [ErrorType.WRONG_SEQUENCE]: ErrorSeverity.MEDIUM,
  [ErrorType.TIMING_ERROR]: ErrorSeverity.LOW,
  [ErrorType.MISSING_INPUT]: ErrorSeverity.HIGH,
  [ErrorType.EXTRA_INPUT]: ErrorSeverity.LOW,
  [ErrorType.INCOMPLETE_ACTION]: ErrorSeverity.MEDIUM,
  [ErrorType.BALANCE_LOST]: ErrorSeverity.HIGH,
  [ErrorType.COLLISION]: ErrorSeverity.HIGH,
  [ErrorType.SAFETY_VIOLATION]: ErrorSeverity.CRITICAL,
};

export const ERROR_TYPES: readonly ErrorType[] = Object.values(ErrorType);

export function isErrorType(value: string): value is ErrorType {
  return (ERROR_TYPES as readonly string[]).includes(value);
}

/** Hard caps on ranked analytics lists */
export const AnalyticsLimits = {
  PROBLEMATIC_STEPS: 20,
  ACTION_CONFUSION: 20,
  STEP_COMMON_ITEMS: 3,
  PLAN_MOST_FAILED_SKILLS: 3,
  PLAN_COMMON_MISTAKES: 5,
  PLAN_PROBLEMATIC_STEPS: 5,
  PLAN_COMMON_ERRORS: 10,
  PLAN_RECOMMENDED_SKILLS: 5,
  PLAN_FOCUS_SKILLS: 3,
} as const;

/** |your − global| must exceed this to leave the "average" band */
export const COMPARISON_THRESHOLD = 0.05;

export const PhaseSkillLevels: Record<TrainingPhase, SkillLevel[]> = {
  [TrainingPhase.FOUNDATION]: [SkillLevel.BEGINNER],
  [TrainingPhase.MOBILITY]: [SkillLevel.INTERMEDIATE],
  [TrainingPhase.ADVANCED]: [SkillLevel.ADVANCED],
};

export const PhaseProgression = {
  /** Success rate at which a skill counts as learned */
  SKILL_SUCCESS_THRESHOLD: 0.7,
  /** Share of the phase's skills that must be learned to advance */
  REQUIRED_SKILL_SHARE: 0.6,
} as const;

export const RedisKeys = {
  ATTEMPT_LOCK: 'attempt_lock',
} as const;

// ═══════════════════════════════════════════════════════════════
// INTERFACES – Skill catalog
// ═══════════════════════════════════════════════════════════════

export interface SkillStepDefinition {
  step_number: number;
  instruction: string;
  expected_action: string;
  /** VR controller key bound to the expected action */
  key: string;
}

export interface SkillDefinition {
  skill_id: string;
  title: string;
  level: SkillLevel;
  steps: SkillStepDefinition[];
}

export interface SkillSummary {
  skill_id: string;
  title: string;
  level: SkillLevel;
  total_steps: number;
}

// ═══════════════════════════════════════════════════════════════
// INTERFACES – Attempts & progress
// ═══════════════════════════════════════════════════════════════

export interface Ack {
  success: true;
  message: string;
}

export interface StartAttemptResponse {
  success: true;
  attempt_id: string;
  skill_id: string;
  skill_steps: SkillDefinition;
}

export interface SkillProgressView {
  skill_id: string;
  attempts: number;
  successful_attempts: number;
  success_rate: number;
  last_attempt: string | null;
}

export interface UserProgressView {
  user_id: string;
  current_phase: TrainingPhase;
  skill_progress: Record<string, SkillProgressView>;
  /** Completed attempt ids */
  attempts: string[];
  /** In-progress attempt ids */
  active_sessions: string[];
  created_at: string;
  updated_at: string;
}

export interface UserSkillStats {
  skill_id: string;
  attempts: number;
  successful_attempts: number;
  success_rate: number;
  total_errors: number;
  last_attempt: string | null;
  error_by_step: Record<string, number>;
}

export interface CommonError {
  skill_id: string;
  step_number: number;
  error_type: ErrorType;
  expected_action: string;
  actual_action: string;
  count: number;
}

export interface WeakStep {
  skill_id: string;
  step_number: number;
  error_count: number;
}

// ═══════════════════════════════════════════════════════════════
// INTERFACES – Analytics
// ═══════════════════════════════════════════════════════════════

export interface ErrorTypeCount {
  type: ErrorType;
  count: number;
}

export interface WrongActionCount {
  expected: string;
  actual: string;
  count: number;
}

export interface StepErrorRate {
  step_number: number;
  /** Errors at this step per attempt of the skill, capped at 1 */
  error_rate: number;
  total_errors: number;
  common_error_types: ErrorTypeCount[];
  common_wrong_actions: WrongActionCount[];
}

export interface SkillErrorStats {
  skill_id: string;
  total_attempts: number;
  failed_attempts: number;
  failure_rate: number;
  step_error_rates: StepErrorRate[];
  most_difficult_step: StepErrorRate | null;
  generated_at: string;
}

export interface SkillSummaryEntry {
  skill_id: string;
  total_attempts: number;
  failed_attempts: number;
  failure_rate: number;
  total_errors: number;
  most_problematic_step: number | null;
}

export interface ProblematicStep {
  skill_id: string;
  step_number: number;
  error_count: number;
  most_common_error: ErrorType;
}

export interface ActionConfusion {
  expected: string;
  actual: string;
  count: number;
  description: string;
}

export interface GlobalErrorStats {
  total_attempts: number;
  total_users: number;
  skill_summary: SkillSummaryEntry[];
  problematic_steps: ProblematicStep[];
  action_confusion: ActionConfusion[];
  generated_at: string;
}

export interface SkillComparison {
  skill_id: string;
  your_success_rate: number;
  global_success_rate: number;
  comparison: ComparisonResult;
}

// ═══════════════════════════════════════════════════════════════
// INTERFACES – Training plan
// ═══════════════════════════════════════════════════════════════

export interface SkillRecommendation {
  skill_id: string;
  title: string;
  level: SkillLevel;
  attempts: number;
  success_rate: number;
  /** 3 = never attempted, 2 = below 50 %, 1 = below 80 % */
  priority: number;
  reason: string;
}

export interface FocusSkill {
  skill_id: string;
  total_errors: number;
  error_types: ErrorType[];
}

export interface GlobalInsights {
  most_failed_skills: string[];
  common_mistakes: ActionConfusion[];
  problematic_steps: ProblematicStep[];
}

export interface TrainingPlan {
  user_id: string;
  current_phase: TrainingPhase;
  generated_at: string;
  recommended_skills: SkillRecommendation[];
  focus_skills: FocusSkill[];
  session_goals: string[];
  notes: string[];
  global_insights: GlobalInsights;
  your_common_errors: CommonError[];
  skill_comparisons: SkillComparison[];
}
