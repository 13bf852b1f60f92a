import { NotFoundException } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import { ComparisonResult, ErrorType, TrainingPhase } from '@skillcoach/shared-types';
import { AnalyticsController } from '../src/analytics/analytics.controller';
import { AttemptsController } from '../src/attempts/attempts.controller';
import { ErasureController } from '../src/erasure/erasure.controller';
import { ProgressController } from '../src/progress/progress.controller';
import { SkillsController } from '../src/skills/skills.controller';
import { TrainingPlanController } from '../src/training-plan/training-plan.controller';
import { UsersController } from '../src/users/users.controller';
import { createTestingModule } from './support/testing-module';

describe('analytics and insights', () => {
  let moduleRef: TestingModule;
  let users: UsersController;
  let attempts: AttemptsController;
  let analytics: AnalyticsController;
  let progress: ProgressController;
  let plans: TrainingPlanController;
  let erasure: ErasureController;

  beforeEach(async () => {
    moduleRef = await createTestingModule();
    users = moduleRef.get(UsersController);
    attempts = moduleRef.get(AttemptsController);
    analytics = moduleRef.get(AnalyticsController);
    progress = moduleRef.get(ProgressController);
    plans = moduleRef.get(TrainingPlanController);
    erasure = moduleRef.get(ErasureController);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  async function recordError(
    attemptId: string,
    stepNumber: number,
    errorType: ErrorType,
    expectedAction: string,
    actualAction: string,
  ): Promise<void> {
    await attempts.recordError(attemptId, {
      step_number: stepNumber,
      error_type: errorType,
      expected_action: expectedAction,
      actual_action: actualAction,
    });
  }

  /**
   * u1: one failed a01 attempt with three errors, one clean successful a01 attempt.
   * u2: one failed a01 attempt with a timeout, one open a02 attempt with an error.
   */
  async function seed(): Promise<void> {
    await users.register('u1');
    await users.register('u2');

    const failed = (await attempts.startAttempt('u1', 'a01_10m_forward')).attempt_id;
    await recordError(failed, 1, ErrorType.WRONG_DIRECTION, 'move_forward', 'move_backward');
    await recordError(failed, 1, ErrorType.WRONG_DIRECTION, 'move_forward', 'move_backward');
    await recordError(failed, 3, ErrorType.MOVED_INSTEAD_OF_STOPPING, 'brake', 'move_forward');
    await attempts.completeAttempt(failed, { success: false });

    const clean = (await attempts.startAttempt('u1', 'a01_10m_forward')).attempt_id;
    await attempts.completeAttempt(clean, { success: true });

    const timedOut = (await attempts.startAttempt('u2', 'a01_10m_forward')).attempt_id;
    await recordError(timedOut, 1, ErrorType.TIMEOUT, 'move_forward', '');
    await attempts.completeAttempt(timedOut, { success: false });

    const open = (await attempts.startAttempt('u2', 'a02_2m_backward')).attempt_id;
    await recordError(open, 2, ErrorType.WRONG_INPUT, 'move_backward', 'move_forward');
  }

  it('serves the skill catalog', () => {
    const skills = moduleRef.get(SkillsController);
    expect(skills.listSkills()).toHaveLength(13);
    expect(skills.getSkillSteps('a02_2m_backward').steps).toHaveLength(3);
  });

  describe('global error statistics', () => {
    it('is empty before any attempt', async () => {
      await expect(analytics.getGlobalErrors()).resolves.toMatchObject({
        total_attempts: 0,
        total_users: 0,
        skill_summary: [],
        problematic_steps: [],
        action_confusion: [],
      });
    });

    it('summarises skills, steps and confused actions', async () => {
      await seed();
      const stats = await analytics.getGlobalErrors();

      expect(stats.total_attempts).toBe(4);
      expect(stats.total_users).toBe(2);
      expect(stats.skill_summary).toEqual([
        {
          skill_id: 'a01_10m_forward',
          total_attempts: 3,
          failed_attempts: 2,
          failure_rate: 2 / 3,
          total_errors: 4,
          most_problematic_step: 1,
        },
        {
          skill_id: 'a02_2m_backward',
          total_attempts: 1,
          failed_attempts: 0,
          failure_rate: 0,
          total_errors: 1,
          most_problematic_step: 2,
        },
      ]);
      expect(stats.problematic_steps).toEqual([
        {
          skill_id: 'a01_10m_forward',
          step_number: 1,
          error_count: 3,
          most_common_error: ErrorType.WRONG_DIRECTION,
        },
        {
          skill_id: 'a01_10m_forward',
          step_number: 3,
          error_count: 1,
          most_common_error: ErrorType.MOVED_INSTEAD_OF_STOPPING,
        },
        {
          skill_id: 'a02_2m_backward',
          step_number: 2,
          error_count: 1,
          most_common_error: ErrorType.WRONG_INPUT,
        },
      ]);
      expect(stats.action_confusion).toEqual([
        {
          expected: 'move_forward',
          actual: 'move_backward',
          count: 2,
          description: 'Users press move_backward instead of move_forward',
        },
        {
          expected: 'brake',
          actual: 'move_forward',
          count: 1,
          description: 'Users press move_forward instead of brake',
        },
        {
          expected: 'move_backward',
          actual: 'move_forward',
          count: 1,
          description: 'Users press move_forward instead of move_backward',
        },
      ]);
    });
  });

  describe('skill error statistics', () => {
    it('ranks steps by error rate', async () => {
      await seed();
      const stats = await analytics.getSkillErrors('a01_10m_forward');

      expect(stats).toMatchObject({
        skill_id: 'a01_10m_forward',
        total_attempts: 3,
        failed_attempts: 2,
        failure_rate: 2 / 3,
      });
      expect(stats.step_error_rates).toEqual([
        {
          step_number: 1,
          error_rate: 1,
          total_errors: 3,
          common_error_types: [
            { type: ErrorType.WRONG_DIRECTION, count: 2 },
            { type: ErrorType.TIMEOUT, count: 1 },
          ],
          common_wrong_actions: [
            { expected: 'move_forward', actual: 'move_backward', count: 2 },
            { expected: 'move_forward', actual: '', count: 1 },
          ],
        },
        {
          step_number: 3,
          error_rate: 1 / 3,
          total_errors: 1,
          common_error_types: [{ type: ErrorType.MOVED_INSTEAD_OF_STOPPING, count: 1 }],
          common_wrong_actions: [{ expected: 'brake', actual: 'move_forward', count: 1 }],
        },
      ]);
      expect(stats.most_difficult_step).toEqual(stats.step_error_rates[0]);
    });

    it('breaks down one step', async () => {
      await seed();

      await expect(analytics.getStepErrors('a01_10m_forward', 3)).resolves.toEqual({
        step_number: 3,
        error_rate: 1 / 3,
        total_errors: 1,
        common_error_types: [{ type: ErrorType.MOVED_INSTEAD_OF_STOPPING, count: 1 }],
        common_wrong_actions: [{ expected: 'brake', actual: 'move_forward', count: 1 }],
      });
      await expect(analytics.getStepErrors('a01_10m_forward', 2)).resolves.toMatchObject({
        step_number: 2,
        error_rate: 0,
        total_errors: 0,
      });
      await expect(analytics.getStepErrors('a03_5m_backward', 1)).rejects.toThrow(
        NotFoundException,
      );
    });

    it('is not found for a skill nobody has attempted', async () => {
      await seed();
      await expect(analytics.getSkillErrors('a03_5m_backward')).rejects.toThrow(
        new NotFoundException('No attempts recorded for skill a03_5m_backward'),
      );
    });
  });

  describe('per-user views', () => {
    beforeEach(seed);

    it('counts errors per step of completed attempts', async () => {
      await expect(progress.getSkillStats('u1', 'a01_10m_forward')).resolves.toMatchObject({
        skill_id: 'a01_10m_forward',
        attempts: 2,
        successful_attempts: 1,
        success_rate: 0.5,
        total_errors: 3,
        error_by_step: { '1': 2, '3': 1 },
      });
    });

    it('has no skill stats for a skill without completed attempts', async () => {
      await expect(progress.getSkillStats('u2', 'a02_2m_backward')).rejects.toThrow(
        NotFoundException,
      );
      await expect(progress.getSkillStats('u1', 'z99_unknown')).rejects.toThrow(
        new NotFoundException('Skill z99_unknown not found'),
      );
    });

    it('groups identical mistakes', async () => {
      const { errors } = await progress.getCommonErrors('u1', {});
      expect(errors).toEqual([
        {
          skill_id: 'a01_10m_forward',
          step_number: 1,
          error_type: ErrorType.WRONG_DIRECTION,
          expected_action: 'move_forward',
          actual_action: 'move_backward',
          count: 2,
        },
        {
          skill_id: 'a01_10m_forward',
          step_number: 3,
          error_type: ErrorType.MOVED_INSTEAD_OF_STOPPING,
          expected_action: 'brake',
          actual_action: 'move_forward',
          count: 1,
        },
      ]);
    });

    it('includes errors of open attempts and filters by skill', async () => {
      const all = await progress.getCommonErrors('u2', {});
      expect(all.errors.map((error) => error.error_type)).toEqual([
        ErrorType.TIMEOUT,
        ErrorType.WRONG_INPUT,
      ]);

      const filtered = await progress.getCommonErrors('u2', { skill_id: 'a02_2m_backward' });
      expect(filtered.errors).toHaveLength(1);
      expect(filtered.errors[0].step_number).toBe(2);
    });

    it('ranks weak steps', async () => {
      await expect(progress.getWeakSteps('u2', {})).resolves.toEqual({
        weak_steps: [
          { skill_id: 'a01_10m_forward', step_number: 1, error_count: 1 },
          { skill_id: 'a02_2m_backward', step_number: 2, error_count: 1 },
        ],
      });
    });

    it('recommends skills for the current phase', async () => {
      const { recommendations } = await progress.getRecommendedSkills('u1');
      expect(recommendations.map((r) => [r.skill_id, r.priority, r.reason])).toEqual([
        ['a02_2m_backward', 3, 'Not attempted yet'],
        ['a03_5m_backward', 3, 'Not attempted yet'],
        ['a01_10m_forward', 1, 'Can be improved: 50%'],
      ]);
    });
  });

  describe('training plan', () => {
    it('builds a plan for a user without attempts', async () => {
      await users.register('u3');
      const plan = await plans.generatePlan('u3');

      expect(plan).toMatchObject({
        user_id: 'u3',
        current_phase: TrainingPhase.FOUNDATION,
        focus_skills: [],
        session_goals: ['Priority skill: Roll forward 10 metres - Not attempted yet'],
        notes: ['Focus on the basic movements: forward, backward, turning'],
        global_insights: { most_failed_skills: [], common_mistakes: [], problematic_steps: [] },
        your_common_errors: [],
        skill_comparisons: [],
      });
      expect(plan.recommended_skills.map((r) => r.skill_id)).toEqual([
        'a01_10m_forward',
        'a02_2m_backward',
        'a03_5m_backward',
      ]);
    });

    it('combines personal errors with global insights', async () => {
      await seed();
      const plan = await plans.generatePlan('u1');

      expect(plan.recommended_skills.map((r) => r.skill_id)).toEqual([
        'a02_2m_backward',
        'a03_5m_backward',
        'a01_10m_forward',
      ]);
      expect(plan.focus_skills).toEqual([
        {
          skill_id: 'a01_10m_forward',
          total_errors: 3,
          error_types: [ErrorType.WRONG_DIRECTION, ErrorType.MOVED_INSTEAD_OF_STOPPING],
        },
      ]);
      expect(plan.session_goals).toEqual([
        'Priority skill: Roll backward 2 metres - Not attempted yet',
      ]);
      expect(plan.notes).toEqual([
        "Watch out: frequent errors in 'a01_10m_forward'",
        'Focus on the basic movements: forward, backward, turning',
      ]);
      expect(plan.global_insights.most_failed_skills).toEqual([
        'a01_10m_forward',
        'a02_2m_backward',
      ]);
      expect(plan.global_insights.common_mistakes).toHaveLength(3);
      expect(plan.global_insights.problematic_steps).toHaveLength(3);
      expect(plan.your_common_errors).toHaveLength(2);
      expect(plan.skill_comparisons).toEqual([
        {
          skill_id: 'a01_10m_forward',
          your_success_rate: 0.5,
          global_success_rate: 1 - 2 / 3,
          comparison: ComparisonResult.ABOVE_AVERAGE,
        },
      ]);
    });

    it('keeps the ten most frequent personal errors', async () => {
      await users.register('u4');
      const attemptId = (await attempts.startAttempt('u4', 'a02_2m_backward')).attempt_id;
      for (let step = 1; step <= 12; step++) {
        await recordError(attemptId, step, ErrorType.WRONG_INPUT, 'move_backward', 'move_forward');
      }
      await recordError(attemptId, 12, ErrorType.WRONG_INPUT, 'move_backward', 'move_forward');

      const plan = await plans.generatePlan('u4');

      expect(plan.your_common_errors).toHaveLength(10);
      expect(plan.your_common_errors.map((entry) => [entry.step_number, entry.count])).toEqual([
        [12, 2],
        [1, 1],
        [2, 1],
        [3, 1],
        [4, 1],
        [5, 1],
        [6, 1],
        [7, 1],
        [8, 1],
        [9, 1],
      ]);
    });

    it('is not found for an unknown user', async () => {
      await expect(plans.generatePlan('ghost')).rejects.toThrow(NotFoundException);
    });
  });

  describe('clearing progress', () => {
    it('removes the user history from every view', async () => {
      await seed();

      await expect(erasure.clearProgress('u1')).resolves.toEqual({
        success: true,
        message: 'Progress cleared for user u1',
      });

      const view = await users.getProgress('u1');
      expect(view).toMatchObject({
        current_phase: TrainingPhase.FOUNDATION,
        skill_progress: {},
        attempts: [],
        active_sessions: [],
      });
      await expect(progress.getCommonErrors('u1', {})).resolves.toEqual({ errors: [] });

      const stats = await analytics.getGlobalErrors();
      expect(stats.total_attempts).toBe(2);
      expect(stats.total_users).toBe(1);
      expect(stats.skill_summary.map((entry) => [entry.skill_id, entry.total_errors])).toEqual([
        ['a01_10m_forward', 1],
        ['a02_2m_backward', 1],
      ]);
    });

    it('succeeds again on an already empty user', async () => {
      await users.register('u1');
      await erasure.clearProgress('u1');
      await expect(erasure.clearProgress('u1')).resolves.toMatchObject({ success: true });
    });

    it('is not found for an unknown user', async () => {
      await expect(erasure.clearProgress('ghost')).rejects.toThrow(
        new NotFoundException('User ghost not found'),
      );
    });
  });
});
