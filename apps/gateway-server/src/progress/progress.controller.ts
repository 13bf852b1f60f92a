import { Controller, Get, Param, Query, Version } from '@nestjs/common';
import {
  CommonError,
  SkillRecommendation,
  UserSkillStats,
  WeakStep,
} from '@skillcoach/shared-types';
import { SkillFilterQueryDto } from './progress.dto';
import { ProgressService } from './progress.service';

@Controller('users')
export class ProgressController {
  constructor(private readonly progressService: ProgressService) {}

  @Get(':userId/skills/:skillId/stats')
  @Version('1')
  async getSkillStats(
    @Param('userId') userId: string,
    @Param('skillId') skillId: string,
  ): Promise<UserSkillStats> {
    return this.progressService.getSkillStats(userId, skillId);
  }

  @Get(':userId/common-errors')
  @Version('1')
  async getCommonErrors(
    @Param('userId') userId: string,
    @Query() query: SkillFilterQueryDto,
  ): Promise<{ errors: CommonError[] }> {
    return this.progressService.getCommonErrors(userId, query.skill_id);
  }

  @Get(':userId/weak-steps')
  @Version('1')
  async getWeakSteps(
    @Param('userId') userId: string,
    @Query() query: SkillFilterQueryDto,
  ): Promise<{ weak_steps: WeakStep[] }> {
    return this.progressService.getWeakSteps(userId, query.skill_id);
  }

  @Get(':userId/recommended-skills')
  @Version('1')
  async getRecommendedSkills(
    @Param('userId') userId: string,
  ): Promise<{ recommendations: SkillRecommendation[] }> {
    return this.progressService.getRecommendedSkills(userId);
  }
}
