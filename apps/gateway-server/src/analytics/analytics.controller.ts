import { Controller, Get, Param, ParseIntPipe, Version } from '@nestjs/common';
import { GlobalErrorStats, SkillErrorStats, StepErrorRate } from '@skillcoach/shared-types';
import { AnalyticsService } from './analytics.service';

@Controller('analytics')
export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  @Get('global-errors')
  @Version('1')
  async getGlobalErrors(): Promise<GlobalErrorStats> {
    return this.analyticsService.getGlobalErrorStats();
  }

  @Get('skills/:skillId/errors')
  @Version('1')
  async getSkillErrors(@Param('skillId') skillId: string): Promise<SkillErrorStats> {
    return this.analyticsService.getSkillErrorStats(skillId);
  }

  @Get('skills/:skillId/steps/:stepNumber/errors')
  @Version('1')
  async getStepErrors(
    @Param('skillId') skillId: string,
    @Param('stepNumber', ParseIntPipe) stepNumber: number,
  ): Promise<StepErrorRate> {
    return this.analyticsService.getStepErrorStats(skillId, stepNumber);
  }
}
