import { Controller, HttpCode, HttpStatus, Param, Post, Version } from '@nestjs/common';
import { TrainingPlan } from '@skillcoach/shared-types';
import { TrainingPlanService } from './training-plan.service';

@Controller('users')
export class TrainingPlanController {
  constructor(private readonly trainingPlanService: TrainingPlanService) {}

  /** Plans are derived on demand and never stored */
  @Post(':userId/training-plan')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async generatePlan(@Param('userId') userId: string): Promise<TrainingPlan> {
    return this.trainingPlanService.generatePlan(userId);
  }
}
