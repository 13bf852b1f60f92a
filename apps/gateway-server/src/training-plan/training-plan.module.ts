import { Module } from '@nestjs/common';
import { AnalyticsModule } from '../analytics/analytics.module';
import { EventLogModule } from '../event-log/event-log.module';
import { RecommendationsModule } from '../recommendations/recommendations.module';
import { UsersModule } from '../users/users.module';
import { TrainingPlanController } from './training-plan.controller';
import { TrainingPlanService } from './training-plan.service';

@Module({
  imports: [UsersModule, EventLogModule, AnalyticsModule, RecommendationsModule],
  controllers: [TrainingPlanController],
  providers: [TrainingPlanService],
})
export class TrainingPlanModule {}
