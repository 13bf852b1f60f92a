import { Module } from '@nestjs/common';
import { EventLogModule } from '../event-log/event-log.module';
import { RecommendationsModule } from '../recommendations/recommendations.module';
import { SkillsModule } from '../skills/skills.module';
import { UsersModule } from '../users/users.module';
import { ProgressController } from './progress.controller';
import { ProgressService } from './progress.service';

@Module({
  imports: [EventLogModule, UsersModule, SkillsModule, RecommendationsModule],
  controllers: [ProgressController],
  providers: [ProgressService],
  exports: [ProgressService],
})
export class ProgressModule {}
