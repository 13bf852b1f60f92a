import { Module } from '@nestjs/common';
import { EventLogModule } from '../event-log/event-log.module';
import { RecommendationsModule } from '../recommendations/recommendations.module';
import { SkillsModule } from '../skills/skills.module';
import { UsersModule } from '../users/users.module';
import { AttemptsController } from './attempts.controller';
import { AttemptsService } from './attempts.service';

@Module({
  imports: [EventLogModule, SkillsModule, UsersModule, RecommendationsModule],
  controllers: [AttemptsController],
  providers: [AttemptsService],
})
export class AttemptsModule {}
