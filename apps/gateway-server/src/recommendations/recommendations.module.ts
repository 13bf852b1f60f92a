import { Module } from '@nestjs/common';
import { SkillsModule } from '../skills/skills.module';
import { RecommenderService } from './recommender.service';

@Module({
  imports: [SkillsModule],
  providers: [RecommenderService],
  exports: [RecommenderService],
})
export class RecommendationsModule {}
