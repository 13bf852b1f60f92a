import { Module } from '@nestjs/common';
import { SkillCatalogService } from './skill-catalog.service';
import { SkillsController } from './skills.controller';

@Module({
  controllers: [SkillsController],
  providers: [SkillCatalogService],
  exports: [SkillCatalogService],
})
export class SkillsModule {}
