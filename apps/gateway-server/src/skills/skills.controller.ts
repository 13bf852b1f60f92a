import { Controller, Get, Param, Version } from '@nestjs/common';
import { SkillDefinition, SkillSummary } from '@skillcoach/shared-types';
import { SkillCatalogService } from './skill-catalog.service';

@Controller('skills')
export class SkillsController {
  constructor(private readonly catalog: SkillCatalogService) {}

  @Get()
  @Version('1')
  listSkills(): SkillSummary[] {
    return this.catalog.listSkills();
  }

  @Get(':skillId/steps')
  @Version('1')
  getSkillSteps(@Param('skillId') skillId: string): SkillDefinition {
    return this.catalog.getSkill(skillId);
  }
}
