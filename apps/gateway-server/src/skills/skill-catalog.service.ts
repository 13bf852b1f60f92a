import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { readFileSync } from 'fs';
import { SkillDefinition, SkillSummary } from '@skillcoach/shared-types';
import bundledCatalog from '../../data/skills.json';
import { CatalogFile } from './skill-catalog.schema';

/**
 * SkillCatalogService – Read-only registry of trainable skills.
 *
 * Loaded once at startup from the bundled data/skills.json, or from the
 * file named by SKILL_CATALOG_PATH. An invalid catalog aborts bootstrap.
 * Catalog order is significant: recommendations with equal priority
 * keep it.
 */
@Injectable()
export class SkillCatalogService {
  private readonly logger = new Logger(SkillCatalogService.name);
  private readonly skills: SkillDefinition[];
  private readonly byId = new Map<string, SkillDefinition>();

  constructor(config: ConfigService) {
    const overridePath = config.get<string>('SKILL_CATALOG_PATH');
    const raw: unknown = overridePath
      ? JSON.parse(readFileSync(overridePath, 'utf8'))
      : bundledCatalog;

    this.skills = parseCatalog(raw);
    for (const skill of this.skills) {
      if (this.byId.has(skill.skill_id)) {
        throw new Error(`Invalid skill catalog: duplicate skill_id ${skill.skill_id}`);
      }
      this.byId.set(skill.skill_id, skill);
    }

    this.logger.log(
      `Loaded ${this.skills.length} skills from ${overridePath ?? 'bundled catalog'}`,
    );
  }

  listSkills(): SkillSummary[] {
    return this.skills.map((skill) => ({
      skill_id: skill.skill_id,
      title: skill.title,
      level: skill.level,
      total_steps: skill.steps.length,
    }));
  }

  /** All skills in catalog order */
  all(): readonly SkillDefinition[] {
    return this.skills;
  }

  find(skillId: string): SkillDefinition | undefined {
    return this.byId.get(skillId);
  }

  getSkill(skillId: string): SkillDefinition {
    const skill = this.byId.get(skillId);
    if (!skill) throw new NotFoundException(`Skill ${skillId} not found`);
    return skill;
  }
}

function parseCatalog(raw: unknown): SkillDefinition[] {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('Invalid skill catalog: expected a JSON object');
  }

  const catalog = plainToInstance(CatalogFile, raw);
  const errors = validateSync(catalog, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new Error(`Invalid skill catalog: ${flattenErrors(errors).join('; ')}`);
  }

  return catalog.skills.map((skill) => ({
    skill_id: skill.skill_id,
    title: skill.title,
    level: skill.level,
    steps: skill.steps.map((step) => ({
      step_number: step.step_number,
      instruction: step.instruction,
      expected_action: step.expected_action,
      key: step.key,
    })),
  }));
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}
