import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsEnum,
  IsInt,
  IsString,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { SkillLevel } from '@skillcoach/shared-types';

export class CatalogStep {
  @IsInt()
  @Min(1)
  step_number!: number;

  @IsString()
  instruction!: string;

  @IsString()
  @MinLength(1)
  expected_action!: string;

  @IsString()
  key!: string;
}

export class CatalogSkill {
  @IsString()
  @MinLength(1)
  skill_id!: string;

  @IsString()
  title!: string;

  @IsEnum(SkillLevel)
  level!: SkillLevel;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CatalogStep)
  steps!: CatalogStep[];
}

/** Shape of data/skills.json and of any SKILL_CATALOG_PATH override */
export class CatalogFile {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CatalogSkill)
  skills!: CatalogSkill[];
}
