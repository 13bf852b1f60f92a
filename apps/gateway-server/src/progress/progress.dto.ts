import { IsOptional, IsString, MaxLength } from 'class-validator';

export class SkillFilterQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(64)
  skill_id?: string;
}
