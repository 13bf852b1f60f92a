import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum NodeEnvironment {
  DEVELOPMENT = 'development',
  PRODUCTION = 'production',
  TEST = 'test',
}

/**
 * Typed view of the process environment. Every variable is optional;
 * consumers supply defaults through ConfigService.get(key, default).
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsEnum(NodeEnvironment)
  NODE_ENV?: NodeEnvironment;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  GATEWAY_PORT?: number;

  @IsOptional()
  @IsString()
  MSSQL_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  MSSQL_PORT?: number;

  @IsOptional()
  @IsString()
  MSSQL_USER?: string;

  @IsOptional()
  @IsString()
  MSSQL_PASSWORD?: string;

  @IsOptional()
  @IsString()
  MSSQL_DATABASE?: string;

  @IsOptional()
  @IsString()
  REDIS_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  REDIS_PORT?: number;

  @IsOptional()
  @IsString()
  REDIS_PASSWORD?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  ATTEMPT_LOCK_TTL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  ATTEMPT_LOCK_RETRIES?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  ATTEMPT_LOCK_RETRY_DELAY_MS?: number;

  @IsOptional()
  @IsString()
  SKILL_CATALOG_PATH?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  SLOW_REQUEST_MS?: number;
}

/**
 * ConfigModule `validate` hook. Returns the converted variables so numeric
 * settings reach ConfigService as numbers; throws one error listing every
 * violated constraint.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated);

  if (errors.length > 0) {
    const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`Invalid environment: ${details.join('; ')}`);
  }
  return validated;
}
