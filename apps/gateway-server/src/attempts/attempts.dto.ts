import { Transform } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsISO8601,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { ErrorType } from '@skillcoach/shared-types';

/**
 * Validate the value as sent, skipping the pipe's implicit conversion
 * ("false" must not become true, nor `true` become step 1).
 */
function AsSent(): PropertyDecorator {
  return Transform(({ obj, key }) => obj[key]);
}

export class RecordInputDto {
  @AsSent()
  @IsInt()
  @Min(1)
  step_number!: number;

  @IsString()
  @MaxLength(64)
  expected_input!: string;

  @IsString()
  @MaxLength(64)
  actual_input!: string;

  /** Client clock; server time when omitted */
  @IsOptional()
  @IsISO8601()
  timestamp?: string;
}

export class RecordErrorDto {
  @AsSent()
  @IsInt()
  @Min(1)
  step_number!: number;

  @IsEnum(ErrorType)
  error_type!: ErrorType;

  @IsString()
  @MaxLength(64)
  expected_action!: string;

  @IsString()
  @MaxLength(64)
  actual_action!: string;
}

/**
 * Simulator telemetry for one step. The VR client sends camelCase keys;
 * older builds send snake_case. Both spellings are accepted.
 */
export class StepTelemetryDto {
  @AsSent()
  @IsOptional()
  @IsInt()
  @Min(1)
  stepNumber?: number;

  @AsSent()
  @IsOptional()
  @IsInt()
  @Min(1)
  step_number?: number;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  expectedAction?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  expected_action?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  actualAction?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  actual_action?: string;

  @AsSent()
  @IsOptional()
  @IsBoolean()
  success?: boolean;

  @AsSent()
  @IsOptional()
  @IsNumber()
  @Min(0)
  holdDuration?: number;

  @AsSent()
  @IsOptional()
  @IsNumber()
  @Min(0)
  hold_duration?: number;

  @AsSent()
  @IsOptional()
  @IsNumber()
  @Min(0)
  peakForce?: number;

  @AsSent()
  @IsOptional()
  @IsNumber()
  @Min(0)
  peak_force?: number;

  @AsSent()
  @IsOptional()
  @IsNumber()
  @Min(0)
  distance?: number;

  @AsSent()
  @IsOptional()
  @IsBoolean()
  assistUsed?: boolean;

  @AsSent()
  @IsOptional()
  @IsBoolean()
  assist_used?: boolean;

  @IsOptional()
  @IsISO8601()
  timestamp?: string;
}

export class CompleteAttemptDto {
  @AsSent()
  @IsBoolean()
  success!: boolean;
}
