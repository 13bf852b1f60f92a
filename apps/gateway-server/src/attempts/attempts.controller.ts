import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Version,
} from '@nestjs/common';
import { Ack, StartAttemptResponse } from '@skillcoach/shared-types';
import { AttemptsService } from './attempts.service';
import {
  CompleteAttemptDto,
  RecordErrorDto,
  RecordInputDto,
  StepTelemetryDto,
} from './attempts.dto';

/**
 * AttemptsController – Endpoints the VR client calls while a trainee
 * performs a skill: start, stream inputs/errors/telemetry, complete.
 */
@Controller()
export class AttemptsController {
  constructor(private readonly attemptsService: AttemptsService) {}

  @Post('users/:userId/skills/:skillId/attempts')
  @Version('1')
  async startAttempt(
    @Param('userId') userId: string,
    @Param('skillId') skillId: string,
  ): Promise<StartAttemptResponse> {
    return this.attemptsService.startAttempt(userId, skillId);
  }

  @Post('attempts/:attemptId/inputs')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async recordInput(
    @Param('attemptId') attemptId: string,
    @Body() dto: RecordInputDto,
  ): Promise<Ack> {
    return this.attemptsService.recordInput(attemptId, dto);
  }

  @Post('attempts/:attemptId/errors')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async recordError(
    @Param('attemptId') attemptId: string,
    @Body() dto: RecordErrorDto,
  ): Promise<Ack> {
    return this.attemptsService.recordError(attemptId, dto);
  }

  @Post('attempts/:attemptId/steps')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async recordStepTelemetry(
    @Param('attemptId') attemptId: string,
    @Body() dto: StepTelemetryDto,
  ): Promise<Ack> {
    return this.attemptsService.recordStepTelemetry(attemptId, dto);
  }

  @Post('attempts/:attemptId/complete')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async completeAttempt(
    @Param('attemptId') attemptId: string,
    @Body() dto: CompleteAttemptDto,
  ): Promise<Ack> {
    return this.attemptsService.completeAttempt(attemptId, dto);
  }
}
