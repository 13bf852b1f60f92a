import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  AttemptStepError,
  AttemptStepInput,
  AttemptStepTelemetry,
  SkillAttempt,
} from '../entities';
import { EventLogService } from './event-log.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      SkillAttempt,
      AttemptStepInput,
      AttemptStepError,
      AttemptStepTelemetry,
    ]),
  ],
  providers: [EventLogService],
  exports: [EventLogService],
})
export class EventLogModule {}
