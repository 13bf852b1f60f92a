import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Ack, TrainingPhase } from '@skillcoach/shared-types';
import { User } from '../entities';
import { EventLogService } from '../event-log/event-log.service';
import { UsersService } from '../users/users.service';

/**
 * ErasureService – Wipes one user's training history.
 *
 * All-or-nothing: telemetry, errors, inputs, attempts (open ones too) and
 * skill progress are deleted, and the user's phase is reset to Foundation,
 * in a single transaction. The user row itself stays, so erasing an
 * already-empty user succeeds.
 *
 * Order of deletion matters due to foreign key constraints:
 * 1. Step records (telemetry, errors, inputs)
 * 2. Attempts
 * 3. Skill progress
 * 4. User phase reset
 */
@Injectable()
export class ErasureService {
  private readonly logger = new Logger(ErasureService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly users: UsersService,
    private readonly eventLog: EventLogService,
  ) {}

  async clearProgress(userId: string): Promise<Ack> {
    await this.users.requireUser(userId);

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const deleted = await this.eventLog.deleteUserRecords(queryRunner.manager, userId);

      await queryRunner.manager.update(
        User,
        { id: userId },
        { currentPhase: TrainingPhase.FOUNDATION, updatedAt: new Date() },
      );

      await queryRunner.commitTransaction();

      const rows = Object.values(deleted).reduce((sum, count) => sum + count, 0);
      this.logger.warn(`PROGRESS ERASED: userId=${userId}, rowsDeleted=${rows}`);

      return { success: true, message: `Progress cleared for user ${userId}` };
    } catch (error) {
      await queryRunner.rollbackTransaction();
      this.logger.error(
        `Progress erasure FAILED for ${userId}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    } finally {
      await queryRunner.release();
    }
  }
}
