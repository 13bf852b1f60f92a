import { Module } from '@nestjs/common';
import { EventLogModule } from '../event-log/event-log.module';
import { UsersModule } from '../users/users.module';
import { ErasureController } from './erasure.controller';
import { ErasureService } from './erasure.service';

@Module({
  imports: [EventLogModule, UsersModule],
  controllers: [ErasureController],
  providers: [ErasureService],
})
export class ErasureModule {}
