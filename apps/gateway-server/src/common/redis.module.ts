import { Module, Global } from '@nestjs/common';
import { RedisService } from './redis.service';

/**
 * RedisModule – Global module providing the RedisService singleton.
 *
 * Marked @Global so the attempt tracker can take per-attempt locks
 * without importing RedisModule itself.
 */
@Global()
@Module({
  providers: [RedisService],
  exports: [RedisService],
})
export class RedisModule {}
