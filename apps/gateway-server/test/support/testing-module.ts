import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AnalyticsModule } from '../../src/analytics/analytics.module';
import { AttemptsModule } from '../../src/attempts/attempts.module';
import { RedisModule } from '../../src/common/redis.module';
import { RedisService } from '../../src/common/redis.service';
import { AllEntities } from '../../src/entities';
import { ErasureModule } from '../../src/erasure/erasure.module';
import { ProgressModule } from '../../src/progress/progress.module';
import { SkillsModule } from '../../src/skills/skills.module';
import { TrainingPlanModule } from '../../src/training-plan/training-plan.module';
import { UsersModule } from '../../src/users/users.module';
import { InMemoryLock } from './in-memory-lock';

/**
 * The feature modules of AppModule over an in-memory SQLite database,
 * with the Redis lock replaced by an in-process one.
 */
export async function createTestingModule(lock = new InMemoryLock()): Promise<TestingModule> {
  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
      TypeOrmModule.forRoot({
        type: 'better-sqlite3',
        database: ':memory:',
        entities: AllEntities,
        synchronize: true,
        dropSchema: true,
      }),
      RedisModule,
      SkillsModule,
      UsersModule,
      AttemptsModule,
      AnalyticsModule,
      ProgressModule,
      TrainingPlanModule,
      ErasureModule,
    ],
  })
    .overrideProvider(RedisService)
    .useValue(lock)
    .compile();

  moduleRef.useLogger(false);
  return moduleRef;
}
