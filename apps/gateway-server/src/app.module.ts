import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AllEntities } from './entities';

// ── Core Infrastructure ──────────────────────────────────────
import { RedisModule } from './common/redis.module';
import { RequestTimingInterceptor } from './common/request-timing.interceptor';
import { validateEnvironment } from './common/env.validation';

// ── Feature Modules ──────────────────────────────────────────
import { SkillsModule } from './skills/skills.module';
import { UsersModule } from './users/users.module';
import { AttemptsModule } from './attempts/attempts.module';
import { AnalyticsModule } from './analytics/analytics.module';
import { ProgressModule } from './progress/progress.module';
import { TrainingPlanModule } from './training-plan/training-plan.module';
import { ErasureModule } from './erasure/erasure.module';

/**
 * AppModule – Root module composing all feature modules.
 *
 * Module Loading Order (dependency-first):
 * 1. ConfigModule (global – validated env vars available everywhere)
 * 2. TypeOrmModule (global – database connection pool)
 * 3. RedisModule (global – per-attempt locks)
 * 4. Feature modules
 *
 * Database Configuration:
 * - MSSQL 2022 via mssql/tedious driver
 * - Connection pool: min=2, max=20
 * - Auto-synchronize in dev (NEVER in production – use migrations)
 * - RequestTimeout: 30s to prevent long-running query locks
 */
@Module({
  imports: [
    // ── Global Configuration ──────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '../../.env',
      validate: validateEnvironment,
    }),

    // ── Database ──────────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'mssql' as const,
        host: config.get<string>('MSSQL_HOST', 'localhost'),
        port: config.get<number>('MSSQL_PORT', 1433),
        username: config.get<string>('MSSQL_USER', 'sa'),
        password: config.get<string>('MSSQL_PASSWORD'),
        database: config.get<string>('MSSQL_DATABASE', 'skillcoach'),
        entities: AllEntities,
        synchronize: config.get<string>('NODE_ENV') !== 'production',
        logging: config.get<string>('NODE_ENV') === 'development',
        options: {
          encrypt: false,
          trustServerCertificate: true,
        },
        extra: {
          connectionTimeout: 30000,
          requestTimeout: 30000,
        },
        pool: {
          min: 2,
          max: 20,
        },
      }),
    }),

    // ── Infrastructure ────────────────────────────────────────
    RedisModule,

    // ── Catalog & Users ───────────────────────────────────────
    SkillsModule,
    UsersModule,

    // ── Attempt Tracking ──────────────────────────────────────
    AttemptsModule,

    // ── Analytics & Progress ──────────────────────────────────
    AnalyticsModule,
    ProgressModule,
    TrainingPlanModule,

    // ── Compliance ────────────────────────────────────────────
    ErasureModule,
  ],
  providers: [
    { provide: APP_INTERCEPTOR, useClass: RequestTimingInterceptor },
  ],
})
export class AppModule {}
