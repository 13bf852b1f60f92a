import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './common/app-setup';

/**
 * Bootstrap the SkillCoach Gateway Server.
 *
 * CORS is open: the only caller is the VR client bridge on the
 * training-room network.
 */
async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  configureApp(app);

  // ── CORS ────────────────────────────────────────────────────
  app.enableCors({ origin: true, credentials: true });
  app.enableShutdownHooks();

  const config = app.get(ConfigService);
  const port = config.get<number>('GATEWAY_PORT', 3000);
  await app.listen(port);
  logger.log(`SkillCoach Gateway Server running on port ${port}`);
  logger.log(`Environment: ${config.get<string>('NODE_ENV', 'development')}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Gateway failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
