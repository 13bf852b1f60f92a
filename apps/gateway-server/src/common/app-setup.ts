import { INestApplication, ValidationPipe, VersioningType } from '@nestjs/common';
import { GlobalExceptionFilter } from './global-exception.filter';

/**
 * HTTP conventions shared by the server and the integration tests.
 *
 * - URI versioning (/api/v1/...).
 * - Global ValidationPipe with whitelist strips unknown properties from
 *   DTOs and rejects requests that carry them.
 * - One exception filter renders every error in the same JSON shape.
 */
export function configureApp(app: INestApplication): void {
  // ── API Versioning ──────────────────────────────────────────
  app.setGlobalPrefix('api');
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: '1',
  });

  // ── Global Pipes ────────────────────────────────────────────
  app.useGlobalPipes(createValidationPipe());

  // ── Global Exception Filter ─────────────────────────────────
  app.useGlobalFilters(new GlobalExceptionFilter());
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    transformOptions: { enableImplicitConversion: true },
  });
}
