import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

/**
 * RequestTimingInterceptor – Logs method, URL, status and elapsed time
 * for every HTTP request. Requests slower than SLOW_REQUEST_MS are
 * logged at warn level.
 */
@Injectable()
export class RequestTimingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RequestTimingInterceptor.name);
  private readonly slowRequestMs: number;

  constructor(config: ConfigService) {
    this.slowRequestMs = config.get<number>('SLOW_REQUEST_MS', 1000);
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const startedAt = Date.now();

    const report = (status: number): void => {
      const elapsed = Date.now() - startedAt;
      const line = `${request.method} ${request.url} ${status} ${elapsed}ms`;
      if (elapsed > this.slowRequestMs) {
        this.logger.warn(`Slow request: ${line}`);
      } else {
        this.logger.log(line);
      }
    };

    return next.handle().pipe(
      tap({
        next: () => report(http.getResponse<Response>().statusCode),
        error: (err: unknown) => report(statusOf(err)),
      }),
    );
  }
}

function statusOf(err: unknown): number {
  return err instanceof HttpException ? err.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
}
