import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

/** Stable machine-readable codes for the statuses the gateway raises */
const ERROR_CODES: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'VALIDATION_ERROR',
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
  [HttpStatus.CONFLICT]: 'INVALID_STATE',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'INTERNAL_ERROR',
};

export interface ErrorBody {
  statusCode: number;
  errorCode: string;
  message: string;
  path: string;
  timestamp: string;
}

/**
 * Global Exception Filter – Catches ALL unhandled exceptions and returns
 * a standardized JSON error response.
 *
 * - HttpExceptions keep their status and message; validation message
 *   arrays are joined with "; ".
 * - Anything else is a 500 whose original message is logged with its
 *   stack and never sent to the client.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('ExceptionFilter');

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = extractMessage(exception.getResponse()) ?? exception.message;
    } else if (exception instanceof Error) {
      this.logger.error(`Unhandled exception: ${exception.message}`, exception.stack);
    } else {
      this.logger.error(`Unhandled non-error thrown: ${String(exception)}`);
    }

    const body: ErrorBody = {
      statusCode: status,
      errorCode: ERROR_CODES[status] ?? HttpStatus[status] ?? 'HTTP_ERROR',
      message,
      path: request.url,
      timestamp: new Date().toISOString(),
    };

    /** Structured error log for alerting pipelines */
    this.logger.warn(JSON.stringify({ ...body, method: request.method }));

    response.status(status).json(body);
  }
}

function extractMessage(payload: string | object): string | undefined {
  if (typeof payload === 'string') return payload;
  if (!('message' in payload)) return undefined;

  const { message } = payload;
  if (typeof message === 'string') return message;
  if (Array.isArray(message)) return message.map(String).join('; ');
  return undefined;
}
