import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { LoggerService } from '../../logs/logger.service';

export interface ErrorBody {
  statusCode: number;
  error: string;
  timestamp: string;
  path: string;
}

function describe(exception: unknown): string {
  if (exception instanceof HttpException) {
    const body = exception.getResponse();
    if (typeof body === 'string') return body;
    if ('message' in body) {
      const message: unknown = body.message;
      if (Array.isArray(message)) return message.map(String).join('; ');
      if (typeof message === 'string') return message;
    }
    return exception.message;
  }
  if (exception instanceof Error) return exception.message;
  return 'Unknown error';
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(@Inject(LoggerService) private readonly logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;
    const message = describe(exception);
    const stack = exception instanceof Error ? exception.stack : undefined;

    if (status >= 500) {
      this.logger.error(`Boundary error: ${message}`, stack, 'HTTP');
    } else {
      this.logger.warn(
        `${request.method} ${request.url} -> ${status}: ${message}`,
        'HTTP',
      );
    }

    const body: ErrorBody = {
      statusCode: status,
      error: message,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(status).json(body);
  }
}
