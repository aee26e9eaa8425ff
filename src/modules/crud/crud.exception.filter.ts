import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { AppError } from '../../lib/errors/AppError';
import { StoreActionError } from '../../lib/errors/StoreActionError';
import { failure } from './crud.response';

/**
 * Renders every failed request as `{ code, message, data: {} }` and logs it.
 */
@Catch()
export class EnvelopeExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(EnvelopeExceptionFilter.name);

  public catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;
    const body = failure(status, messageOf(exception));

    const line = `${req.method} ${req.originalUrl} -> ${body.code} ${body.message} (ip=${req.ip ?? 'n/a'})`;
    if (body.code >= 500) {
      this.logger.error(
        exception instanceof StoreActionError ? `${line} ${exception.summary()}` : line,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(line);
    }

    res.status(body.code).json(body);
  }
}

function messageOf(exception: unknown): string {
  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    if (typeof response === 'string') return response;
    const message: unknown = Reflect.get(response, 'message');
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.map(String).join('; ');
    return exception.message;
  }
  if (exception instanceof AppError) return exception.message;
  return 'Internal Server Error';
}
