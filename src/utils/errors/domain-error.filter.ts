import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { DomainError, ErrorKind } from './domain-error';

const STATUS_BY_KIND: Record<ErrorKind, HttpStatus> = {
  [ErrorKind.InvalidInput]: HttpStatus.UNPROCESSABLE_ENTITY,
  [ErrorKind.NotFound]: HttpStatus.NOT_FOUND,
  [ErrorKind.Forbidden]: HttpStatus.FORBIDDEN,
  [ErrorKind.Conflict]: HttpStatus.CONFLICT,
  [ErrorKind.StorageUnavailable]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorKind.Internal]: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function statusForKind(kind: ErrorKind): HttpStatus {
  return STATUS_BY_KIND[kind];
}

/**
 * Maps domain failures to HTTP responses.
 *
 * Framework exceptions (validation pipe, auth guard, throttler) keep their
 * own status and body. Anything else is logged with its stack and answered
 * with a generic 500.
 */
@Catch()
export class DomainErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    if (exception instanceof DomainError) {
      const status = statusForKind(exception.kind);
      if (exception.kind === ErrorKind.Internal) {
        this.logger.error(
          `${request.method} ${request.url} failed: ${exception.message}`,
          exception.stack,
        );
      }
      response.status(status).json({ status, ...exception.toJSON() });
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      response
        .status(status)
        .json(typeof body === 'string' ? { status, message: body } : body);
      return;
    }

    this.logger.error(
      `${request.method} ${request.url} failed with unexpected error`,
      exception instanceof Error ? exception.stack : String(exception),
    );
    const internal = DomainError.internal();
    response
      .status(HttpStatus.INTERNAL_SERVER_ERROR)
      .json({ status: HttpStatus.INTERNAL_SERVER_ERROR, ...internal.toJSON() });
  }
}
