import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Response } from 'express';
import { RateLimitExceededException } from '../rate-limit/rate-limit.exception';
import { getRequestId } from './request-context.middleware';

/**
 * Renders HttpExceptions as-is and everything else as a generic 500.
 * Every body carries the request id so a report can be matched to the server log.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const requestId = getRequestId(response) ?? randomUUID();

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();

      if (exception instanceof RateLimitExceededException) {
        response.setHeader('Retry-After', String(exception.retryAfter));
      }

      const payload = typeof body === 'string' ? { statusCode: status, message: body } : { ...body };
      response.status(status).json({ ...payload, requestId });
      return;
    }

    this.logger.error(
      `Unhandled exception [${requestId}]`,
      exception instanceof Error ? exception.stack : String(exception),
    );

    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      requestId,
    });
  }
}
