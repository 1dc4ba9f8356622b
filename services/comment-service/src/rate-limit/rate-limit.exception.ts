import { HttpException, HttpStatus } from '@nestjs/common';
import { RateLimitResult } from './rate-limiter.service';

export class RateLimitExceededException extends HttpException {
  readonly retryAfter: number;

  constructor(readonly result: RateLimitResult, message = 'Too many requests, please try again later') {
    super(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        message,
        error: 'Too Many Requests',
        retryAfter: result.retryAfter ?? 0,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
    this.retryAfter = result.retryAfter ?? 0;
  }
}
