import { CanActivate, ExecutionContext, Injectable, SetMetadata } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request, Response } from 'express';
import { RateLimitScope } from '../config/app.config';
import { extractClientIp } from '../utils/client-ip.util';
import { RateLimitExceededException } from './rate-limit.exception';
import { RateLimiterService, RateLimitResult } from './rate-limiter.service';

export const RATE_LIMIT_SCOPES = 'rateLimitScopes';

/**
 * Extra IP-keyed limiter scopes for a handler, checked after the global and IP scopes.
 */
export const RateLimit = (...scopes: RateLimitScope[]) => SetMetadata(RATE_LIMIT_SCOPES, scopes);

const MUTATING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export function applyRateLimitHeaders(response: Response, result: RateLimitResult): void {
  response.setHeader('X-RateLimit-Limit', String(result.limit));
  response.setHeader('X-RateLimit-Remaining', String(result.remaining));
  response.setHeader('X-RateLimit-Reset', String(result.resetAt));
}

/**
 * Guards mutating requests with the global and per-IP limiters, plus any
 * scopes named by @RateLimit on the handler.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly rateLimiter: RateLimiterService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const extraScopes = this.reflector.get<RateLimitScope[] | undefined>(RATE_LIMIT_SCOPES, context.getHandler()) ?? [];
    const scopes: RateLimitScope[] = MUTATING_METHODS.has(request.method)
      ? ['global', 'ip', ...extraScopes]
      : extraScopes;

    if (!this.rateLimiter.enabled || scopes.length === 0) {
      return true;
    }

    const clientIp = extractClientIp(request.headers, request.socket.remoteAddress);

    for (const scope of scopes) {
      const result = await this.rateLimiter.check(scope, scope === 'global' ? 'global' : clientIp);
      applyRateLimitHeaders(response, result);

      if (!result.allowed) {
        throw new RateLimitExceededException(result);
      }
    }

    return true;
  }
}
