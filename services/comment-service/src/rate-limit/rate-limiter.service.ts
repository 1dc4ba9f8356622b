import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { CacheService } from '../cache/cache.service';
import { AppConfig, RateLimitRule, RateLimitScope, appConfig } from '../config/app.config';

export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch seconds at which the current window ends. */
  resetAt: number;
  /** Seconds to wait, only set when the request was refused. */
  retryAfter?: number;
}

/**
 * Sliding-window limiter on a Redis sorted set per (scope, key).
 * State lives in Redis so every instance of the service shares it.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly rules: Record<RateLimitScope, RateLimitRule>;
  readonly enabled: boolean;

  constructor(
    private readonly cacheService: CacheService,
    @Inject(appConfig.KEY) config: AppConfig,
  ) {
    this.rules = config.rateLimit.rules;
    this.enabled = config.rateLimit.enabled;
  }

  ruleFor(scope: RateLimitScope): RateLimitRule {
    return this.rules[scope];
  }

  private buildKey(scope: RateLimitScope, identifier: string): string {
    return `rate_limit:${scope}:${identifier}`;
  }

  async check(scope: RateLimitScope, identifier: string): Promise<RateLimitResult> {
    const { limit, windowSeconds } = this.ruleFor(scope);
    const now = Date.now();
    const windowMs = windowSeconds * 1000;
    const resetAt = Math.floor(now / 1000) + windowSeconds;

    if (!this.enabled) {
      return { allowed: true, limit, remaining: limit, resetAt };
    }

    const key = this.buildKey(scope, identifier);

    let count: number;
    try {
      const results = await this.cacheService
        .getClient()
        .multi()
        .zremrangebyscore(key, 0, now - windowMs)
        .zadd(key, now, `${now}-${randomUUID()}`)
        .zcard(key)
        .expire(key, windowSeconds)
        .exec();

      const reply = results?.[2];
      if (!reply || reply[0] || typeof reply[1] !== 'number') {
        throw reply?.[0] ?? new Error('Missing ZCARD reply');
      }
      count = reply[1];
    } catch (error) {
      // Fail open.
      this.logger.warn(
        `Rate limit check failed for ${scope}, allowing request: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { allowed: true, limit, remaining: limit, resetAt };
    }

    const remaining = Math.max(0, limit - count);

    if (count > limit) {
      return { allowed: false, limit, remaining: 0, resetAt, retryAfter: windowSeconds };
    }

    return { allowed: true, limit, remaining, resetAt };
  }
}
