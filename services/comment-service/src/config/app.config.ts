import { ConfigType, registerAs } from '@nestjs/config';

export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function boolFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Application settings for the comment service.
 * Connection settings (database, redis, port) stay on ConfigService.
 */
export const appConfig = registerAs('app', () => ({
  version: process.env.APP_VERSION || '1.0.0',
  cache: {
    enabled: boolFromEnv('CACHE_ENABLED', true),
    prefix: process.env.CACHE_PREFIX || 'comments',
    listTtl: intFromEnv('CACHE_TTL', 300), // 5 minutes
    statsTtl: intFromEnv('STATS_CACHE_TTL', 600), // 10 minutes
  },
  pagination: {
    defaultLimit: intFromEnv('DEFAULT_PAGE_SIZE', 20),
    maxLimit: intFromEnv('MAX_PAGE_SIZE', 100),
  },
  rateLimit: {
    enabled: boolFromEnv('RATE_LIMIT_ENABLED', true),
    rules: {
      global: {
        limit: intFromEnv('GLOBAL_RATE_LIMIT', 1000),
        windowSeconds: intFromEnv('GLOBAL_RATE_WINDOW', 60),
      },
      ip: {
        limit: intFromEnv('IP_RATE_LIMIT', 10),
        windowSeconds: intFromEnv('IP_RATE_WINDOW', 60),
      },
      comment: {
        limit: intFromEnv('COMMENT_RATE_LIMIT', 5),
        windowSeconds: intFromEnv('COMMENT_RATE_WINDOW', 300),
      },
      email: {
        limit: intFromEnv('EMAIL_RATE_LIMIT', 3),
        windowSeconds: intFromEnv('EMAIL_RATE_WINDOW', 300),
      },
    },
  },
  location: {
    apiUrl: process.env.LOCATION_API_URL || 'https://api.vore.top/api/IP',
    timeoutMs: intFromEnv('LOCATION_API_TIMEOUT_MS', 3000),
    attempts: intFromEnv('LOCATION_API_ATTEMPTS', 3),
    cacheTtl: intFromEnv('LOCATION_CACHE_TTL', 86400), // 24 hours
  },
  spam: {
    threshold: intFromEnv('SPAM_THRESHOLD', 2),
  },
}));

export type AppConfig = ConfigType<typeof appConfig>;
export type RateLimitScope = keyof AppConfig['rateLimit']['rules'];
