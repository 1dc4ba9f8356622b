import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';
import { CacheService, REDIS_CLIENT } from './cache.service';
import { CommentCacheService } from './comment-cache.service';

/**
 * Commands fail fast while Redis is down (no offline queue, one retry);
 * CacheService and the rate limiter turn that into a miss or an allowed request.
 */
function createRedisClient(configService: ConfigService): Redis {
  const options: RedisOptions = {
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 200, 5000),
    password: configService.get<string>('REDIS_PASSWORD') || undefined,
  };

  const redisUrl = configService.get<string>('REDIS_URL');
  if (redisUrl) {
    return new Redis(redisUrl, options);
  }

  return new Redis({
    ...options,
    host: configService.get<string>('REDIS_HOST') || 'localhost',
    port: Number(configService.get<string>('REDIS_PORT')) || 6379,
  });
}

/**
 * One Redis connection shared by the cache layer and the rate limiter.
 */
@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: createRedisClient,
      inject: [ConfigService],
    },
    CacheService,
    CommentCacheService,
  ],
  exports: [CacheService, CommentCacheService],
})
export class CacheModule {}
