import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Redis from 'ioredis';
import { AppConfig, appConfig } from '../config/app.config';

export const REDIS_CLIENT = Symbol('REDIS_CLIENT');

export interface CacheOptions {
  ttl?: number; // Time to live in seconds
}

/**
 * Redis-backed cache. Every failure is logged and reported as a miss or a no-op:
 * reads must stay correct with the cache gone.
 */
@Injectable()
export class CacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CacheService.name);
  private readonly prefix: string;
  private readonly enabled: boolean;

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    @Inject(appConfig.KEY) config: AppConfig,
  ) {
    this.prefix = config.cache.prefix;
    this.enabled = config.cache.enabled;

    this.redis.on('error', (error: Error) => {
      this.logger.error(`Redis error: ${error.message}`);
    });

    this.redis.on('close', () => {
      this.logger.warn('Redis connection closed');
    });
  }

  async onModuleInit() {
    if (await this.ping()) {
      this.logger.log('Redis cache service initialized');
    } else {
      this.logger.warn('Redis is not reachable, continuing without cache');
    }
  }

  async onModuleDestroy() {
    try {
      await this.redis.quit();
      this.logger.log('Redis cache service disconnected');
    } catch (error) {
      this.logger.warn(`Redis quit failed: ${this.describe(error)}`);
    }
  }

  /**
   * Build cache key with prefix
   */
  private buildKey(key: string): string {
    return `${this.prefix}:${key}`;
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  async get<T>(key: string): Promise<T | null> {
    if (!this.enabled) return null;

    try {
      const value = await this.redis.get(this.buildKey(key));
      if (value === null) return null;

      const parsed: T = JSON.parse(value);
      return parsed;
    } catch (error) {
      this.logger.warn(`Failed to get cache key ${key}: ${this.describe(error)}`);
      return null;
    }
  }

  async set<T>(key: string, value: T, options?: CacheOptions): Promise<boolean> {
    if (!this.enabled) return false;

    try {
      const fullKey = this.buildKey(key);
      const serialized = JSON.stringify(value);

      if (options?.ttl) {
        await this.redis.setex(fullKey, options.ttl, serialized);
      } else {
        await this.redis.set(fullKey, serialized);
      }

      return true;
    } catch (error) {
      this.logger.warn(`Failed to set cache key ${key}: ${this.describe(error)}`);
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const result = await this.redis.del(this.buildKey(key));
      return result > 0;
    } catch (error) {
      this.logger.warn(`Failed to delete cache key ${key}: ${this.describe(error)}`);
      return false;
    }
  }

  /**
   * Delete every key matching a glob pattern (relative to the prefix).
   */
  async deletePattern(pattern: string): Promise<number> {
    try {
      const keys = await this.redis.keys(this.buildKey(pattern));

      if (keys.length === 0) return 0;

      const pipeline = this.redis.pipeline();
      keys.forEach((key) => pipeline.del(key));
      await pipeline.exec();

      return keys.length;
    } catch (error) {
      this.logger.warn(`Failed to delete pattern ${pattern}: ${this.describe(error)}`);
      return 0;
    }
  }

  /**
   * Cache-aside read: return the cached value or compute, store and return it.
   */
  async getOrSet<T>(key: string, fetchFn: () => Promise<T>, options?: CacheOptions): Promise<T> {
    const cached = await this.get<T>(key);

    if (cached !== null) {
      return cached;
    }

    const value = await fetchFn();
    await this.set(key, value, options);

    return value;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch {
      return false;
    }
  }

  /**
   * Raw client for the rate limiter's sorted-set commands.
   */
  getClient(): Redis {
    return this.redis;
  }
}
