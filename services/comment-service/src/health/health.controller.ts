import { Controller, Get, Inject } from '@nestjs/common';
import { CacheService } from '../cache/cache.service';
import { AppConfig, appConfig } from '../config/app.config';
import { CommentStore } from '../store/comment.store';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  database: boolean;
  cache: boolean;
  version: string;
  timestamp: string;
}

@Controller('api/health')
export class HealthController {
  constructor(
    private readonly store: CommentStore,
    private readonly cacheService: CacheService,
    @Inject(appConfig.KEY) private readonly config: AppConfig,
  ) {}

  @Get()
  async check(): Promise<HealthStatus> {
    const [database, cache] = await Promise.all([this.store.ping(), this.cacheService.ping()]);

    return {
      status: database && cache ? 'healthy' : 'unhealthy',
      database,
      cache,
      version: this.config.version,
      timestamp: new Date().toISOString(),
    };
  }
}
