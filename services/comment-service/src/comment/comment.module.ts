import { Module } from '@nestjs/common';
import { LocationClientService } from '../clients/location-client.service';
import { HealthController } from '../health/health.controller';
import { RateLimitGuard } from '../rate-limit/rate-limit.guard';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { CommentQueryService } from './comment-query.service';
import { CommentController } from './comment.controller';
import { CommentService } from './comment.service';

/**
 * HTTP surface of the service. Expects CommentStore, CacheService,
 * CommentCacheService and the `app` config namespace from global modules.
 */
@Module({
  controllers: [CommentController, HealthController],
  providers: [CommentService, CommentQueryService, RateLimiterService, RateLimitGuard, LocationClientService],
})
export class CommentModule {}
