import { Inject, Injectable } from '@nestjs/common';
import { CacheService } from './cache.service';
import { buildCacheKey, escapeGlob } from './cache-key';
import { AppConfig, appConfig } from '../config/app.config';
import { CommentListResult, PageStats, SortField, SortOrder } from '../comment/comment.types';

/**
 * Page ids are free text; percent-encoding keeps a `:` in one from shifting the key fields.
 */
function pageSegment(page: string): string {
  return encodeURIComponent(page);
}

/** `cursor` is the canonical re-encoded cursor, never the raw client string. */
export interface TopLevelPageKey {
  page: string;
  cursor: string | undefined;
  limit: number;
  sort: SortField;
  order: SortOrder;
}

export interface ReplyPageKey {
  parentId: number;
  cursor: string | undefined;
  limit: number;
}

/**
 * Comment-specific cache operations
 * Handles list pages, reply pages and page statistics
 */
@Injectable()
export class CommentCacheService {
  private readonly TTL: { LIST: number; STATS: number };

  constructor(
    private readonly cacheService: CacheService,
    @Inject(appConfig.KEY) config: AppConfig,
  ) {
    this.TTL = {
      LIST: config.cache.listTtl,
      STATS: config.cache.statsTtl,
    };
  }

  // Top-level comment pages
  listKey(key: TopLevelPageKey): string {
    return buildCacheKey('list', pageSegment(key.page), key.cursor, key.limit, key.sort, key.order);
  }

  async getOrLoadTopLevelPage(key: TopLevelPageKey, load: () => Promise<CommentListResult>): Promise<CommentListResult> {
    return this.cacheService.getOrSet(this.listKey(key), load, { ttl: this.TTL.LIST });
  }

  // Reply pages
  repliesKey(key: ReplyPageKey): string {
    return buildCacheKey('replies', key.parentId, key.cursor, key.limit);
  }

  async getOrLoadReplyPage(key: ReplyPageKey, load: () => Promise<CommentListResult>): Promise<CommentListResult> {
    return this.cacheService.getOrSet(this.repliesKey(key), load, { ttl: this.TTL.LIST });
  }

  // Page statistics
  statsKey(page: string): string {
    return buildCacheKey('stats', pageSegment(page));
  }

  async getOrLoadPageStats(page: string, load: () => Promise<PageStats>): Promise<PageStats> {
    return this.cacheService.getOrSet(this.statsKey(page), load, { ttl: this.TTL.STATS });
  }

  /**
   * Drop everything a write to `page` can change. A reply also drops its parent's reply pages.
   */
  async invalidatePage(page: string, parentId?: number | null): Promise<void> {
    const tasks: Promise<unknown>[] = [
      this.cacheService.deletePattern(`${buildCacheKey('list', escapeGlob(pageSegment(page)))}:*`),
      this.cacheService.delete(this.statsKey(page)),
    ];

    if (parentId) {
      tasks.push(this.cacheService.deletePattern(`${buildCacheKey('replies', parentId)}:*`));
    }

    await Promise.all(tasks);
  }
}
