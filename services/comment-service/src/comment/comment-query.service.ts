import { Inject, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { CommentCacheService } from '../cache/comment-cache.service';
import { AppConfig, appConfig } from '../config/app.config';
import { Comment } from '../entities/comment.entity';
import { CursorValue, DecodedCursor, decodeCursor, encodeCursor } from '../pagination/cursor.codec';
import { toCursorPage } from '../pagination/cursor-page';
import { CommentStore } from '../store/comment.store';
import { toCommentListItem } from './comment.mapper';
import {
  CommentListResult,
  ListCommentsParams,
  ListRepliesParams,
  PageStats,
  SortField,
} from './comment.types';

/**
 * Cached, cursor-paginated reads: top-level listings with reply counts,
 * reply listings and page statistics.
 */
@Injectable()
export class CommentQueryService {
  private readonly logger = new Logger(CommentQueryService.name);
  private readonly pagination: AppConfig['pagination'];

  constructor(
    private readonly store: CommentStore,
    private readonly commentCache: CommentCacheService,
    @Inject(appConfig.KEY) config: AppConfig,
  ) {
    this.pagination = config.pagination;
  }

  private clampLimit(limit: number | undefined): number {
    const requested = limit ?? this.pagination.defaultLimit;
    return Math.min(Math.max(1, Math.floor(requested)), this.pagination.maxLimit);
  }

  /**
   * A cursor whose value does not fit the sort column is treated as absent.
   */
  private cursorFor(cursor: string | undefined, sort: SortField): DecodedCursor | null {
    const decoded = decodeCursor(cursor);
    if (!decoded) return null;

    const expectsDate = sort === 'createdAt' || sort === 'updatedAt';
    const fits = expectsDate ? decoded.value instanceof Date : typeof decoded.value === 'number';
    return fits ? decoded : null;
  }

  private async withStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error(`Failed to ${operation}`, error instanceof Error ? error.stack : String(error));
      throw new InternalServerErrorException(`Failed to ${operation}`);
    }
  }

  private cursorSegment(cursor: DecodedCursor | null): string | undefined {
    return cursor ? encodeCursor(cursor.value, cursor.id) : undefined;
  }

  async listTopLevel(params: ListCommentsParams): Promise<CommentListResult> {
    const sort = params.sort ?? 'createdAt';
    const order = params.order ?? 'desc';
    const limit = this.clampLimit(params.limit);
    const after = this.cursorFor(params.cursor, sort);
    const cacheKey = { page: params.page, cursor: this.cursorSegment(after), limit, sort, order };

    return this.commentCache.getOrLoadTopLevelPage(cacheKey, () =>
      this.withStore('get comments', async () => {
        const rows = await this.store.findPage({
          page: params.page,
          parentId: null,
          sort,
          order: order === 'asc' ? 'ASC' : 'DESC',
          after: after ?? undefined,
          take: limit + 1,
        });

        const page = toCursorPage(rows, limit, (row: Comment): CursorValue => row[sort]);
        const replyCounts = await this.store.countReplies(page.items.map((comment) => comment.id));

        return {
          comments: page.items.map((comment) => toCommentListItem(comment, replyCounts.get(comment.id) ?? 0)),
          hasNext: page.hasNext,
          nextCursor: page.nextCursor,
        };
      }),
    );
  }

  async listReplies(params: ListRepliesParams): Promise<CommentListResult> {
    const limit = this.clampLimit(params.limit);
    const after = this.cursorFor(params.cursor, 'createdAt');
    const cacheKey = { parentId: params.parentId, cursor: this.cursorSegment(after), limit };

    return this.commentCache.getOrLoadReplyPage(cacheKey, () =>
      this.withStore('get replies', async () => {
        const rows = await this.store.findPage({
          parentId: params.parentId,
          sort: 'createdAt',
          order: 'ASC',
          after: after ?? undefined,
          take: limit + 1,
        });

        const page = toCursorPage(rows, limit, (row: Comment): CursorValue => row.createdAt);

        // Replies are not nested further in the read path.
        return {
          comments: page.items.map((reply) => toCommentListItem(reply, 0)),
          hasNext: page.hasNext,
          nextCursor: page.nextCursor,
        };
      }),
    );
  }

  async getPageStats(page: string): Promise<PageStats> {
    return this.commentCache.getOrLoadPageStats(page, () =>
      this.withStore('get page stats', async () => {
        const [totalComments, topLevelComments] = await Promise.all([
          this.store.countForPage(page, { topLevelOnly: false }),
          this.store.countForPage(page, { topLevelOnly: true }),
        ]);

        return {
          totalComments,
          topLevelComments,
          replies: totalComments - topLevelComments,
        };
      }),
    );
  }
}
