import {
  BadRequestException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { CommentCacheService } from '../cache/comment-cache.service';
import { LocationClientService } from '../clients/location-client.service';
import { AppConfig, appConfig } from '../config/app.config';
import { Comment } from '../entities/comment.entity';
import { CommentStore } from '../store/comment.store';
import { isSpam, sanitizeContent } from '../utils/content.util';
import { hashEmail } from '../utils/email-hash.util';
import { detectSystem } from '../utils/user-agent.util';
import { ClientContext, CreateCommentInput, UpdateCommentInput } from './comment.types';

@Injectable()
export class CommentService {
  private readonly logger = new Logger(CommentService.name);
  private readonly spamThreshold: number;

  constructor(
    private readonly store: CommentStore,
    private readonly commentCache: CommentCacheService,
    private readonly locationClient: LocationClientService,
    @Inject(appConfig.KEY) config: AppConfig,
  ) {
    this.spamThreshold = config.spam.threshold;
  }

  private describe(error: unknown): string {
    return error instanceof Error ? (error.stack ?? error.message) : String(error);
  }

  async createComment(input: CreateCommentInput, client: ClientContext): Promise<Comment> {
    const parentId = input.parentId ?? null;

    if (parentId !== null) {
      const parent = await this.loadOrFail('load parent comment', () => this.store.findById(parentId));

      if (!parent) {
        throw new NotFoundException('Parent comment not found');
      }

      if (parent.page !== input.page) {
        throw new BadRequestException('Cannot reply to a comment on a different page');
      }
    }

    if (isSpam(input.content, this.spamThreshold)) {
      throw new BadRequestException('Comment contains disallowed content');
    }

    const location = await this.locationClient.resolve(client.ipAddress);

    let saved: Comment;
    try {
      saved = await this.store.insert({
        page: input.page,
        email: input.email,
        emailHash: hashEmail(input.email),
        username: input.username,
        content: sanitizeContent(input.content),
        parentId,
        ipAddress: client.ipAddress,
        userAgent: client.userAgent || null,
        systemType: detectSystem(client.userAgent),
        location,
      });
    } catch (error) {
      this.logger.error('Failed to create comment', this.describe(error));
      throw new InternalServerErrorException('Failed to create comment');
    }

    await this.commentCache.invalidatePage(saved.page, saved.parentId);

    this.logger.log(`Comment created: ${saved.id} on ${saved.page}`);
    return saved;
  }

  async getComment(commentId: number): Promise<Comment> {
    const comment = await this.loadOrFail('load comment', () => this.store.findById(commentId));

    if (!comment) {
      throw new NotFoundException('Comment not found');
    }

    return comment;
  }

  /**
   * Admin update: direct field assignment, no spam re-check. Deleted rows can be restored.
   */
  async updateComment(commentId: number, changes: UpdateCommentInput): Promise<Comment> {
    const updated = await this.loadOrFail('update comment', () =>
      this.store.update(commentId, {
        content: changes.content !== undefined ? sanitizeContent(changes.content) : undefined,
        isDeleted: changes.isDeleted,
      }),
    );

    if (!updated) {
      throw new NotFoundException('Comment not found');
    }

    await this.commentCache.invalidatePage(updated.page, updated.parentId);
    return updated;
  }

  async deleteComment(commentId: number): Promise<void> {
    const deleted = await this.loadOrFail('delete comment', () => this.store.update(commentId, { isDeleted: true }));

    if (!deleted) {
      throw new NotFoundException('Comment not found');
    }

    await this.commentCache.invalidatePage(deleted.page, deleted.parentId);
    this.logger.log(`Comment deleted: ${commentId}`);
  }

  private async loadOrFail<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error(`Failed to ${operation}`, this.describe(error));
      throw new InternalServerErrorException(`Failed to ${operation}`);
    }
  }
}
