import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { RateLimitExceededException } from '../rate-limit/rate-limit.exception';
import { RateLimit, RateLimitGuard, applyRateLimitHeaders } from '../rate-limit/rate-limit.guard';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { extractClientIp } from '../utils/client-ip.util';
import { CommentQueryService } from './comment-query.service';
import { toCommentView } from './comment.mapper';
import { CommentService } from './comment.service';
import { CommentListResult, CommentView, PageStats } from './comment.types';
import { CreateCommentDto } from './dto/create-comment.dto';
import { ListCommentsQueryDto, ListRepliesQueryDto } from './dto/list-comments-query.dto';
import { UpdateCommentDto } from './dto/update-comment.dto';

@Controller('api')
@UseGuards(RateLimitGuard)
export class CommentController {
  constructor(
    private readonly commentService: CommentService,
    private readonly commentQueries: CommentQueryService,
    private readonly rateLimiter: RateLimiterService,
  ) {}

  @Get('comments')
  async listComments(@Query() query: ListCommentsQueryDto): Promise<CommentListResult> {
    return this.commentQueries.listTopLevel({
      page: query.page,
      cursor: query.cursor,
      limit: query.limit,
      sort: query.sort,
      order: query.order,
    });
  }

  @Get('comments/:id/replies')
  async listReplies(
    @Param('id', ParseIntPipe) parentId: number,
    @Query() query: ListRepliesQueryDto,
  ): Promise<CommentListResult> {
    return this.commentQueries.listReplies({
      parentId,
      cursor: query.cursor,
      limit: query.limit,
    });
  }

  @Post('comments')
  @HttpCode(HttpStatus.CREATED)
  @RateLimit('comment')
  async createComment(
    @Body() body: CreateCommentDto,
    @Req() request: Request,
    @Res({ passthrough: true }) response: Response,
  ): Promise<CommentView> {
    const emailLimit = await this.rateLimiter.check('email', body.email.toLowerCase());
    if (!emailLimit.allowed) {
      applyRateLimitHeaders(response, emailLimit);
      throw new RateLimitExceededException(emailLimit, 'Too many comments from this email address, please try again later');
    }

    const comment = await this.commentService.createComment(
      {
        page: body.page,
        email: body.email,
        username: body.username,
        content: body.content,
        parentId: body.parentId ?? null,
      },
      {
        ipAddress: extractClientIp(request.headers, request.socket.remoteAddress),
        userAgent: request.get('user-agent') ?? '',
      },
    );

    return toCommentView(comment);
  }

  @Get('comments/:id')
  async getComment(@Param('id', ParseIntPipe) commentId: number): Promise<CommentView> {
    return toCommentView(await this.commentService.getComment(commentId));
  }

  @Put('comments/:id')
  async updateComment(
    @Param('id', ParseIntPipe) commentId: number,
    @Body() body: UpdateCommentDto,
  ): Promise<CommentView> {
    const comment = await this.commentService.updateComment(commentId, {
      content: body.content,
      isDeleted: body.isDeleted,
    });
    return toCommentView(comment);
  }

  @Delete('comments/:id')
  async deleteComment(@Param('id', ParseIntPipe) commentId: number) {
    await this.commentService.deleteComment(commentId);
    return {
      success: true,
      message: 'Comment deleted successfully',
    };
  }

  @Get('stats/:page')
  async getPageStats(@Param('page') page: string): Promise<PageStats> {
    return this.commentQueries.getPageStats(page);
  }
}
