import { Comment } from '../entities/comment.entity';
import { CommentListItem, CommentView } from './comment.types';

export function toCommentView(comment: Comment): CommentView {
  return {
    id: comment.id,
    page: comment.page,
    emailHash: comment.emailHash,
    username: comment.username,
    content: comment.content,
    parentId: comment.parentId ?? null,
    createdAt: comment.createdAt.toISOString(),
    updatedAt: comment.updatedAt.toISOString(),
    systemType: comment.systemType ?? null,
    location: comment.location ?? null,
  };
}

export function toCommentListItem(comment: Comment, replyCount: number): CommentListItem {
  return { ...toCommentView(comment), replyCount };
}
