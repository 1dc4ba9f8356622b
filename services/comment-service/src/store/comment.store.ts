import { Comment } from '../entities/comment.entity';
import { CursorValue } from '../pagination/cursor.codec';
import { SortField } from '../comment/comment.types';

export type NewComment = Pick<
  Comment,
  'page' | 'email' | 'emailHash' | 'username' | 'content' | 'parentId' | 'ipAddress' | 'userAgent' | 'systemType' | 'location'
>;

export interface CommentChanges {
  content?: string;
  isDeleted?: boolean;
}

/**
 * One keyset page of non-deleted comments.
 * `parentId: null` selects top-level comments; `after` is an exclusive (sort, id) bound
 * in the direction of `order`.
 */
export interface KeysetPageQuery {
  page?: string;
  parentId: number | null;
  sort: SortField;
  order: 'ASC' | 'DESC';
  after?: { value: CursorValue; id: number };
  take: number;
}

/**
 * Persistence boundary for comments. Implementations never return soft-deleted rows
 * unless `includeDeleted` is asked for.
 */
export abstract class CommentStore {
  abstract insert(data: NewComment): Promise<Comment>;

  abstract findById(id: number, options?: { includeDeleted?: boolean }): Promise<Comment | null>;

  abstract findPage(query: KeysetPageQuery): Promise<Comment[]>;

  /** Non-deleted direct replies per parent id; parents without replies are absent. */
  abstract countReplies(parentIds: number[]): Promise<Map<number, number>>;

  abstract countForPage(page: string, options: { topLevelOnly: boolean }): Promise<number>;

  /** Applies the changes in one transaction; null when the row does not exist. */
  abstract update(id: number, changes: CommentChanges): Promise<Comment | null>;

  abstract ping(): Promise<boolean>;
}
