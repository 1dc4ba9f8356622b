export type SortField = 'createdAt' | 'updatedAt' | 'id';
export type SortOrder = 'asc' | 'desc';

export const SORT_FIELDS: readonly SortField[] = ['createdAt', 'updatedAt', 'id'];
export const SORT_ORDERS: readonly SortOrder[] = ['asc', 'desc'];

/**
 * Public shape of a comment. The submitter's email, IP and user agent never leave the service.
 */
export interface CommentView {
  id: number;
  page: string;
  emailHash: string;
  username: string;
  content: string;
  parentId: number | null;
  createdAt: string;
  updatedAt: string;
  systemType: string | null;
  location: string | null;
}

export interface CommentListItem extends CommentView {
  replyCount: number;
}

export interface CommentListResult {
  comments: CommentListItem[];
  hasNext: boolean;
  nextCursor: string | null;
}

export interface PageStats {
  totalComments: number;
  topLevelComments: number;
  replies: number;
}

export interface ListCommentsParams {
  page: string;
  cursor?: string;
  limit?: number;
  sort?: SortField;
  order?: SortOrder;
}

export interface ListRepliesParams {
  parentId: number;
  cursor?: string;
  limit?: number;
}

export interface CreateCommentInput {
  page: string;
  email: string;
  username: string;
  content: string;
  parentId?: number | null;
}

export interface UpdateCommentInput {
  content?: string;
  isDeleted?: boolean;
}

export interface ClientContext {
  ipAddress: string;
  userAgent: string;
}
