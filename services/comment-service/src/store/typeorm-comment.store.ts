import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, IsNull, Repository } from 'typeorm';
import { Comment } from '../entities/comment.entity';
import { CommentChanges, CommentStore, KeysetPageQuery, NewComment } from './comment.store';

@Injectable()
export class TypeOrmCommentStore extends CommentStore {
  constructor(
    @InjectRepository(Comment)
    private readonly commentRepository: Repository<Comment>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  async insert(data: NewComment): Promise<Comment> {
    return this.dataSource.transaction(async (manager) => {
      const comment = manager.create(Comment, data);
      return manager.save(comment);
    });
  }

  async findById(id: number, options?: { includeDeleted?: boolean }): Promise<Comment | null> {
    return this.commentRepository.findOne({
      where: options?.includeDeleted ? { id } : { id, isDeleted: false },
    });
  }

  async findPage(query: KeysetPageQuery): Promise<Comment[]> {
    const qb = this.commentRepository
      .createQueryBuilder('comment')
      .where('comment.isDeleted = :isDeleted', { isDeleted: false });

    if (query.page !== undefined) {
      qb.andWhere('comment.page = :page', { page: query.page });
    }

    if (query.parentId === null) {
      qb.andWhere('comment.parentId IS NULL');
    } else {
      qb.andWhere('comment.parentId = :parentId', { parentId: query.parentId });
    }

    const column = `comment.${query.sort}`;

    if (query.after) {
      // Row-value comparison keeps (sort, id) a strict total order across pages.
      const operator = query.order === 'ASC' ? '>' : '<';
      qb.andWhere(`(${column}, comment.id) ${operator} (:cursorValue, :cursorId)`, {
        cursorValue: query.after.value,
        cursorId: query.after.id,
      });
    }

    return qb
      .orderBy(column, query.order)
      .addOrderBy('comment.id', query.order)
      .limit(query.take)
      .getMany();
  }

  async countReplies(parentIds: number[]): Promise<Map<number, number>> {
    const counts = new Map<number, number>();
    if (parentIds.length === 0) return counts;

    const rows = await this.commentRepository
      .createQueryBuilder('comment')
      .select('comment.parentId', 'parentId')
      .addSelect('COUNT(*)', 'count')
      .where('comment.parentId IN (:...parentIds)', { parentIds })
      .andWhere('comment.isDeleted = :isDeleted', { isDeleted: false })
      .groupBy('comment.parentId')
      .getRawMany<{ parentId: number | string; count: number | string }>();

    for (const row of rows) {
      counts.set(Number(row.parentId), Number(row.count));
    }

    return counts;
  }

  async countForPage(page: string, options: { topLevelOnly: boolean }): Promise<number> {
    return this.commentRepository.count({
      where: options.topLevelOnly
        ? { page, isDeleted: false, parentId: IsNull() }
        : { page, isDeleted: false },
    });
  }

  async update(id: number, changes: CommentChanges): Promise<Comment | null> {
    return this.dataSource.transaction(async (manager) => {
      const comment = await manager.findOne(Comment, { where: { id } });
      if (!comment) return null;

      if (changes.content !== undefined) {
        comment.content = changes.content;
      }

      if (changes.isDeleted !== undefined) {
        comment.isDeleted = changes.isDeleted;
      }

      return manager.save(comment);
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }
}
