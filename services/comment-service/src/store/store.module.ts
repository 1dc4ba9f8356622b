import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Comment } from '../entities/comment.entity';
import { CommentStore } from './comment.store';
import { TypeOrmCommentStore } from './typeorm-comment.store';

@Global()
@Module({
  imports: [TypeOrmModule.forFeature([Comment])],
  providers: [{ provide: CommentStore, useClass: TypeOrmCommentStore }],
  exports: [CommentStore],
})
export class StoreModule {}
