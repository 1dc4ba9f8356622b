import { Transform, Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { SORT_FIELDS, SORT_ORDERS, SortField, SortOrder } from '../comment.types';
import { trimString } from './transforms';

export class ListCommentsQueryDto {
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  page!: string;

  @IsOptional()
  @IsString()
  cursor?: string;

  // Values above the configured maximum are clamped, not rejected.
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;

  @IsOptional()
  @IsIn(SORT_FIELDS)
  sort?: SortField;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.toLowerCase() : value))
  @IsIn(SORT_ORDERS)
  order?: SortOrder;
}

export class ListRepliesQueryDto {
  @IsOptional()
  @IsString()
  cursor?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;
}
