import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, IsString, Length } from 'class-validator';
import { trimString } from './transforms';

export class UpdateCommentDto {
  @IsOptional()
  @Transform(trimString)
  @IsString()
  @Length(10, 2000)
  content?: string;

  @IsOptional()
  @IsBoolean()
  isDeleted?: boolean;
}
