import { Transform } from 'class-transformer';
import { IsEmail, IsInt, IsNotEmpty, IsOptional, IsString, Length, Matches, MaxLength, Min } from 'class-validator';
import { trimString } from './transforms';

export class CreateCommentDto {
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  page!: string;

  @Transform(trimString)
  @IsEmail()
  @MaxLength(255)
  email!: string;

  @Transform(trimString)
  @IsString()
  @Length(2, 100)
  @Matches(/^[^<>"'/\\]*$/, { message: 'username must not contain < > " \' / or \\' })
  username!: string;

  @Transform(trimString)
  @IsString()
  @Length(10, 2000)
  content!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  parentId?: number | null;
}
