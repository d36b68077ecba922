import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateThreadDto {
  @IsString()
  @IsNotEmpty({ message: 'Title is required' })
  @MaxLength(200)
  title!: string;

  @IsString()
  @IsNotEmpty({ message: 'Content is required' })
  @MaxLength(10_000)
  content!: string;
}

export class CreateReplyDto {
  @IsString()
  @IsNotEmpty({ message: 'Content is required' })
  @MaxLength(5_000)
  content!: string;

  /** Reply being answered; omitted for a top-level reply. */
  @IsOptional()
  @IsString()
  parentId?: string;
}

export class ListThreadsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page: number = 1;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  perPage: number = 20;
}
