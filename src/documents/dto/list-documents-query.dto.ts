import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  IsUUID,
  Max,
  Min,
} from 'class-validator';
import { toTagList } from './tags.transform';

export class ListDocumentsQueryDto {
  @ApiPropertyOptional({ minimum: 1, default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000000)
  page?: number;

  @ApiPropertyOptional({
    minimum: 1,
    description: 'Clamped to the configured maximum page size',
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;

  @ApiPropertyOptional({
    format: 'uuid',
    description: 'Only documents owned by this user',
  })
  @IsOptional()
  @IsUUID()
  ownerId?: string;

  @ApiPropertyOptional({ description: 'Case-insensitive title substring' })
  @IsOptional()
  @IsString()
  title?: string;

  @ApiPropertyOptional({
    type: [String],
    description: 'Match documents carrying any of these tags',
  })
  @IsOptional()
  @Transform(toTagList)
  @IsArray()
  @IsString({ each: true })
  tags?: string[];

  @ApiPropertyOptional({ example: 'pdf' })
  @IsOptional()
  @IsString()
  fileType?: string;
}
