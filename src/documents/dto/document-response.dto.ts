import { ApiProperty } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';
import { DocumentVersionResponseDto } from './document-version-response.dto';

export class DocumentResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty()
  @Expose()
  title!: string;

  @ApiProperty({ nullable: true })
  @Expose()
  description!: string | null;

  @ApiProperty()
  @Expose()
  ownerId!: string;

  @ApiProperty({ example: 'pdf' })
  @Expose()
  fileType!: string;

  @ApiProperty({ type: [String] })
  @Expose()
  tags!: string[];

  @ApiProperty({ type: DocumentVersionResponseDto, nullable: true })
  @Expose()
  @Type(() => DocumentVersionResponseDto)
  currentVersion!: DocumentVersionResponseDto | null;

  @ApiProperty()
  @Expose()
  isDeleted!: boolean;

  @ApiProperty({ nullable: true })
  @Expose()
  deletedAt!: Date | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  @ApiProperty()
  @Expose()
  updatedAt!: Date;
}
