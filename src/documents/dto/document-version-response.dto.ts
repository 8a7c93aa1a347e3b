import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class DocumentVersionResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty({ example: 1 })
  @Expose()
  versionNumber!: number;

  @ApiProperty()
  @Expose()
  fileName!: string;

  @ApiProperty()
  @Expose()
  fileSize!: number;

  @ApiProperty()
  @Expose()
  mimeType!: string;

  @ApiProperty({ description: 'SHA-256 hex of the stored content' })
  @Expose()
  checksum!: string;

  @ApiProperty()
  @Expose()
  createdById!: string;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  // blobKey is internal and never exposed
}
