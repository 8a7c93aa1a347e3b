import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class DownloadResponseDto {
  @ApiProperty({ description: 'Presigned read URL' })
  @Expose()
  url!: string;

  @ApiProperty({ description: 'Seconds until the URL expires', example: 3600 })
  @Expose()
  expiresIn!: number;

  @ApiProperty()
  @Expose()
  versionNumber!: number;

  @ApiProperty()
  @Expose()
  fileName!: string;

  @ApiProperty()
  @Expose()
  mimeType!: string;

  @ApiProperty()
  @Expose()
  fileSize!: number;

  @ApiProperty()
  @Expose()
  checksum!: string;
}
