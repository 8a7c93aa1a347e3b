import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { ActivityAction } from '../domain/entities/activity-action.enum';

export class ActivityEntryResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty({ nullable: true })
  @Expose()
  actorId!: string | null;

  @ApiProperty({ nullable: true })
  @Expose()
  documentId!: string | null;

  @ApiProperty({ enum: ActivityAction })
  @Expose()
  action!: ActivityAction;

  @ApiProperty({ type: 'object', additionalProperties: true })
  @Expose()
  details!: Record<string, unknown>;

  @ApiProperty({ nullable: true })
  @Expose()
  ipAddress!: string | null;

  @ApiProperty({ nullable: true })
  @Expose()
  userAgent!: string | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;
}
