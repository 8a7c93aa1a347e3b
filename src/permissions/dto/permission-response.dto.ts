import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { PermissionRole } from '../domain/entities/permission-role.enum';

export class PermissionResponseDto {
  @ApiProperty({
    description: 'Permission row ID, null for the implicit owner entry',
    nullable: true,
  })
  @Expose()
  id!: string | null;

  @ApiProperty()
  @Expose()
  documentId!: string;

  @ApiProperty()
  @Expose()
  userId!: string;

  @ApiProperty({ enum: PermissionRole })
  @Expose()
  role!: PermissionRole;

  @ApiProperty({
    description: 'True for the owner, whose ADMIN role is not stored as a row',
  })
  @Expose()
  implicit!: boolean;

  @ApiProperty({ nullable: true })
  @Expose()
  grantedById!: string | null;

  @ApiProperty({ example: '2025-01-20T10:30:00Z' })
  @Expose()
  grantedAt!: Date;
}
