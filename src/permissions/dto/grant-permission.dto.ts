import { ApiProperty } from '@nestjs/swagger';
import { IsEnum, IsNotEmpty, IsUUID } from 'class-validator';
import { PermissionRole } from '../domain/entities/permission-role.enum';

export class GrantPermissionDto {
  @ApiProperty({
    description: 'User receiving the permission',
    example: '3f0c2a8e-5d1b-4c55-9a57-6f1d2b7e9c10',
  })
  @IsUUID()
  @IsNotEmpty()
  userId!: string;

  @ApiProperty({ enum: PermissionRole, example: PermissionRole.READ })
  @IsEnum(PermissionRole)
  role!: PermissionRole;
}
