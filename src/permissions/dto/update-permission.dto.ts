import { ApiProperty } from '@nestjs/swagger';
import { IsEnum } from 'class-validator';
import { PermissionRole } from '../domain/entities/permission-role.enum';

export class UpdatePermissionDto {
  @ApiProperty({ enum: PermissionRole, example: PermissionRole.EDIT })
  @IsEnum(PermissionRole)
  role!: PermissionRole;
}
